/**
 * The store could not durably record or read data. Nothing from the failed
 * operation is visible afterwards.
 */
export class StorageUnavailableError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StorageUnavailableError';
    }
}
