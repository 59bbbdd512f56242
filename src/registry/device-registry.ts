export type DeviceStatus = 'ACTIVE' | 'INACTIVE';

export interface DeviceRecord {
    device_id: string;
    first_seen: string;
    last_seen: string;
    total_readings: number;
    /** Stored status. Liveness is derived on read, see DeviceRegistry.describe. */
    status: string;
}

export interface DeviceView extends Omit<DeviceRecord, 'status'> {
    status: DeviceStatus;
}

/**
 * Storage seam for device rows. Implementations run inside the caller's
 * transaction so that recordReading is atomic per reading.
 */
export interface DeviceTable {
    find(deviceId: string): DeviceRecord | undefined;
    insert(record: DeviceRecord): void;
    update(record: DeviceRecord): void;
}

function earlier(a: string, b: string): string {
    return Date.parse(b) < Date.parse(a) ? b : a;
}

function later(a: string, b: string): string {
    return Date.parse(b) > Date.parse(a) ? b : a;
}

export class DeviceRegistry {
    constructor(
        private table: DeviceTable,
        private inactiveAfterMs: number,
    ) { }

    /**
     * Count one accepted reading. last_seen never moves backwards, even when
     * readings commit out of arrival order.
     */
    recordReading(deviceId: string, timestamp: string): DeviceRecord {
        const existing = this.table.find(deviceId);

        if (!existing) {
            const created: DeviceRecord = {
                device_id: deviceId,
                first_seen: timestamp,
                last_seen: timestamp,
                total_readings: 1,
                status: 'ACTIVE',
            };
            this.table.insert(created);
            return created;
        }

        const updated: DeviceRecord = {
            ...existing,
            first_seen: earlier(existing.first_seen, timestamp),
            last_seen: later(existing.last_seen, timestamp),
            total_readings: existing.total_readings + 1,
        };
        this.table.update(updated);
        return updated;
    }

    liveness(record: DeviceRecord, now: Date): DeviceStatus {
        const silentFor = now.getTime() - Date.parse(record.last_seen);
        return silentFor > this.inactiveAfterMs ? 'INACTIVE' : 'ACTIVE';
    }

    describe(record: DeviceRecord, now: Date): DeviceView {
        return { ...record, status: this.liveness(record, now) };
    }
}
