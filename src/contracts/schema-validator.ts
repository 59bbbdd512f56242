import Ajv2020Lib from 'ajv/dist/2020.js';
import addFormatsLib from 'ajv-formats';

const Ajv2020 = Ajv2020Lib.default;
const addFormats = addFormatsLib.default;
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';
import type { TelemetryPayload } from '../rules/types.js';
import type { IsolationForestArtifact } from '../ml/isolation-forest.js';
import type { AlertEvent } from '../nats/publisher.js';

const SCHEMA_BASE = 'https://vitals-telemetry.example.com/schemas';

export const SCHEMA_IDS = {
    telemetryReading: `${SCHEMA_BASE}/telemetry-reading.json`,
    alertRaised: `${SCHEMA_BASE}/events/telemetry-alert-raised.json`,
    isolationForest: `${SCHEMA_BASE}/models/isolation-forest-artifact.json`,
} as const;

export type ValidationResult<T> =
    | { valid: true; data: T }
    | { valid: false; errors: string };

interface IdentifiedSchema {
    $id: string;
    [keyword: string]: unknown;
}

function isIdentifiedSchema(value: unknown): value is IdentifiedSchema {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        && '$id' in value && typeof value.$id === 'string';
}

export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        // Initialize Ajv with 2020-12 support
        this.ajv = new Ajv2020({
            validateSchema: false, // Disable schema validation to avoid meta-schema issues
            strict: false,
            allErrors: true,
        });
        addFormats(this.ajv);
    }

    /**
     * Load all JSON schemas from the contracts directory
     */
    loadSchemas(): void {
        if (!existsSync(this.contractsPath)) {
            logger.error({ path: this.contractsPath }, 'Contracts directory not found');
            return;
        }

        const files = this.getAllJsonFiles(this.contractsPath);
        logger.info({ count: files.length, path: this.contractsPath }, 'Loading schemas');

        files.forEach((file) => {
            try {
                const schema: unknown = JSON.parse(readFileSync(file, 'utf-8'));

                if (isIdentifiedSchema(schema)) {
                    this.ajv.addSchema(schema);
                    logger.debug({ $id: schema.$id, file }, 'Schema loaded');
                } else {
                    logger.warn({ file }, 'Schema missing $id, skipped');
                }
            } catch (err) {
                logger.error({ file, error: err }, 'Failed to load schema');
            }
        });

        this.schemasLoaded = true;
        logger.info('All schemas loaded successfully');
    }

    /**
     * Recursively get all JSON files from a directory
     */
    private getAllJsonFiles(dir: string): string[] {
        const files: string[] = [];

        try {
            const entries = readdirSync(dir, { withFileTypes: true });

            for (const entry of entries) {
                const fullPath = join(dir, entry.name);

                if (entry.isDirectory()) {
                    files.push(...this.getAllJsonFiles(fullPath));
                } else if (entry.isFile() && entry.name.endsWith('.json')) {
                    files.push(fullPath);
                }
            }
        } catch (err) {
            logger.error({ dir, error: err }, 'Failed to read directory');
        }

        return files;
    }

    /**
     * Validate data against a schema by its $id
     */
    validate<T>(schemaId: string, data: unknown): ValidationResult<T> {
        if (!this.schemasLoaded) {
            logger.warn('Schemas not loaded, validation will fail');
            return {
                valid: false,
                errors: 'Schemas not loaded',
            };
        }

        const validateFn = this.ajv.getSchema<T>(schemaId);

        if (!validateFn) {
            logger.error({ schemaId }, 'Schema not found');
            return {
                valid: false,
                errors: `Schema not found: ${schemaId}`,
            };
        }

        if ('$async' in validateFn) {
            return {
                valid: false,
                errors: `Asynchronous schema not supported: ${schemaId}`,
            };
        }

        if (validateFn(data)) {
            return { valid: true, data };
        }

        return {
            valid: false,
            errors: this.ajv.errorsText(validateFn.errors),
        };
    }

    validateTelemetryReading(data: unknown): ValidationResult<TelemetryPayload> {
        return this.validate<TelemetryPayload>(SCHEMA_IDS.telemetryReading, data);
    }

    validateAlertRaised(data: unknown): ValidationResult<AlertEvent> {
        return this.validate<AlertEvent>(SCHEMA_IDS.alertRaised, data);
    }

    validateModelArtifact(data: unknown): ValidationResult<IsolationForestArtifact> {
        return this.validate<IsolationForestArtifact>(SCHEMA_IDS.isolationForest, data);
    }
}
