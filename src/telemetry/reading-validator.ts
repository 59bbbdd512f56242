import type { SchemaValidator } from '../contracts/schema-validator.js';
import { VITAL_FIELDS } from '../rules/types.js';
import type { Reading, TelemetryPayload, VitalField, VitalSigns } from '../rules/types.js';

export const UNKNOWN_DEVICE_ID = 'UNKNOWN';

export type RejectionReason = 'INVALID_PAYLOAD' | 'INVALID_FIELD_TYPE' | 'ABORTED';

export type ParseResult =
    | { ok: true; reading: Reading }
    | { ok: false; reason: Exclude<RejectionReason, 'ABORTED'>; detail: string };

function describeType(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

/**
 * Numeric ids are kept as their decimal text; anything blank is UNKNOWN.
 */
function normalizeDeviceId(value: TelemetryPayload['device_id']): string {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? String(value) : UNKNOWN_DEVICE_ID;
    }
    return typeof value === 'string' && value.trim() !== '' ? value : UNKNOWN_DEVICE_ID;
}

/**
 * Turns a decoded payload into a Reading. Missing vitals produce an
 * incomplete reading; vitals of the wrong type reject the payload.
 */
export class ReadingValidator {
    constructor(private schemas: SchemaValidator) { }

    parse(raw: unknown, arrivalTime: Date): ParseResult {
        if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
            return {
                ok: false,
                reason: 'INVALID_PAYLOAD',
                detail: `Expected a JSON object, received ${describeType(raw)}`,
            };
        }

        const result = this.schemas.validateTelemetryReading(raw);
        if (!result.valid) {
            return { ok: false, reason: 'INVALID_FIELD_TYPE', detail: result.errors };
        }

        const payload = result.data;
        const nonFinite = VITAL_FIELDS.filter((field) => {
            const value = payload[field];
            return typeof value === 'number' && !Number.isFinite(value);
        });
        if (nonFinite.length > 0) {
            return {
                ok: false,
                reason: 'INVALID_FIELD_TYPE',
                detail: `Non-finite value for ${nonFinite.join(', ')}`,
            };
        }

        return { ok: true, reading: this.buildReading(payload, arrivalTime) };
    }

    private buildReading(payload: TelemetryPayload, arrivalTime: Date): Reading {
        const deviceId = normalizeDeviceId(payload.device_id);
        const observedAt = arrivalTime.toISOString();
        const { heart_rate, body_temp, signal_strength, battery_level } = payload;

        if (
            typeof heart_rate === 'number' &&
            typeof body_temp === 'number' &&
            typeof signal_strength === 'number' &&
            typeof battery_level === 'number'
        ) {
            return {
                kind: 'complete',
                device_id: deviceId,
                observed_at: observedAt,
                raw_payload: payload,
                vitals: { heart_rate, body_temp, signal_strength, battery_level },
            };
        }

        const vitals: Partial<VitalSigns> = {};
        const missing: VitalField[] = [];
        for (const field of VITAL_FIELDS) {
            const value = payload[field];
            if (typeof value === 'number') {
                vitals[field] = value;
            } else {
                missing.push(field);
            }
        }

        return {
            kind: 'incomplete',
            device_id: deviceId,
            observed_at: observedAt,
            raw_payload: payload,
            vitals,
            missing_fields: missing,
        };
    }
}
