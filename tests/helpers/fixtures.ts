import { fileURLToPath } from 'url';
import { SchemaValidator } from '../../src/contracts/schema-validator.js';
import type { FeatureVector, StatisticalClassifier } from '../../src/ml/statistical-classifier.js';
import type { CompleteReading, IncompleteReading, StatisticalVerdict, VitalField, VitalSigns } from '../../src/rules/types.js';

export const CONTRACTS_PATH = fileURLToPath(new URL('../../contracts', import.meta.url));
export const MODEL_FIXTURE_PATH = fileURLToPath(new URL('../fixtures/isolation-forest.json', import.meta.url));

export const NORMAL_VITALS: VitalSigns = {
    heart_rate: 75,
    body_temp: 36.9,
    signal_strength: -60,
    battery_level: 80,
};

export function loadedValidator(): SchemaValidator {
    const validator = new SchemaValidator(CONTRACTS_PATH);
    validator.loadSchemas();
    return validator;
}

export function completeReading(
    overrides: Partial<VitalSigns> = {},
    deviceId = 'device-1',
    observedAt = '2026-03-01T10:00:00.000Z',
): CompleteReading {
    const vitals = { ...NORMAL_VITALS, ...overrides };
    return {
        kind: 'complete',
        device_id: deviceId,
        observed_at: observedAt,
        raw_payload: { device_id: deviceId, ...vitals },
        vitals,
    };
}

export function incompleteReading(
    vitals: Partial<VitalSigns>,
    missing: VitalField[],
    deviceId = 'device-1',
    observedAt = '2026-03-01T10:00:00.000Z',
): IncompleteReading {
    return {
        kind: 'incomplete',
        device_id: deviceId,
        observed_at: observedAt,
        raw_payload: { device_id: deviceId, ...vitals },
        vitals,
        missing_fields: missing,
    };
}

type Answer = (features: FeatureVector) => StatisticalVerdict | Promise<StatisticalVerdict>;

/**
 * Classifier double with a scripted answer that records every feature vector.
 */
export class StubClassifier implements StatisticalClassifier {
    readonly name = 'stub';
    readonly available = true;
    readonly calls: FeatureVector[] = [];

    constructor(private answer: Answer) { }

    async classify(features: FeatureVector): Promise<StatisticalVerdict> {
        this.calls.push(features);
        return this.answer(features);
    }
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
