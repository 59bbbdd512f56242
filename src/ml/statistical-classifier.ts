import type { StatisticalVerdict, VitalSigns } from '../rules/types.js';

/**
 * Fixed feature order shared with the trained model artifact:
 * [heart_rate, body_temp, signal_strength, battery_level].
 */
export type FeatureVector = readonly [number, number, number, number];

export interface StatisticalClassifier {
    readonly name: string;
    /** False when no model could be loaded; classify() then always answers NO_OPINION. */
    readonly available: boolean;
    classify(features: FeatureVector): Promise<StatisticalVerdict>;
}

export function toFeatureVector(vitals: VitalSigns): FeatureVector {
    return [vitals.heart_rate, vitals.body_temp, vitals.signal_strength, vitals.battery_level];
}

export class UnavailableClassifier implements StatisticalClassifier {
    readonly name = 'unavailable';
    readonly available = false;

    constructor(readonly reason: string) { }

    async classify(): Promise<StatisticalVerdict> {
        return 'NO_OPINION';
    }
}
