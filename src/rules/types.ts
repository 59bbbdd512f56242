export const VITAL_FIELDS = ['heart_rate', 'body_temp', 'signal_strength', 'battery_level'] as const;

export type VitalField = (typeof VITAL_FIELDS)[number];

export interface VitalSigns {
    heart_rate: number;
    body_temp: number;
    signal_strength: number;
    battery_level: number;
}

/**
 * Decoded inbound payload after type checks. Unknown keys are kept as-is.
 */
export interface TelemetryPayload {
    device_id?: string | number | null;
    heart_rate?: number | null;
    body_temp?: number | null;
    signal_strength?: number | null;
    battery_level?: number | null;
    [key: string]: unknown;
}

interface ReadingBase {
    readonly device_id: string;
    /** Acceptance time (ISO-8601, UTC), assigned by the pipeline. */
    readonly observed_at: string;
    readonly raw_payload: Readonly<TelemetryPayload>;
}

export interface CompleteReading extends ReadingBase {
    readonly kind: 'complete';
    readonly vitals: Readonly<VitalSigns>;
}

export interface IncompleteReading extends ReadingBase {
    readonly kind: 'incomplete';
    readonly vitals: Readonly<Partial<VitalSigns>>;
    readonly missing_fields: readonly VitalField[];
}

export type Reading = CompleteReading | IncompleteReading;

export type RuleViolationCode =
    | 'OUT_OF_RANGE_HR'
    | 'OUT_OF_RANGE_TEMP'
    | 'LOW_BATTERY'
    | 'WEAK_SIGNAL';

export type AnomalyType = RuleViolationCode | 'ML_ANOMALY' | 'MISSING_FIELDS';

export type VerdictSource = 'RULE' | 'ML' | 'NONE';

export type StatisticalVerdict = 'NORMAL' | 'ANOMALOUS' | 'NO_OPINION';

export interface RuleViolation {
    code: RuleViolationCode;
    message: string;
}

export interface Verdict {
    is_anomaly: boolean;
    anomaly_type: AnomalyType | null;
    source: VerdictSource;
    /** Every rule that fired, in evaluation order. */
    violations: RuleViolation[];
    statistical: StatisticalVerdict | 'SKIPPED';
}

export interface ReferenceRange {
    field: VitalField;
    code: RuleViolationCode;
    label: string;
    min?: number;
    max?: number;
}
