import { highestPrecedence } from '../rules/reference-ranges.js';
import type { AnomalyType, Reading, Verdict } from '../rules/types.js';

export type Severity = 'INFO' | 'WARNING' | 'CRITICAL';

const SEVERITY_RANK: Record<Severity, number> = {
    INFO: 0,
    WARNING: 1,
    CRITICAL: 2,
};

const ANOMALY_SEVERITY: Record<AnomalyType, Severity> = {
    OUT_OF_RANGE_HR: 'CRITICAL',
    OUT_OF_RANGE_TEMP: 'CRITICAL',
    ML_ANOMALY: 'CRITICAL',
    WEAK_SIGNAL: 'WARNING',
    LOW_BATTERY: 'WARNING',
    MISSING_FIELDS: 'INFO',
};

export function severityFor(anomalyType: AnomalyType): Severity {
    return ANOMALY_SEVERITY[anomalyType];
}

export interface AlertDraft {
    device_id: string;
    alert_type: AnomalyType;
    severity: Severity;
    message: string;
}

export class AlertPolicy {
    constructor(private minSeverity: Severity) { }

    /**
     * Decide whether a verdict escalates to an alert.
     */
    evaluate(reading: Reading, verdict: Verdict): AlertDraft | null {
        if (!verdict.is_anomaly || verdict.anomaly_type === null) {
            return null;
        }

        const severity = severityFor(verdict.anomaly_type);
        if (SEVERITY_RANK[severity] < SEVERITY_RANK[this.minSeverity]) {
            return null;
        }

        return {
            device_id: reading.device_id,
            alert_type: verdict.anomaly_type,
            severity,
            message: this.describe(reading, verdict),
        };
    }

    private describe(reading: Reading, verdict: Verdict): string {
        if (reading.kind === 'incomplete') {
            return `Reading missing ${reading.missing_fields.join(', ')}`;
        }

        const violation = highestPrecedence(verdict.violations);
        if (verdict.source === 'RULE' && violation) {
            return violation.message;
        }

        return 'Statistical model flagged reading as anomalous';
    }
}
