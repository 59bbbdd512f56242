import type { ReferenceRange, RuleViolation, RuleViolationCode, VitalSigns } from './types.js';

/**
 * Medical reference ranges, bounds inclusive. Table order doubles as the
 * reporting precedence when several rules fire on one reading.
 */
export const REFERENCE_RANGES: readonly ReferenceRange[] = [
    { field: 'heart_rate', code: 'OUT_OF_RANGE_HR', label: 'Heart rate', min: 60, max: 100 },
    { field: 'body_temp', code: 'OUT_OF_RANGE_TEMP', label: 'Body temperature', min: 36.0, max: 37.5 },
    { field: 'battery_level', code: 'LOW_BATTERY', label: 'Battery level', min: 10 },
    { field: 'signal_strength', code: 'WEAK_SIGNAL', label: 'Signal strength', min: -100 },
];

export const RULE_PRECEDENCE: readonly RuleViolationCode[] = REFERENCE_RANGES.map((range) => range.code);

function describeViolation(range: ReferenceRange, value: number): string {
    if (range.min !== undefined && range.max !== undefined) {
        return `${range.label} ${value} outside normal range [${range.min}, ${range.max}]`;
    }
    if (range.min !== undefined) {
        return `${range.label} ${value} below minimum ${range.min}`;
    }
    return `${range.label} ${value} above maximum ${range.max}`;
}

/**
 * Check a complete set of vitals against every reference range and return
 * all violations, in table order.
 */
export function checkReferenceRanges(vitals: VitalSigns): RuleViolation[] {
    const violations: RuleViolation[] = [];

    for (const range of REFERENCE_RANGES) {
        const value = vitals[range.field];
        const tooLow = range.min !== undefined && value < range.min;
        const tooHigh = range.max !== undefined && value > range.max;

        if (tooLow || tooHigh) {
            violations.push({ code: range.code, message: describeViolation(range, value) });
        }
    }

    return violations;
}

/**
 * Pick the reported code from a violation set. Returns null for an empty set.
 */
export function highestPrecedence(violations: readonly RuleViolation[]): RuleViolation | null {
    let best: RuleViolation | null = null;
    let bestRank = Number.POSITIVE_INFINITY;

    for (const violation of violations) {
        const rank = RULE_PRECEDENCE.indexOf(violation.code);
        if (rank < bestRank) {
            best = violation;
            bestRank = rank;
        }
    }

    return best;
}
