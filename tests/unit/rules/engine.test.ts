import { describe, it, expect } from 'vitest';
import { ClassificationEngine } from '../../../src/rules/engine.js';
import { UnavailableClassifier } from '../../../src/ml/statistical-classifier.js';
import type { StatisticalVerdict } from '../../../src/rules/types.js';
import { StubClassifier, completeReading, incompleteReading } from '../../helpers/fixtures.js';

describe('ClassificationEngine', () => {
    describe('Complete readings', () => {
        it('should mark a reading normal when rules pass and the model agrees', async () => {
            const classifier = new StubClassifier(() => 'NORMAL');
            const engine = new ClassificationEngine(classifier, 100);

            const verdict = await engine.classify(completeReading());

            expect(verdict).toEqual({
                is_anomaly: false,
                anomaly_type: null,
                source: 'NONE',
                violations: [],
                statistical: 'NORMAL',
            });
            expect(classifier.calls).toEqual([[75, 36.9, -60, 80]]);
        });

        it('should report the highest-precedence rule when several fire', async () => {
            const engine = new ClassificationEngine(new StubClassifier(() => 'NORMAL'), 100);

            const verdict = await engine.classify(completeReading({ heart_rate: 150, battery_level: 5 }));

            expect(verdict.is_anomaly).toBe(true);
            expect(verdict.anomaly_type).toBe('OUT_OF_RANGE_HR');
            expect(verdict.source).toBe('RULE');
            expect(verdict.violations.map((v) => v.code)).toEqual(['OUT_OF_RANGE_HR', 'LOW_BATTERY']);
        });

        it('should let a rule outrank an anomalous model verdict', async () => {
            const engine = new ClassificationEngine(new StubClassifier(() => 'ANOMALOUS'), 100);

            const verdict = await engine.classify(completeReading({ battery_level: 5 }));

            expect(verdict.anomaly_type).toBe('LOW_BATTERY');
            expect(verdict.source).toBe('RULE');
            expect(verdict.statistical).toBe('ANOMALOUS');
        });

        it('should flag a model-only anomaly', async () => {
            const engine = new ClassificationEngine(new StubClassifier(() => 'ANOMALOUS'), 100);

            const verdict = await engine.classify(completeReading());

            expect(verdict).toMatchObject({ is_anomaly: true, anomaly_type: 'ML_ANOMALY', source: 'ML' });
        });
    });

    describe('Incomplete readings', () => {
        it('should classify as MISSING_FIELDS without consulting the model', async () => {
            const classifier = new StubClassifier(() => 'ANOMALOUS');
            const engine = new ClassificationEngine(classifier, 100);

            const verdict = await engine.classify(
                incompleteReading({ heart_rate: 150 }, ['body_temp', 'signal_strength', 'battery_level']),
            );

            expect(verdict).toEqual({
                is_anomaly: true,
                anomaly_type: 'MISSING_FIELDS',
                source: 'NONE',
                violations: [],
                statistical: 'SKIPPED',
            });
            expect(classifier.calls).toHaveLength(0);
        });
    });

    describe('Statistical failures', () => {
        it('should treat a throwing model as no opinion', async () => {
            const engine = new ClassificationEngine(
                new StubClassifier(() => {
                    throw new Error('model exploded');
                }),
                100,
            );

            const verdict = await engine.classify(completeReading());

            expect(verdict.is_anomaly).toBe(false);
            expect(verdict.statistical).toBe('NO_OPINION');
        });

        it('should still report rules when the model throws', async () => {
            const engine = new ClassificationEngine(
                new StubClassifier(() => Promise.reject(new Error('model exploded'))),
                100,
            );

            const verdict = await engine.classify(completeReading({ body_temp: 39.2 }));

            expect(verdict.anomaly_type).toBe('OUT_OF_RANGE_TEMP');
            expect(verdict.statistical).toBe('NO_OPINION');
        });

        it('should give up on a model that never answers', async () => {
            const engine = new ClassificationEngine(new StubClassifier(() => new Promise<StatisticalVerdict>(() => undefined)), 20);

            const verdict = await engine.classify(completeReading());

            expect(verdict.is_anomaly).toBe(false);
            expect(verdict.statistical).toBe('NO_OPINION');
        });

        it('should not call an unavailable model', async () => {
            const engine = new ClassificationEngine(new UnavailableClassifier('no artifact'), 100);

            const verdict = await engine.classify(completeReading());

            expect(verdict.statistical).toBe('NO_OPINION');
            expect(verdict.is_anomaly).toBe(false);
        });
    });
});
