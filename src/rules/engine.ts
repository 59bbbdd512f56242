import { logger } from '../config/logger.js';
import { toFeatureVector } from '../ml/statistical-classifier.js';
import type { StatisticalClassifier } from '../ml/statistical-classifier.js';
import { checkReferenceRanges, highestPrecedence } from './reference-ranges.js';
import type { CompleteReading, Reading, StatisticalVerdict, Verdict } from './types.js';

const INFERENCE_TIMED_OUT = Symbol('inference-timed-out');

export class ClassificationEngine {
    constructor(
        private classifier: StatisticalClassifier,
        private inferenceTimeoutMs: number,
    ) { }

    /**
     * Classify one reading. Rule violations always outrank the statistical
     * verdict; an incomplete reading is never evaluated further.
     */
    async classify(reading: Reading): Promise<Verdict> {
        if (reading.kind === 'incomplete') {
            return {
                is_anomaly: true,
                anomaly_type: 'MISSING_FIELDS',
                source: 'NONE',
                violations: [],
                statistical: 'SKIPPED',
            };
        }

        const violations = checkReferenceRanges(reading.vitals);
        const statistical = await this.runStatistical(reading);
        const reported = highestPrecedence(violations);

        if (reported) {
            return {
                is_anomaly: true,
                anomaly_type: reported.code,
                source: 'RULE',
                violations,
                statistical,
            };
        }

        if (statistical === 'ANOMALOUS') {
            return {
                is_anomaly: true,
                anomaly_type: 'ML_ANOMALY',
                source: 'ML',
                violations,
                statistical,
            };
        }

        return {
            is_anomaly: false,
            anomaly_type: null,
            source: 'NONE',
            violations,
            statistical,
        };
    }

    /**
     * Bounded model inference. Errors and timeouts degrade to NO_OPINION.
     */
    private async runStatistical(reading: CompleteReading): Promise<StatisticalVerdict> {
        if (!this.classifier.available) {
            return 'NO_OPINION';
        }

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<typeof INFERENCE_TIMED_OUT>((resolve) => {
            timer = setTimeout(() => resolve(INFERENCE_TIMED_OUT), this.inferenceTimeoutMs);
        });

        try {
            const result = await Promise.race([
                this.classifier.classify(toFeatureVector(reading.vitals)),
                timeout,
            ]);

            if (result === INFERENCE_TIMED_OUT) {
                logger.warn(
                    { device_id: reading.device_id, classifier: this.classifier.name, timeoutMs: this.inferenceTimeoutMs },
                    'Statistical classifier timed out, treating as no opinion',
                );
                return 'NO_OPINION';
            }

            return result;
        } catch (err) {
            logger.warn(
                { device_id: reading.device_id, classifier: this.classifier.name, error: err },
                'Statistical classifier failed, treating as no opinion',
            );
            return 'NO_OPINION';
        } finally {
            clearTimeout(timer);
        }
    }
}
