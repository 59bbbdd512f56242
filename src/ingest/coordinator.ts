import { logger } from '../config/logger.js';
import type { Metrics } from '../metrics/counter.js';
import type { ClassificationEngine } from '../rules/engine.js';
import type { Reading, Verdict } from '../rules/types.js';
import type { AlertRecord, CommitResult, TelemetryStore } from '../store/types.js';
import type { ReadingValidator, RejectionReason } from '../telemetry/reading-validator.js';

export type Transport = 'nats' | 'http';

export interface IngestOptions {
    transport: Transport;
    /** Checked up to the start of the commit; a commit in progress is never cancelled. */
    signal?: AbortSignal;
}

export type IngestOutcome =
    | {
        status: 'accepted';
        recordId: number;
        deviceId: string;
        verdict: Verdict;
        alertId: number | null;
    }
    | {
        status: 'rejected';
        reason: RejectionReason;
        detail: string;
    };

export interface AlertNotifier {
    publishAlert(alert: AlertRecord, reading: Reading): Promise<boolean>;
}

export class IngestionCoordinator {
    constructor(
        private validator: ReadingValidator,
        private engine: ClassificationEngine,
        private store: TelemetryStore,
        private metrics: Metrics,
        private notifier?: AlertNotifier,
    ) { }

    /**
     * Validate, classify and durably record one reading. Bad data comes back
     * as a rejected outcome; only a storage failure throws.
     */
    async ingest(raw: unknown, arrivalTime: Date, options: IngestOptions): Promise<IngestOutcome> {
        this.metrics.incrementReceived();

        if (options.signal?.aborted) {
            return this.aborted(options.transport, 'before validation');
        }

        const parsed = this.validator.parse(raw, arrivalTime);
        if (!parsed.ok) {
            this.metrics.incrementRejectedInvalid();
            logger.warn(
                { transport: options.transport, reason: parsed.reason, detail: parsed.detail },
                'Reading rejected',
            );
            return { status: 'rejected', reason: parsed.reason, detail: parsed.detail };
        }

        const { reading } = parsed;
        const verdict = await this.engine.classify(reading);
        if (verdict.statistical === 'NO_OPINION') {
            this.metrics.incrementMlNoOpinion();
        }

        if (options.signal?.aborted) {
            return this.aborted(options.transport, 'before commit', reading.device_id);
        }

        let result: CommitResult;
        try {
            result = await this.store.commit(reading, verdict);
        } catch (err) {
            this.metrics.incrementPersistFailed();
            logger.error(
                {
                    transport: options.transport,
                    device_id: reading.device_id,
                    observed_at: reading.observed_at,
                    payload: reading.raw_payload,
                    error: err,
                },
                'Failed to persist reading',
            );
            throw err;
        }

        this.metrics.incrementAccepted();
        if (verdict.is_anomaly) {
            this.metrics.incrementAnomalies();
            if (verdict.anomaly_type === 'MISSING_FIELDS') {
                this.metrics.incrementMissingFields();
            }
            logger.info(
                {
                    device_id: reading.device_id,
                    record_id: result.recordId,
                    anomaly_type: verdict.anomaly_type,
                    source: verdict.source,
                    violations: verdict.violations.map((v) => v.code),
                },
                'Anomaly detected',
            );
        } else {
            logger.debug({ device_id: reading.device_id, record_id: result.recordId }, 'Reading accepted');
        }

        if (result.alert) {
            this.metrics.incrementAlertsRaised();
            await this.notify(result.alert, reading);
        }

        return {
            status: 'accepted',
            recordId: result.recordId,
            deviceId: reading.device_id,
            verdict,
            alertId: result.alert?.id ?? null,
        };
    }

    private aborted(transport: Transport, stage: string, deviceId?: string): IngestOutcome {
        this.metrics.incrementRejectedAborted();
        logger.info({ transport, stage, device_id: deviceId }, 'Ingestion aborted, nothing recorded');
        return { status: 'rejected', reason: 'ABORTED', detail: `Ingestion aborted ${stage}` };
    }

    /**
     * Best-effort announcement; the alert is already durable.
     */
    private async notify(alert: AlertRecord, reading: Reading): Promise<void> {
        if (!this.notifier) return;

        try {
            const published = await this.notifier.publishAlert(alert, reading);
            if (published) {
                this.metrics.incrementAlertsPublished();
            } else {
                this.metrics.incrementAlertsPublishFailed();
            }
        } catch (err) {
            this.metrics.incrementAlertsPublishFailed();
            logger.error({ alert_id: alert.id, error: err }, 'Alert notification failed');
        }
    }
}
