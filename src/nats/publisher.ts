import type { JetStreamClient } from 'nats';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import type { AlertNotifier } from '../ingest/coordinator.js';
import type { Reading, VitalSigns } from '../rules/types.js';
import type { AlertRecord } from '../store/types.js';

export interface AlertEvent {
    event_name: 'telemetry.alert.raised';
    event_id: string;
    timestamp: string;
    payload: {
        alert_id: number;
        reading_id: number;
        device_id: string;
        alert_type: string;
        severity: string;
        message: string;
        observed_at: string;
        vitals: Partial<VitalSigns>;
    };
}

/**
 * The part of NatsClient the publisher needs.
 */
export interface JetStreamSource {
    getConnection(): { jetstream(): Pick<JetStreamClient, 'publish'> };
}

export interface AlertPublisherConfig {
    subject: string;
    streamName: string;
}

export class AlertPublisher implements AlertNotifier {
    constructor(
        private natsClient: JetStreamSource,
        private validator: SchemaValidator,
        private config: AlertPublisherConfig,
    ) { }

    async publishAlert(alert: AlertRecord, reading: Reading): Promise<boolean> {
        const alertEvent: AlertEvent = {
            event_name: 'telemetry.alert.raised',
            event_id: uuidv4(),
            timestamp: new Date().toISOString(),
            payload: {
                alert_id: alert.id,
                reading_id: alert.reading_id ?? 0,
                device_id: alert.device_id,
                alert_type: alert.alert_type,
                severity: alert.severity,
                message: alert.message,
                observed_at: reading.observed_at,
                vitals: { ...reading.vitals },
            },
        };

        // Validate before publishing
        const validationResult = this.validator.validateAlertRaised(alertEvent);
        if (!validationResult.valid) {
            logger.error(
                { errors: validationResult.errors, alert: alertEvent },
                'Alert validation failed',
            );
            return false;
        }

        try {
            const js = this.natsClient.getConnection().jetstream();

            await js.publish(
                this.config.subject,
                JSON.stringify(alertEvent),
                { expect: { streamName: this.config.streamName } },
            );

            logger.info(
                {
                    event_id: alertEvent.event_id,
                    alert_id: alert.id,
                    device_id: alert.device_id,
                    severity: alert.severity,
                },
                'Alert published successfully',
            );

            return true;
        } catch (err) {
            logger.error(
                { error: err, alert: alertEvent },
                'Failed to publish alert to NATS',
            );
            return false;
        }
    }
}
