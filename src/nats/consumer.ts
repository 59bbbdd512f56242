import { AckPolicy, DeliverPolicy } from 'nats';
import type { Consumer, JetStreamClient, JsMsg, NatsConnection } from 'nats';
import { logger } from '../config/logger.js';
import type { IngestionCoordinator } from '../ingest/coordinator.js';
import type { Metrics } from '../metrics/counter.js';
import type { NatsClient } from './connection.js';

export interface TelemetryConsumerConfig {
    streamName: string;
    durableName: string;
    subject: string;
    nakDelayMs?: number;
}

export type InboundMessage = Pick<JsMsg, 'subject' | 'data' | 'json' | 'ack' | 'nak'>;

function describeError(err: unknown): { code: string; message: string } {
    if (err instanceof Error) {
        const code = 'code' in err && typeof err.code === 'string' ? err.code : '';
        return { code, message: err.message };
    }
    return { code: '', message: String(err) };
}

/**
 * Devices may publish the bare reading or wrap it in an event envelope.
 */
function unwrapEnvelope(data: unknown): unknown {
    if (
        typeof data === 'object' && data !== null &&
        'event_name' in data && typeof data.event_name === 'string' &&
        'payload' in data
    ) {
        return data.payload;
    }
    return data;
}

export class TelemetryConsumer {
    constructor(
        private natsClient: Pick<NatsClient, 'getConnection'>,
        private coordinator: Pick<IngestionCoordinator, 'ingest'>,
        private metrics: Metrics,
        private config: TelemetryConsumerConfig,
    ) { }

    async start(): Promise<void> {
        const nc = this.natsClient.getConnection();
        const js = nc.jetstream();

        logger.info(
            {
                stream: this.config.streamName,
                durable: this.config.durableName,
                subject: this.config.subject,
            },
            'Starting JetStream consumer',
        );

        const maxRetries = 30;
        const baseDelayMs = 2000;
        let lastError: unknown;

        for (let attempt = 1; attempt <= maxRetries; attempt++) {
            try {
                return await this.connectAndConsume(nc, js);
            } catch (err) {
                lastError = err;
                const { code, message } = describeError(err);
                const isRetryable =
                    code === '503' ||
                    message.includes('stream not found') ||
                    message.includes('unavailable') ||
                    message.includes('consumer not found');

                if (isRetryable && attempt < maxRetries) {
                    logger.warn(
                        { attempt, maxRetries, error: message, code },
                        'JetStream not ready, retrying...',
                    );
                    await new Promise(resolve => setTimeout(resolve, baseDelayMs));
                    continue;
                }

                throw err;
            }
        }

        throw lastError;
    }

    private async connectAndConsume(nc: NatsConnection, js: JetStreamClient): Promise<void> {
        let consumer: Consumer;

        try {
            // Try to get existing consumer
            consumer = await js.consumers.get(this.config.streamName, this.config.durableName);
            logger.info({ durable: this.config.durableName }, 'Using existing consumer');
        } catch (err) {
            const { code, message } = describeError(err);
            // Consumer doesn't exist, create it
            if (message.includes('consumer not found') || code === '404') {
                logger.info('Consumer not found, creating new consumer');

                const jsm = await nc.jetstreamManager();
                await jsm.consumers.add(this.config.streamName, {
                    durable_name: this.config.durableName,
                    filter_subject: this.config.subject,
                    ack_policy: AckPolicy.Explicit,
                    deliver_policy: DeliverPolicy.All,
                    max_deliver: 5,
                    ack_wait: 30_000_000_000, // 30 seconds in nanoseconds
                });

                consumer = await js.consumers.get(this.config.streamName, this.config.durableName);
                logger.info({ durable: this.config.durableName }, 'Consumer created');
            } else {
                throw err;
            }
        }

        // Start consuming messages
        const messages = await consumer.consume({
            max_messages: 100,
        });

        for await (const msg of messages) {
            await this.handleMessage(msg);
        }
    }

    /**
     * Ack once the reading is recorded or deliberately dropped; nak when the
     * store failed so JetStream redelivers it.
     */
    async handleMessage(msg: InboundMessage): Promise<void> {
        let payload: unknown;

        try {
            payload = unwrapEnvelope(msg.json<unknown>());
        } catch (err) {
            logger.error(
                { error: err, subject: msg.subject, data: Buffer.from(msg.data).toString('utf-8') },
                'JSON parse error',
            );
            this.metrics.incrementDroppedMalformed();
            msg.ack(); // ACK to avoid poison message loop
            return;
        }

        try {
            const outcome = await this.coordinator.ingest(payload, new Date(), { transport: 'nats' });

            if (outcome.status === 'rejected') {
                logger.warn(
                    { subject: msg.subject, reason: outcome.reason, detail: outcome.detail },
                    'Reading dropped',
                );
            }

            msg.ack();
        } catch (err) {
            const delay = this.config.nakDelayMs ?? 2000;
            msg.nak(delay);

            logger.error(
                { error: err, subject: msg.subject, payload, nakDelayMs: delay },
                'Reading not persisted, message NAKed for redelivery',
            );
        }
    }
}
