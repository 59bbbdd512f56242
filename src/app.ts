import type { AppConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { AlertPolicy } from './alerts/policy.js';
import { loadStatisticalClassifier } from './ml/model-loader.js';
import { ClassificationEngine } from './rules/engine.js';
import { ReadingValidator } from './telemetry/reading-validator.js';
import { SqliteStore } from './store/sqlite-store.js';
import { IngestionCoordinator } from './ingest/coordinator.js';
import { NatsClient } from './nats/connection.js';
import { TelemetryConsumer } from './nats/consumer.js';
import { AlertPublisher } from './nats/publisher.js';
import { Metrics } from './metrics/counter.js';
import { ApiServer } from './api/server.js';

/**
 * The whole service. HTTP ingestion comes up first and keeps serving while
 * NATS is unreachable; the JetStream side attaches once a connection exists.
 */
export class TelemetryService {
    readonly store: SqliteStore;
    readonly metrics = new Metrics();
    readonly natsClient: NatsClient;
    private apiServer: ApiServer;
    private consumer: TelemetryConsumer;
    private messaging: Promise<void> = Promise.resolve();
    private stopping = false;
    private wakeRetry: (() => void) | null = null;

    constructor(private config: AppConfig) {
        const validator = new SchemaValidator(config.contracts.path);
        validator.loadSchemas();

        // Statistical model is optional; rules run regardless
        const classifier = loadStatisticalClassifier(config.model.path, validator);
        const engine = new ClassificationEngine(classifier, config.model.timeoutMs);

        this.store = new SqliteStore({
            filePath: config.database.path,
            inactiveAfterMs: config.registry.inactiveAfterMs,
            alertPolicy: new AlertPolicy(config.alerts.minSeverity),
        });

        this.natsClient = new NatsClient({
            servers: config.nats.url,
            name: 'vitals-ingest',
        });

        const alertPublisher = new AlertPublisher(this.natsClient, validator, {
            subject: config.nats.alertSubject,
            streamName: config.nats.stream,
        });

        const coordinator = new IngestionCoordinator(
            new ReadingValidator(validator),
            engine,
            this.store,
            this.metrics,
            alertPublisher,
        );

        this.consumer = new TelemetryConsumer(this.natsClient, coordinator, this.metrics, {
            streamName: config.nats.stream,
            durableName: config.nats.durable,
            subject: config.nats.telemetrySubject,
        });

        this.apiServer = new ApiServer(
            { port: config.http.port, bodyLimitBytes: config.http.bodyLimitBytes },
            { coordinator, store: this.store, metrics: this.metrics, natsClient: this.natsClient, classifier },
        );
    }

    async start(): Promise<void> {
        await this.apiServer.start();

        this.messaging = this.attachMessaging().catch((err) => {
            logger.error({ error: err }, 'JetStream setup failed, HTTP ingestion only');
        });
    }

    port(): number {
        return this.apiServer.port();
    }

    private async attachMessaging(): Promise<void> {
        for (let attempt = 1; !this.stopping; attempt++) {
            try {
                await this.natsClient.connect();
                break;
            } catch (err) {
                logger.warn(
                    { attempt, retryInMs: this.config.nats.connectRetryMs, error: err },
                    'NATS unavailable, retrying in background',
                );
                await this.pause(this.config.nats.connectRetryMs);
            }
        }

        if (this.stopping) return;

        await this.natsClient.ensureStream(this.config.nats.stream, [
            this.config.nats.telemetrySubject,
            this.config.nats.alertSubject,
        ]);

        this.consumer.start().catch((err) => {
            logger.error({ error: err }, 'Consumer failed');
        });
    }

    private pause(ms: number): Promise<void> {
        return new Promise((resolve) => {
            const timer = setTimeout(() => {
                this.wakeRetry = null;
                resolve();
            }, ms);
            this.wakeRetry = () => {
                clearTimeout(timer);
                this.wakeRetry = null;
                resolve();
            };
        });
    }

    async stop(): Promise<void> {
        this.stopping = true;
        this.wakeRetry?.();
        await this.messaging;

        await this.apiServer.stop();
        await this.natsClient.close();
        await this.store.close();
    }
}
