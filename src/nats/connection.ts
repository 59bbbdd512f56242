import { connect, Events } from 'nats';
import type { ConnectionOptions, NatsConnection } from 'nats';
import { logger } from '../config/logger.js';

const RECONNECT_DEFAULTS: Partial<ConnectionOptions> = {
    maxReconnectAttempts: -1,
    reconnectTimeWait: 2000,
};

export class NatsClient {
    private nc: NatsConnection | null = null;
    private connecting = false;

    constructor(private options: ConnectionOptions) { }

    async connect(): Promise<void> {
        if (this.nc || this.connecting) {
            return;
        }

        this.connecting = true;

        try {
            logger.info({ servers: this.options.servers, name: this.options.name }, 'Connecting to NATS');

            const nc = await connect({ ...RECONNECT_DEFAULTS, ...this.options });
            this.nc = nc;

            logger.info({ server: nc.getServer() }, 'Connected to NATS successfully');

            this.watchStatus(nc).catch((err) => {
                logger.warn({ error: err }, 'NATS status watcher stopped');
            });
        } catch (err) {
            logger.error({ error: err }, 'Failed to connect to NATS');
            throw err;
        } finally {
            this.connecting = false;
        }
    }

    private async watchStatus(nc: NatsConnection): Promise<void> {
        for await (const status of nc.status()) {
            if (status.type === Events.Disconnect || status.type === Events.Error) {
                logger.warn({ type: status.type, data: status.data }, 'NATS connection degraded');
            } else {
                logger.info({ type: status.type, data: status.data }, 'NATS status update');
            }
        }
    }

    /**
     * Create the telemetry stream when the server does not have it yet.
     */
    async ensureStream(name: string, subjects: string[]): Promise<void> {
        const jsm = await this.getConnection().jetstreamManager();

        try {
            await jsm.streams.info(name);
            logger.info({ stream: name }, 'Using existing stream');
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            if (!message.includes('stream not found')) {
                throw err;
            }

            await jsm.streams.add({ name, subjects });
            logger.info({ stream: name, subjects }, 'Stream created');
        }
    }

    getConnection(): NatsConnection {
        if (!this.nc) {
            throw new Error('NATS connection not established');
        }
        return this.nc;
    }

    isConnected(): boolean {
        return this.nc !== null && !this.nc.isClosed();
    }

    async close(): Promise<void> {
        if (this.nc) {
            logger.info('Closing NATS connection');
            await this.nc.drain();
            this.nc = null;
        }
    }
}
