import { createServer } from 'http';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import { logger } from '../config/logger.js';
import type { IngestionCoordinator, IngestOutcome } from '../ingest/coordinator.js';
import type { Metrics } from '../metrics/counter.js';
import type { StatisticalClassifier } from '../ml/statistical-classifier.js';
import { StorageUnavailableError } from '../store/errors.js';
import type { TelemetryStore } from '../store/types.js';
import type { NatsClient } from '../nats/connection.js';

export interface ApiServerConfig {
    port: number;
    bodyLimitBytes: number;
}

export interface ApiDependencies {
    coordinator: Pick<IngestionCoordinator, 'ingest'>;
    store: TelemetryStore;
    metrics: Metrics;
    natsClient: Pick<NatsClient, 'isConnected'>;
    classifier: Pick<StatisticalClassifier, 'available' | 'name'>;
}

class HttpError extends Error {
    constructor(readonly statusCode: number, message: string) {
        super(message);
    }
}

const DEVICE_PATH = /^\/api\/devices\/([^/]+)$/;
const READING_PATH = /^\/api\/readings\/(\d+)$/;
const RESOLVE_ALERT_PATH = /^\/api\/alerts\/(\d+)\/resolve$/;

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
}

function decodeSegment(segment: string, label: string): string {
    try {
        return decodeURIComponent(segment);
    } catch (err) {
        if (err instanceof URIError) {
            throw new HttpError(400, `Invalid ${label}`);
        }
        throw err;
    }
}

function numberParam(url: URL, name: string): number | undefined {
    const value = url.searchParams.get(name);
    if (value === null || value === '') return undefined;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
        throw new HttpError(400, `Invalid query parameter ${name}: ${value}`);
    }
    return parsed;
}

export class ApiServer {
    private server: Server;

    constructor(
        private config: ApiServerConfig,
        private deps: ApiDependencies,
    ) {
        this.server = createServer((req, res) => {
            this.handleRequest(req, res).catch((err) => {
                logger.error({ error: err, method: req.method, url: req.url }, 'Unhandled request error');
                if (!res.headersSent) {
                    sendJson(res, 500, { error: 'Internal server error' });
                } else {
                    res.end();
                }
            });
        });
    }

    private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const method = req.method ?? 'GET';
        const url = new URL(req.url ?? '/', 'http://localhost');
        const path = url.pathname;

        // CORS headers
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

        if (method === 'OPTIONS') {
            res.writeHead(204);
            res.end();
            return;
        }

        try {
            await this.route(method, path, url, req, res);
        } catch (err) {
            if (err instanceof HttpError) {
                sendJson(res, err.statusCode, { error: err.message });
                return;
            }
            if (err instanceof StorageUnavailableError) {
                sendJson(res, 500, { status: 'error', error: 'Storage unavailable' });
                return;
            }
            throw err;
        }
    }

    private async route(method: string, path: string, url: URL, req: IncomingMessage, res: ServerResponse): Promise<void> {
        if (method === 'GET' && path === '/health') {
            return this.handleHealth(res);
        }
        if (method === 'GET' && path === '/metrics') {
            return this.handleMetrics(res);
        }
        if (method === 'POST' && path === '/api/telemetry') {
            return this.handleTelemetry(req, res);
        }
        if (method === 'GET' && path === '/api/devices') {
            return sendJson(res, 200, await this.deps.store.listDevices());
        }
        if (method === 'GET' && (path === '/api/anomalies' || path === '/api/readings')) {
            const readings = await this.deps.store.listReadings({
                anomaliesOnly: path === '/api/anomalies',
                hours: numberParam(url, 'hours'),
                deviceId: url.searchParams.get('device_id') ?? undefined,
                limit: numberParam(url, 'limit'),
            });
            return sendJson(res, 200, readings);
        }
        if (method === 'GET' && path === '/api/alerts') {
            const alerts = await this.deps.store.listActiveAlerts({
                hours: numberParam(url, 'hours'),
                limit: numberParam(url, 'limit'),
            });
            return sendJson(res, 200, alerts);
        }

        const deviceMatch = DEVICE_PATH.exec(path);
        if (method === 'GET' && deviceMatch) {
            const stats = await this.deps.store.getDeviceStats(decodeSegment(deviceMatch[1], 'device id'));
            return stats ? sendJson(res, 200, stats) : sendJson(res, 404, { error: 'Device not found' });
        }

        const readingMatch = READING_PATH.exec(path);
        if (method === 'GET' && readingMatch) {
            const reading = await this.deps.store.getReading(Number(readingMatch[1]));
            return reading ? sendJson(res, 200, reading) : sendJson(res, 404, { error: 'Reading not found' });
        }

        const resolveMatch = RESOLVE_ALERT_PATH.exec(path);
        if (method === 'POST' && resolveMatch) {
            const alert = await this.deps.store.resolveAlert(Number(resolveMatch[1]));
            return alert ? sendJson(res, 200, alert) : sendJson(res, 404, { error: 'Alert not found' });
        }

        sendJson(res, 404, { error: 'Not found' });
    }

    private async handleTelemetry(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const arrivalTime = new Date();
        const raw = await this.readBody(req);

        let body: unknown;
        try {
            body = JSON.parse(raw);
        } catch (err) {
            logger.warn({ error: err, bytes: raw.length }, 'Malformed telemetry payload');
            sendJson(res, 400, { status: 'rejected', reason: 'MALFORMED_JSON', detail: 'Request body is not valid JSON' });
            return;
        }

        // a client that hangs up before commit leaves nothing behind
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableEnded) controller.abort();
        });

        const outcome = await this.deps.coordinator.ingest(body, arrivalTime, {
            transport: 'http',
            signal: controller.signal,
        });

        this.sendOutcome(res, outcome);
    }

    private sendOutcome(res: ServerResponse, outcome: IngestOutcome): void {
        if (outcome.status === 'accepted') {
            sendJson(res, 200, {
                status: 'accepted',
                record_id: outcome.recordId,
                device_id: outcome.deviceId,
                is_anomaly: outcome.verdict.is_anomaly,
                anomaly_type: outcome.verdict.anomaly_type,
                source: outcome.verdict.source,
                alert_id: outcome.alertId,
            });
            return;
        }

        const statusCode = outcome.reason === 'ABORTED' ? 499 : 400;
        sendJson(res, statusCode, { status: 'rejected', reason: outcome.reason, detail: outcome.detail });
    }

    private readBody(req: IncomingMessage): Promise<string> {
        const limit = this.config.bodyLimitBytes;

        return new Promise((resolve, reject) => {
            const chunks: Buffer[] = [];
            let size = 0;

            req.on('data', (chunk: Buffer) => {
                size += chunk.length;
                if (size <= limit) chunks.push(chunk);
            });
            req.on('end', () => {
                if (size > limit) {
                    reject(new HttpError(413, `Request body exceeds ${limit} bytes`));
                } else {
                    resolve(Buffer.concat(chunks).toString('utf-8'));
                }
            });
            req.on('error', reject);
        });
    }

    private async handleHealth(res: ServerResponse): Promise<void> {
        const isNatsConnected = this.deps.natsClient.isConnected();

        let isStoreReachable = true;
        try {
            await this.deps.store.ping();
        } catch (err) {
            isStoreReachable = false;
            logger.warn({ error: err }, 'Store ping failed');
        }

        const healthy = isNatsConnected && isStoreReachable;

        sendJson(res, healthy ? 200 : 503, {
            status: healthy ? 'ok' : 'degraded',
            nats: {
                connected: isNatsConnected,
            },
            store: {
                reachable: isStoreReachable,
            },
            model: {
                loaded: this.deps.classifier.available,
                name: this.deps.classifier.name,
            },
            timestamp: new Date().toISOString(),
        });
    }

    private async handleMetrics(res: ServerResponse): Promise<void> {
        const counters = this.deps.metrics.getCounters();
        const trackedDevices = await this.deps.store.countDevices();

        sendJson(res, 200, {
            ...counters,
            tracked_devices: trackedDevices,
            timestamp: new Date().toISOString(),
        });
    }

    /**
     * Bound port; differs from the configured one when listening on port 0.
     */
    port(): number {
        const address = this.server.address();
        return typeof address === 'object' && address !== null ? address.port : this.config.port;
    }

    async start(): Promise<void> {
        return new Promise((resolve) => {
            this.server.listen(this.config.port, () => {
                logger.info({ port: this.port() }, 'HTTP API server started');
                resolve();
            });
        });
    }

    async stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.close((err) => {
                if (err) {
                    reject(err);
                    return;
                }
                logger.info('HTTP API server stopped');
                resolve();
            });
            this.server.closeAllConnections();
        });
    }
}
