import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { request } from 'http';
import { AlertPolicy } from '../../../src/alerts/policy.js';
import { ApiServer } from '../../../src/api/server.js';
import type { ApiDependencies } from '../../../src/api/server.js';
import { IngestionCoordinator } from '../../../src/ingest/coordinator.js';
import { Metrics } from '../../../src/metrics/counter.js';
import { ClassificationEngine } from '../../../src/rules/engine.js';
import { StorageUnavailableError } from '../../../src/store/errors.js';
import { SqliteStore } from '../../../src/store/sqlite-store.js';
import { ReadingValidator } from '../../../src/telemetry/reading-validator.js';
import type { StatisticalVerdict } from '../../../src/rules/types.js';
import { StubClassifier, loadedValidator, sleep } from '../../helpers/fixtures.js';

const NORMAL_PAYLOAD = {
    device_id: 'wearable-7',
    heart_rate: 72,
    body_temp: 36.6,
    signal_strength: -55,
    battery_level: 90,
};

describe('ApiServer', () => {
    let store: SqliteStore;
    let metrics: Metrics;
    let server: ApiServer;

    async function startServer(
        overrides: Partial<ApiDependencies> = {},
        classifier = new StubClassifier(() => 'NORMAL'),
    ): Promise<void> {
        const coordinator = new IngestionCoordinator(
            new ReadingValidator(loadedValidator()),
            new ClassificationEngine(classifier, 1000),
            store,
            metrics,
        );
        server = new ApiServer(
            { port: 0, bodyLimitBytes: 1024 },
            {
                coordinator,
                store,
                metrics,
                natsClient: { isConnected: () => true },
                classifier,
                ...overrides,
            },
        );
        await server.start();
    }

    function url(path: string): string {
        return `http://127.0.0.1:${server.port()}${path}`;
    }

    function postJson(path: string, body: unknown): Promise<Response> {
        return fetch(url(path), {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: typeof body === 'string' ? body : JSON.stringify(body),
        });
    }

    beforeEach(async () => {
        store = new SqliteStore({
            filePath: ':memory:',
            inactiveAfterMs: 3_600_000,
            alertPolicy: new AlertPolicy('WARNING'),
        });
        metrics = new Metrics();
        await startServer();
    });

    afterEach(async () => {
        await server.stop();
        await store.close();
    });

    describe('POST /api/telemetry', () => {
        it('should accept a reading', async () => {
            const res = await postJson('/api/telemetry', NORMAL_PAYLOAD);

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({
                status: 'accepted',
                record_id: 1,
                device_id: 'wearable-7',
                is_anomaly: false,
                anomaly_type: null,
                source: 'NONE',
                alert_id: null,
            });
        });

        it('should report a rule anomaly and its alert', async () => {
            const res = await postJson('/api/telemetry', { ...NORMAL_PAYLOAD, heart_rate: 150 });

            expect(await res.json()).toMatchObject({
                is_anomaly: true,
                anomaly_type: 'OUT_OF_RANGE_HR',
                source: 'RULE',
                alert_id: 1,
            });
        });

        it('should reject a mistyped field', async () => {
            const res = await postJson('/api/telemetry', { ...NORMAL_PAYLOAD, heart_rate: 'fast' });

            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({ status: 'rejected', reason: 'INVALID_FIELD_TYPE' });
        });

        it('should reject malformed JSON', async () => {
            const res = await postJson('/api/telemetry', '{"device_id": ');

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({
                status: 'rejected',
                reason: 'MALFORMED_JSON',
                detail: 'Request body is not valid JSON',
            });
            expect(metrics.getCounters().received).toBe(0);
        });

        it('should refuse an oversized body', async () => {
            const res = await postJson('/api/telemetry', { ...NORMAL_PAYLOAD, note: 'x'.repeat(2000) });

            expect(res.status).toBe(413);
            expect(await res.json()).toEqual({ error: 'Request body exceeds 1024 bytes' });
        });

        it('should answer 500 when storage is unavailable', async () => {
            await server.stop();
            await startServer({
                coordinator: {
                    ingest: async () => {
                        throw new StorageUnavailableError('SQLite commit failed: disk I/O error');
                    },
                },
            });

            const res = await postJson('/api/telemetry', NORMAL_PAYLOAD);

            expect(res.status).toBe(500);
            expect(await res.json()).toEqual({ status: 'error', error: 'Storage unavailable' });
        });

        it('should record nothing when the client hangs up before the commit', async () => {
            let release: (verdict: StatisticalVerdict) => void = () => undefined;
            const pending = new StubClassifier(() => new Promise<StatisticalVerdict>((resolve) => {
                release = resolve;
            }));
            await server.stop();
            await startServer({}, pending);

            const req = request(url('/api/telemetry'), { method: 'POST', headers: { 'Content-Type': 'application/json' } });
            // the hang-up surfaces client-side as ECONNRESET
            req.on('error', () => undefined);
            req.end(JSON.stringify(NORMAL_PAYLOAD));

            await vi.waitFor(() => expect(pending.calls).toHaveLength(1));
            req.destroy();
            // let the server see the closed socket before classification finishes
            await sleep(50);
            release('NORMAL');

            await vi.waitFor(() => expect(metrics.getCounters().rejected_aborted).toBe(1));
            expect(await store.listReadings()).toEqual([]);
            expect(await store.countDevices()).toBe(0);
            expect(metrics.getCounters()).toMatchObject({ received: 1, accepted: 0 });
        });
    });

    describe('Dashboard queries', () => {
        beforeEach(async () => {
            await postJson('/api/telemetry', NORMAL_PAYLOAD);
            await postJson('/api/telemetry', { ...NORMAL_PAYLOAD, battery_level: 4 });
        });

        it('should list devices', async () => {
            const res = await fetch(url('/api/devices'));

            expect(await res.json()).toMatchObject([{ device_id: 'wearable-7', total_readings: 2, status: 'ACTIVE' }]);
        });

        it('should return device stats or 404', async () => {
            const stats = await fetch(url('/api/devices/wearable-7'));
            const missing = await fetch(url('/api/devices/nobody'));

            expect(await stats.json()).toMatchObject({ total_readings: 2, anomalies: 1, anomaly_rate: 50 });
            expect(missing.status).toBe(404);
            expect(await missing.json()).toEqual({ error: 'Device not found' });
        });

        it('should answer 400 for a device id with broken percent-encoding', async () => {
            const res = await fetch(url('/api/devices/%E0%A4%A'));

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({ error: 'Invalid device id' });
        });

        it('should list anomalies and readings', async () => {
            const anomalies = await fetch(url('/api/anomalies?device_id=wearable-7&hours=24'));
            const readings = await fetch(url('/api/readings?limit=5'));

            expect(await anomalies.json()).toMatchObject([{ id: 2, anomaly_type: 'LOW_BATTERY' }]);
            expect(await readings.json()).toMatchObject([{ id: 2 }, { id: 1 }]);
        });

        it('should reject a bad query parameter', async () => {
            const res = await fetch(url('/api/readings?hours=abc'));

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({ error: 'Invalid query parameter hours: abc' });
        });

        it('should fetch a single reading', async () => {
            const found = await fetch(url('/api/readings/1'));
            const missing = await fetch(url('/api/readings/99'));

            expect(await found.json()).toMatchObject({ id: 1, raw_data: NORMAL_PAYLOAD });
            expect(missing.status).toBe(404);
        });

        it('should list and resolve alerts', async () => {
            const open = await fetch(url('/api/alerts'));
            expect(await open.json()).toMatchObject([{ id: 1, alert_type: 'LOW_BATTERY', severity: 'WARNING' }]);

            const resolved = await fetch(url('/api/alerts/1/resolve'), { method: 'POST' });
            expect(await resolved.json()).toMatchObject({ id: 1, is_resolved: true });

            const after = await fetch(url('/api/alerts'));
            expect(await after.json()).toEqual([]);
        });

        it('should expose counters', async () => {
            const res = await fetch(url('/metrics'));

            expect(await res.json()).toMatchObject({ received: 2, accepted: 2, anomalies: 1, alerts_raised: 1, tracked_devices: 1 });
        });
    });

    describe('GET /health', () => {
        it('should report ok when every dependency is up', async () => {
            const res = await fetch(url('/health'));

            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject({
                status: 'ok',
                nats: { connected: true },
                store: { reachable: true },
                model: { loaded: true, name: 'stub' },
            });
        });

        it('should report degraded when NATS is down', async () => {
            await server.stop();
            await startServer({ natsClient: { isConnected: () => false } });

            const res = await fetch(url('/health'));

            expect(res.status).toBe(503);
            expect(await res.json()).toMatchObject({ status: 'degraded', nats: { connected: false } });
        });
    });

    it('should answer 404 for an unknown route', async () => {
        const res = await fetch(url('/api/unknown'));
        expect(res.status).toBe(404);
    });

    it('should answer CORS preflight', async () => {
        const res = await fetch(url('/api/telemetry'), { method: 'OPTIONS' });

        expect(res.status).toBe(204);
        expect(res.headers.get('access-control-allow-origin')).toBe('*');
    });
});
