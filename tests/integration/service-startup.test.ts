import { describe, it, expect, afterEach, vi } from 'vitest';
import { join } from 'path';
import { TelemetryService } from '../../src/app.js';
import type { AppConfig } from '../../src/config/env.js';
import { CONTRACTS_PATH } from '../helpers/fixtures.js';

function configWithoutBroker(): AppConfig {
    return {
        nats: {
            // nothing listens on port 1
            url: 'nats://127.0.0.1:1',
            stream: 'telemetry',
            durable: 'vitals-ingest',
            telemetrySubject: 'telemetry.reading',
            alertSubject: 'telemetry.alert.raised',
            connectRetryMs: 20,
        },
        contracts: { path: CONTRACTS_PATH },
        database: { path: ':memory:' },
        model: { path: join(CONTRACTS_PATH, 'no-such-model.json'), timeoutMs: 100 },
        registry: { inactiveAfterMs: 3_600_000 },
        alerts: { minSeverity: 'WARNING' },
        http: { port: 0, bodyLimitBytes: 65536 },
        log: { level: 'silent' },
    };
}

describe('TelemetryService startup', () => {
    let service: TelemetryService | undefined;

    afterEach(async () => {
        await service?.stop();
        service = undefined;
    });

    it('should serve HTTP ingestion while NATS is unreachable', async () => {
        service = new TelemetryService(configWithoutBroker());
        const connect = vi.spyOn(service.natsClient, 'connect');

        await service.start();

        const res = await fetch(`http://127.0.0.1:${service.port()}/api/telemetry`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ device_id: 'bedside-2', heart_rate: 71, body_temp: 36.7, signal_strength: -64, battery_level: 58 }),
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ status: 'accepted', record_id: 1, device_id: 'bedside-2' });
        expect(await service.store.countDevices()).toBe(1);

        const health = await fetch(`http://127.0.0.1:${service.port()}/health`);
        expect(health.status).toBe(503);
        expect(await health.json()).toMatchObject({
            status: 'degraded',
            nats: { connected: false },
            store: { reachable: true },
        });

        // keeps trying in the background
        await vi.waitFor(() => expect(connect.mock.calls.length).toBeGreaterThanOrEqual(2), { timeout: 2000 });
        expect(service.natsClient.isConnected()).toBe(false);
    });

    it('should stop cleanly while still waiting for NATS', async () => {
        service = new TelemetryService(configWithoutBroker());
        await service.start();

        await expect(service.stop()).resolves.toBeUndefined();
        service = undefined;
    });
});
