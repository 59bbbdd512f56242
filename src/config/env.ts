import { config } from 'dotenv';
import type { Severity } from '../alerts/policy.js';

// Load .env file if present
config();

export interface AppConfig {
    nats: {
        url: string;
        stream: string;
        durable: string;
        telemetrySubject: string;
        alertSubject: string;
        connectRetryMs: number;
    };
    contracts: {
        path: string;
    };
    database: {
        path: string;
    };
    model: {
        path: string;
        timeoutMs: number;
    };
    registry: {
        inactiveAfterMs: number;
    };
    alerts: {
        minSeverity: Severity;
    };
    http: {
        port: number;
        bodyLimitBytes: number;
    };
    log: {
        level: string;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

function getEnvSeverity(key: string, defaultValue: Severity): Severity {
    const value = getEnv(key, defaultValue).toUpperCase();
    if (value === 'INFO' || value === 'WARNING' || value === 'CRITICAL') {
        return value;
    }
    throw new Error(`Invalid severity for environment variable ${key}: ${value}`);
}

export function loadConfig(): AppConfig {
    return {
        nats: {
            url: getEnv('NATS_URL', 'nats://localhost:4222'),
            stream: getEnv('NATS_STREAM', 'telemetry'),
            durable: getEnv('NATS_DURABLE', 'vitals-ingest'),
            telemetrySubject: getEnv('TELEMETRY_SUBJECT', 'telemetry.reading'),
            alertSubject: getEnv('ALERT_SUBJECT', 'telemetry.alert.raised'),
            connectRetryMs: getEnvNumber('NATS_CONNECT_RETRY_MS', 5000),
        },
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        database: {
            path: getEnv('DATABASE_PATH', './data/anomalies.db'),
        },
        model: {
            path: getEnv('MODEL_PATH', './models/isolation-forest.json'),
            timeoutMs: getEnvNumber('ML_TIMEOUT_MS', 250),
        },
        registry: {
            inactiveAfterMs: getEnvNumber('DEVICE_INACTIVE_AFTER_MS', 3600000), // 1 hour default
        },
        alerts: {
            minSeverity: getEnvSeverity('ALERT_MIN_SEVERITY', 'WARNING'),
        },
        http: {
            port: getEnvNumber('HTTP_PORT', 5000),
            bodyLimitBytes: getEnvNumber('HTTP_BODY_LIMIT_BYTES', 64 * 1024),
        },
        log: {
            level: getEnv('LOG_LEVEL', 'info'),
        },
    };
}
