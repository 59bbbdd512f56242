import type { Severity } from '../alerts/policy.js';
import type { DeviceRecord, DeviceView } from '../registry/device-registry.js';
import type { Reading, Verdict } from '../rules/types.js';

export interface ReadingRecord {
    id: number;
    timestamp: string;
    device_id: string;
    heart_rate: number | null;
    body_temp: number | null;
    signal_strength: number | null;
    battery_level: number | null;
    is_anomaly: boolean;
    anomaly_type: string | null;
    source: string | null;
    violations: string[];
    raw_data: unknown;
}

export interface AlertRecord {
    id: number;
    timestamp: string;
    device_id: string;
    alert_type: string;
    severity: Severity;
    message: string;
    is_resolved: boolean;
    reading_id: number | null;
}

export interface DeviceStats {
    device_id: string;
    total_readings: number;
    anomalies: number;
    /** Percentage of readings flagged anomalous. */
    anomaly_rate: number;
    first_seen: string;
    last_seen: string;
    status: DeviceView['status'];
}

export interface CommitResult {
    recordId: number;
    device: DeviceRecord;
    alert: AlertRecord | null;
}

export interface ReadingQuery {
    hours?: number;
    deviceId?: string;
    anomaliesOnly?: boolean;
    limit?: number;
}

export interface AlertQuery {
    hours?: number;
    limit?: number;
}

/**
 * Durable home of the audit log, the device registry and alerts.
 */
export interface TelemetryStore {
    /**
     * Append the reading, apply the registry update and insert any alert as
     * one unit. Throws StorageUnavailableError and leaves no trace on failure.
     */
    commit(reading: Reading, verdict: Verdict): Promise<CommitResult>;
    getReading(id: number): Promise<ReadingRecord | undefined>;
    listReadings(query?: ReadingQuery): Promise<ReadingRecord[]>;
    listDevices(): Promise<DeviceView[]>;
    getDevice(deviceId: string): Promise<DeviceView | undefined>;
    getDeviceStats(deviceId: string): Promise<DeviceStats | undefined>;
    countDevices(): Promise<number>;
    listActiveAlerts(query?: AlertQuery): Promise<AlertRecord[]>;
    resolveAlert(id: number): Promise<AlertRecord | undefined>;
    ping(): Promise<void>;
    close(): Promise<void>;
}
