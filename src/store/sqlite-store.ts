import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { logger } from '../config/logger.js';
import type { AlertDraft, AlertPolicy, Severity } from '../alerts/policy.js';
import { DeviceRegistry } from '../registry/device-registry.js';
import type { DeviceRecord, DeviceTable, DeviceView } from '../registry/device-registry.js';
import type { Reading, Verdict } from '../rules/types.js';
import { StorageUnavailableError } from './errors.js';
import type {
    AlertQuery,
    AlertRecord,
    CommitResult,
    DeviceStats,
    ReadingQuery,
    ReadingRecord,
    TelemetryStore,
} from './types.js';

export interface SqliteStoreConfig {
    /** Database file, or ":memory:". */
    filePath: string;
    inactiveAfterMs: number;
    alertPolicy: AlertPolicy;
    now?: () => Date;
}

interface AnomalyRow {
    id: number;
    timestamp: string;
    device_id: string;
    heart_rate: number | null;
    body_temp: number | null;
    signal_strength: number | null;
    battery_level: number | null;
    is_anomaly: number;
    anomaly_type: string | null;
    raw_data: string;
    source: string | null;
    violations: string | null;
}

interface AlertRow {
    id: number;
    timestamp: string;
    device_id: string;
    alert_type: string;
    severity: string;
    message: string;
    is_resolved: number;
    reading_id: number | null;
}

interface InsertReadingParams {
    timestamp: string;
    device_id: string;
    heart_rate: number | null;
    body_temp: number | null;
    signal_strength: number | null;
    battery_level: number | null;
    is_anomaly: number;
    anomaly_type: string | null;
    raw_data: string;
    source: string;
    violations: string;
}

interface InsertAlertParams {
    timestamp: string;
    device_id: string;
    alert_type: string;
    severity: string;
    message: string;
    reading_id: number;
}

const DEFAULT_LIMIT = 500;
const MAX_LIMIT = 5000;

function toReadingRecord(row: AnomalyRow): ReadingRecord {
    const violations: unknown = row.violations ? JSON.parse(row.violations) : [];
    return {
        id: row.id,
        timestamp: row.timestamp,
        device_id: row.device_id,
        heart_rate: row.heart_rate,
        body_temp: row.body_temp,
        signal_strength: row.signal_strength,
        battery_level: row.battery_level,
        is_anomaly: row.is_anomaly === 1,
        anomaly_type: row.anomaly_type,
        source: row.source,
        violations: Array.isArray(violations)
            ? violations.filter((code): code is string => typeof code === 'string')
            : [],
        raw_data: JSON.parse(row.raw_data),
    };
}

function toSeverity(value: string): Severity {
    return value === 'CRITICAL' || value === 'WARNING' ? value : 'INFO';
}

function toAlertRecord(row: AlertRow): AlertRecord {
    return { ...row, severity: toSeverity(row.severity), is_resolved: row.is_resolved === 1 };
}

function clampLimit(limit: number | undefined): number {
    if (limit === undefined || !Number.isFinite(limit) || limit < 1) return DEFAULT_LIMIT;
    return Math.min(Math.floor(limit), MAX_LIMIT);
}

class SqliteDeviceTable implements DeviceTable {
    private findStmt: Database.Statement<[string], DeviceRecord>;
    private insertStmt: Database.Statement<[DeviceRecord]>;
    private updateStmt: Database.Statement<[DeviceRecord]>;

    constructor(db: Database.Database) {
        this.findStmt = db.prepare<[string], DeviceRecord>(
            `select device_id, first_seen, last_seen, total_readings, status from devices where device_id = ?`,
        );
        this.insertStmt = db.prepare<DeviceRecord>(
            `insert into devices (device_id, first_seen, last_seen, total_readings, status)
             values (@device_id, @first_seen, @last_seen, @total_readings, @status)`,
        );
        this.updateStmt = db.prepare<DeviceRecord>(
            `update devices
             set first_seen = @first_seen, last_seen = @last_seen, total_readings = @total_readings, status = @status
             where device_id = @device_id`,
        );
    }

    find(deviceId: string): DeviceRecord | undefined {
        return this.findStmt.get(deviceId);
    }

    insert(record: DeviceRecord): void {
        this.insertStmt.run(record);
    }

    update(record: DeviceRecord): void {
        this.updateStmt.run(record);
    }
}

export class SqliteStore implements TelemetryStore {
    private db: Database.Database;
    private registry: DeviceRegistry;
    private now: () => Date;
    private commitTx: Database.Transaction<(reading: Reading, verdict: Verdict) => CommitResult>;
    private insertReadingStmt: Database.Statement<[InsertReadingParams]>;
    private insertAlertStmt: Database.Statement<[InsertAlertParams]>;

    constructor(private cfg: SqliteStoreConfig) {
        if (cfg.filePath !== ':memory:') {
            mkdirSync(dirname(cfg.filePath), { recursive: true });
        }
        this.db = new Database(cfg.filePath);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('busy_timeout = 5000');
        this.init();

        this.now = cfg.now ?? (() => new Date());
        this.registry = new DeviceRegistry(new SqliteDeviceTable(this.db), cfg.inactiveAfterMs);

        this.insertReadingStmt = this.db.prepare<InsertReadingParams>(
            `insert into anomalies
             (timestamp, device_id, heart_rate, body_temp, signal_strength, battery_level, is_anomaly, anomaly_type, raw_data, source, violations)
             values (@timestamp, @device_id, @heart_rate, @body_temp, @signal_strength, @battery_level, @is_anomaly, @anomaly_type, @raw_data, @source, @violations)`,
        );
        this.insertAlertStmt = this.db.prepare<InsertAlertParams>(
            `insert into alerts (timestamp, device_id, alert_type, severity, message, is_resolved, reading_id)
             values (@timestamp, @device_id, @alert_type, @severity, @message, 0, @reading_id)`,
        );
        this.commitTx = this.db.transaction((reading: Reading, verdict: Verdict) => this.applyCommit(reading, verdict));

        logger.info({ filePath: cfg.filePath }, 'SQLite store opened');
    }

    private init(): void {
        this.db.exec(`
            create table if not exists anomalies (
                id integer primary key autoincrement,
                timestamp text not null,
                device_id text not null,
                heart_rate real,
                body_temp real,
                signal_strength real,
                battery_level real,
                is_anomaly integer,
                anomaly_type text,
                raw_data text
            );

            create table if not exists devices (
                device_id text primary key,
                first_seen text,
                last_seen text,
                total_readings integer,
                status text
            );

            create table if not exists alerts (
                id integer primary key autoincrement,
                timestamp text not null,
                device_id text not null,
                alert_type text,
                severity text,
                message text,
                is_resolved integer default 0
            );
        `);

        // audit columns added on top of the dashboard's table layout
        this.addColumnIfMissing('anomalies', 'source', 'text');
        this.addColumnIfMissing('anomalies', 'violations', 'text');
        this.addColumnIfMissing('alerts', 'reading_id', 'integer');

        this.db.exec(`
            create index if not exists idx_anomalies_device_ts on anomalies(device_id, timestamp);
            create index if not exists idx_anomalies_ts on anomalies(timestamp);
            create index if not exists idx_alerts_open on alerts(is_resolved, timestamp);
        `);
    }

    private addColumnIfMissing(table: string, column: string, type: string): void {
        const columns = this.db
            .prepare<[string], { name: string }>(`select name from pragma_table_info(?)`)
            .all(table)
            .map((c) => c.name);

        if (!columns.includes(column)) {
            this.db.exec(`alter table ${table} add column ${column} ${type}`);
            logger.info({ table, column }, 'Added missing column');
        }
    }

    private applyCommit(reading: Reading, verdict: Verdict): CommitResult {
        const vitals = reading.vitals;
        const inserted = this.insertReadingStmt.run({
            timestamp: reading.observed_at,
            device_id: reading.device_id,
            heart_rate: vitals.heart_rate ?? null,
            body_temp: vitals.body_temp ?? null,
            signal_strength: vitals.signal_strength ?? null,
            battery_level: vitals.battery_level ?? null,
            is_anomaly: verdict.is_anomaly ? 1 : 0,
            anomaly_type: verdict.anomaly_type,
            raw_data: JSON.stringify(reading.raw_payload),
            source: verdict.source,
            violations: JSON.stringify(verdict.violations.map((v) => v.code)),
        });
        const recordId = Number(inserted.lastInsertRowid);

        const device = this.registry.recordReading(reading.device_id, reading.observed_at);

        const draft = this.cfg.alertPolicy.evaluate(reading, verdict);
        const alert = draft ? this.insertAlert(draft, reading.observed_at, recordId) : null;

        return { recordId, device, alert };
    }

    private insertAlert(draft: AlertDraft, timestamp: string, readingId: number): AlertRecord {
        const result = this.insertAlertStmt.run({ ...draft, timestamp, reading_id: readingId });
        return {
            id: Number(result.lastInsertRowid),
            timestamp,
            device_id: draft.device_id,
            alert_type: draft.alert_type,
            severity: draft.severity,
            message: draft.message,
            is_resolved: false,
            reading_id: readingId,
        };
    }

    private guard<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (err) {
            logger.error({ operation, error: err }, 'SQLite operation failed');
            throw new StorageUnavailableError(`SQLite ${operation} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
        }
    }

    async commit(reading: Reading, verdict: Verdict): Promise<CommitResult> {
        // IMMEDIATE takes the write lock up front so writers in other processes serialise
        return this.guard('commit', () => this.commitTx.immediate(reading, verdict));
    }

    async getReading(id: number): Promise<ReadingRecord | undefined> {
        return this.guard('getReading', () => {
            const row = this.db.prepare<[number], AnomalyRow>(`select * from anomalies where id = ?`).get(id);
            return row ? toReadingRecord(row) : undefined;
        });
    }

    async listReadings(query: ReadingQuery = {}): Promise<ReadingRecord[]> {
        const where: string[] = [];
        const values: (string | number)[] = [];

        if (query.anomaliesOnly) {
            where.push('is_anomaly = 1');
        }
        if (query.deviceId) {
            where.push('device_id = ?');
            values.push(query.deviceId);
        }
        if (query.hours !== undefined) {
            where.push('timestamp > ?');
            values.push(new Date(this.now().getTime() - query.hours * 3_600_000).toISOString());
        }
        values.push(clampLimit(query.limit));

        const sql = `
            select * from anomalies
            ${where.length ? `where ${where.join(' and ')}` : ''}
            order by timestamp desc, id desc
            limit ?
        `;

        return this.guard('listReadings', () =>
            this.db.prepare<(string | number)[], AnomalyRow>(sql).all(...values).map(toReadingRecord),
        );
    }

    async listDevices(): Promise<DeviceView[]> {
        const now = this.now();
        return this.guard('listDevices', () =>
            this.db
                .prepare<[], DeviceRecord>(`select * from devices order by last_seen desc`)
                .all()
                .map((record) => this.registry.describe(record, now)),
        );
    }

    async getDevice(deviceId: string): Promise<DeviceView | undefined> {
        const now = this.now();
        return this.guard('getDevice', () => {
            const record = this.db.prepare<[string], DeviceRecord>(`select * from devices where device_id = ?`).get(deviceId);
            return record ? this.registry.describe(record, now) : undefined;
        });
    }

    async getDeviceStats(deviceId: string): Promise<DeviceStats | undefined> {
        const device = await this.getDevice(deviceId);
        if (!device) return undefined;

        const counts = this.guard('getDeviceStats', () =>
            this.db
                .prepare<[string], { total: number; anomalies: number | null }>(
                    `select count(*) as total, sum(case when is_anomaly = 1 then 1 else 0 end) as anomalies
                     from anomalies where device_id = ?`,
                )
                .get(deviceId),
        );
        const total = counts?.total ?? 0;
        const anomalies = counts?.anomalies ?? 0;

        return {
            device_id: deviceId,
            total_readings: total,
            anomalies,
            anomaly_rate: total > 0 ? (anomalies / total) * 100 : 0,
            first_seen: device.first_seen,
            last_seen: device.last_seen,
            status: device.status,
        };
    }

    async countDevices(): Promise<number> {
        return this.guard('countDevices', () => {
            const row = this.db.prepare<[], { count: number }>(`select count(*) as count from devices`).get();
            return row?.count ?? 0;
        });
    }

    async listActiveAlerts(query: AlertQuery = {}): Promise<AlertRecord[]> {
        const values: (string | number)[] = [];
        let since = '';
        if (query.hours !== undefined) {
            since = 'and timestamp > ?';
            values.push(new Date(this.now().getTime() - query.hours * 3_600_000).toISOString());
        }
        values.push(clampLimit(query.limit));

        return this.guard('listActiveAlerts', () =>
            this.db
                .prepare<(string | number)[], AlertRow>(
                    `select * from alerts where is_resolved = 0 ${since} order by timestamp desc, id desc limit ?`,
                )
                .all(...values)
                .map(toAlertRecord),
        );
    }

    async resolveAlert(id: number): Promise<AlertRecord | undefined> {
        return this.guard('resolveAlert', () => {
            this.db.prepare<[number]>(`update alerts set is_resolved = 1 where id = ?`).run(id);
            const row = this.db.prepare<[number], AlertRow>(`select * from alerts where id = ?`).get(id);
            return row ? toAlertRecord(row) : undefined;
        });
    }

    async ping(): Promise<void> {
        this.guard('ping', () => {
            const row = this.db.prepare<[], { ok: number }>(`select 1 as ok`).get();
            if (!row || row.ok !== 1) throw new Error('sqlite ping failed');
        });
    }

    async close(): Promise<void> {
        if (this.db.open) {
            this.db.close();
            logger.info('SQLite store closed');
        }
    }
}
