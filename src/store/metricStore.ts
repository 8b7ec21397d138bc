import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import pLimit, { type LimitFunction } from 'p-limit';
import pRetry, { AbortError } from 'p-retry';
import stringifyStable from 'fast-json-stable-stringify';
import { z } from 'zod';
import { StoreWriteError, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import {
  JsonObject,
  JsonValue,
  MetricQueryFilters,
  MetricRecord,
  RunSummaryRow,
  StoreStats
} from '../types.js';

export interface MetricStoreOptions {
  /** Upper bound a statement waits on a locked database before failing. */
  readonly busyTimeoutMs?: number;
  /** Extra attempts for a write that failed with SQLITE_BUSY / SQLITE_LOCKED. */
  readonly writeRetries?: number;
  readonly retryMinTimeoutMs?: number;
  readonly onWriteError?: (error: StoreWriteError, record: MetricRecord) => void;
}

const DEFAULT_BUSY_TIMEOUT_MS = 2_000;
const DEFAULT_WRITE_RETRIES = 2;
const DEFAULT_RETRY_MIN_TIMEOUT_MS = 25;
const IN_MEMORY = ':memory:';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS execution_metrics (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    scenario_name TEXT NOT NULL,
    device_id TEXT NOT NULL,
    task_name TEXT NOT NULL,
    device_reqs_json TEXT NOT NULL,
    task_params_json TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('SUCCESS', 'FAILURE')),
    latency_ms INTEGER NOT NULL,
    metric_value REAL,
    error_msg TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_metrics_run_scenario
    ON execution_metrics(run_id, scenario_name);

  CREATE INDEX IF NOT EXISTS idx_metrics_device
    ON execution_metrics(device_id);

  CREATE INDEX IF NOT EXISTS idx_metrics_scenario_timestamp
    ON execution_metrics(scenario_name, timestamp);
`;

const INSERT_SQL = `
  INSERT INTO execution_metrics
    (run_id, timestamp, scenario_name, device_id, task_name, device_reqs_json,
     task_params_json, status, latency_ms, metric_value, error_msg)
  VALUES
    (@runId, @timestamp, @scenarioName, @deviceId, @taskName, @deviceReqsJson,
     @taskParamsJson, @status, @latencyMs, @metricValue, @errorMessage)
`;

const JSON_VALUE_SCHEMA: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JSON_VALUE_SCHEMA),
    z.record(z.string(), JSON_VALUE_SCHEMA)
  ])
);

const JSON_OBJECT_SCHEMA = z.record(z.string(), JSON_VALUE_SCHEMA);

const METRIC_ROW_SCHEMA = z.object({
  run_id: z.string(),
  timestamp: z.string(),
  scenario_name: z.string(),
  device_id: z.string(),
  task_name: z.string(),
  device_reqs_json: z.string(),
  task_params_json: z.string(),
  status: z.enum(['SUCCESS', 'FAILURE']),
  latency_ms: z.number(),
  metric_value: z.number().nullable(),
  error_msg: z.string().nullable()
});

const SUMMARY_ROW_SCHEMA = z.object({
  runId: z.string(),
  scenarioName: z.string(),
  totalRequests: z.number(),
  deviceCount: z.number(),
  avgLatencyMs: z.number().nullable(),
  successCount: z.number()
});

type SqlParams = Record<string, string | number | null>;

/**
 * Append-only SQLite log of task executions.
 *
 * Writes funnel through a single-writer queue, one row per job. Reads go
 * through a second read-only connection; with WAL journaling a reader never
 * holds writers up for longer than the busy timeout.
 */
export class MetricStore {
  private readonly queue: LimitFunction = pLimit(1);
  private readonly insert: Database.Statement;
  private reader: Database.Database | undefined;
  private closing = false;
  private written = 0;
  private failed = 0;

  private constructor(
    readonly filePath: string,
    private readonly db: Database.Database,
    private readonly options: MetricStoreOptions
  ) {
    this.insert = db.prepare(INSERT_SQL);
  }

  static open(filePath: string, options: MetricStoreOptions = {}): MetricStore {
    if (filePath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    }
    const db = new Database(filePath);
    const busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.pragma(`busy_timeout = ${busyTimeoutMs}`);
    db.exec(SCHEMA);
    logger.debug({ filePath }, 'Metric store opened');
    return new MetricStore(filePath, db, options);
  }

  /**
   * Queue one record. Resolves `true` once the row is stored and `false` when
   * it had to be dropped; never rejects.
   */
  record(entry: MetricRecord): Promise<boolean> {
    if (this.closing) {
      return Promise.resolve(this.drop(entry, new StoreWriteError('Metric store is closed')));
    }
    return this.queue(() => this.write(entry));
  }

  flush(): Promise<void> {
    return this.queue(async () => undefined);
  }

  *query(filters: MetricQueryFilters = {}): IterableIterator<MetricRecord> {
    const { clause, params } = buildWhereClause(filters);
    const reader = this.readConnection();
    const statement = reader.prepare(`SELECT * FROM execution_metrics ${clause} ORDER BY id`);
    // an open cursor on the writer connection would block every insert until exhausted
    const rows: Iterable<unknown> = reader === this.db ? statement.all(params) : statement.iterate(params);
    for (const row of rows) {
      yield toMetricRecord(METRIC_ROW_SCHEMA.parse(row));
    }
  }

  summarize(filters: MetricQueryFilters = {}): RunSummaryRow[] {
    const { clause, params } = buildWhereClause(filters);
    const rows = this.readConnection()
      .prepare(
        `SELECT
           run_id AS runId,
           scenario_name AS scenarioName,
           COUNT(*) AS totalRequests,
           COUNT(DISTINCT device_id) AS deviceCount,
           AVG(latency_ms) AS avgLatencyMs,
           SUM(CASE WHEN status = 'SUCCESS' THEN 1 ELSE 0 END) AS successCount
         FROM execution_metrics
         ${clause}
         GROUP BY run_id, scenario_name
         ORDER BY MIN(id)`
      )
      .all(params);
    return rows.map((raw) => {
      const row = SUMMARY_ROW_SCHEMA.parse(raw);
      return {
        runId: row.runId,
        scenarioName: row.scenarioName,
        totalRequests: row.totalRequests,
        deviceCount: row.deviceCount,
        avgLatencyMs: row.avgLatencyMs ?? 0,
        successCount: row.successCount,
        successRatePct: row.totalRequests > 0 ? (row.successCount / row.totalRequests) * 100 : 0
      };
    });
  }

  stats(): StoreStats {
    return {
      pending: this.queue.pendingCount + this.queue.activeCount,
      written: this.written,
      failed: this.failed
    };
  }

  isOpen(): boolean {
    return !this.closing;
  }

  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    await this.flush();
    if (this.reader && this.reader !== this.db) {
      this.reader.close();
    }
    this.reader = undefined;
    this.db.close();
    logger.debug({ filePath: this.filePath, written: this.written, failed: this.failed }, 'Metric store closed');
  }

  private async write(entry: MetricRecord): Promise<boolean> {
    try {
      await pRetry(() => this.insertRow(entry), {
        retries: this.options.writeRetries ?? DEFAULT_WRITE_RETRIES,
        minTimeout: this.options.retryMinTimeoutMs ?? DEFAULT_RETRY_MIN_TIMEOUT_MS,
        factor: 2
      });
      this.written += 1;
      return true;
    } catch (error) {
      const failure =
        error instanceof StoreWriteError
          ? error
          : new StoreWriteError(`Failed to persist metric record: ${errorMessage(error)}`, error);
      return this.drop(entry, failure);
    }
  }

  private insertRow(entry: MetricRecord): void {
    if (!this.db.open) {
      throw new AbortError(new StoreWriteError('Metric store connection is closed'));
    }
    try {
      this.insert.run(toInsertParams(entry));
    } catch (error) {
      if (isBusyError(error)) {
        throw error;
      }
      throw new AbortError(
        new StoreWriteError(`Failed to persist metric record: ${errorMessage(error)}`, error)
      );
    }
  }

  private drop(entry: MetricRecord, error: StoreWriteError): false {
    this.failed += 1;
    logger.warn(
      {
        runId: entry.runId,
        deviceId: entry.deviceId,
        taskName: entry.taskName,
        error: error.message
      },
      'Metric record dropped'
    );
    try {
      this.options.onWriteError?.(error, entry);
    } catch (hookError) {
      logger.error({ error: errorMessage(hookError) }, 'onWriteError hook threw');
    }
    return false;
  }

  private readConnection(): Database.Database {
    if (this.closing) {
      throw new StoreWriteError('Metric store is closed');
    }
    if (!this.reader) {
      this.reader =
        this.filePath === IN_MEMORY
          ? this.db
          : new Database(this.filePath, { readonly: true, fileMustExist: true });
      if (this.reader !== this.db) {
        this.reader.pragma(`busy_timeout = ${this.options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS}`);
      }
    }
    return this.reader;
  }
}

function isBusyError(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code.startsWith('SQLITE_BUSY') || error.code.startsWith('SQLITE_LOCKED'))
  );
}

function toInsertParams(entry: MetricRecord): SqlParams {
  return {
    runId: entry.runId,
    timestamp: entry.timestamp,
    scenarioName: entry.scenarioName,
    deviceId: entry.deviceId,
    taskName: entry.taskName,
    deviceReqsJson: stringifyStable(entry.deviceRequirements),
    taskParamsJson: stringifyStable(entry.taskParameters),
    status: entry.status,
    latencyMs: Number.isFinite(entry.latencyMs) ? Math.max(0, Math.round(entry.latencyMs)) : 0,
    metricValue: entry.metricValue ?? null,
    errorMessage: entry.errorMessage ?? null
  };
}

function toMetricRecord(row: z.infer<typeof METRIC_ROW_SCHEMA>): MetricRecord {
  return {
    runId: row.run_id,
    timestamp: row.timestamp,
    scenarioName: row.scenario_name,
    deviceId: row.device_id,
    deviceRequirements: parseJsonObject(row.device_reqs_json),
    taskName: row.task_name,
    taskParameters: parseJsonObject(row.task_params_json),
    latencyMs: row.latency_ms,
    status: row.status,
    ...(row.error_msg !== null ? { errorMessage: row.error_msg } : {}),
    ...(row.metric_value !== null ? { metricValue: row.metric_value } : {})
  };
}

function parseJsonObject(raw: string): JsonObject {
  const parsed: unknown = JSON.parse(raw);
  return JSON_OBJECT_SCHEMA.parse(parsed);
}

function toIso(value: string | Date, label: string): string {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`${label} is not a valid timestamp: ${String(value)}`);
  }
  return date.toISOString();
}

function buildWhereClause(filters: MetricQueryFilters): { clause: string; params: SqlParams } {
  const conditions: string[] = [];
  const params: SqlParams = {};
  if (filters.runId !== undefined) {
    conditions.push('run_id = @runId');
    params.runId = filters.runId;
  }
  if (filters.scenarioName !== undefined) {
    conditions.push('scenario_name = @scenarioName');
    params.scenarioName = filters.scenarioName;
  }
  if (filters.deviceId !== undefined) {
    conditions.push('device_id = @deviceId');
    params.deviceId = filters.deviceId;
  }
  if (filters.timeRange?.from !== undefined) {
    conditions.push('timestamp >= @from');
    params.from = toIso(filters.timeRange.from, 'timeRange.from');
  }
  if (filters.timeRange?.to !== undefined) {
    conditions.push('timestamp <= @to');
    params.to = toIso(filters.timeRange.to, 'timeRange.to');
  }
  return {
    clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params
  };
}
