import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { isRecord } from "../esri/envelope";
import { SUCCESS_STATUS } from "../harvest/classify";
import type { LogRecord, RequestParameters } from "../types";
import type { HarvestSummary, LineageStore, RunStatus } from "./types";

type RequestLogRow = {
  pid: string;
  ppid: string;
  graleUuid: string;
  utcTimestamp: string;
  request: string;
  parameters: string;
  status: string;
  results: string;
  elapsedTime: string;
  size: string;
};

type HarvestRow = {
  ppid: string;
  entries: number;
  succeeded: number;
  firstTimestamp: string;
  lastTimestamp: string;
};

const IN_MEMORY = ":memory:";

function parseParameters(text: string): RequestParameters {
  const parsed: unknown = JSON.parse(text);
  const parameters: RequestParameters = {};
  if (isRecord(parsed)) {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "string") {
        parameters[key] = value;
      }
    }
  }
  return parameters;
}

function parseResults(text: string): string[] {
  const parsed: unknown = JSON.parse(text);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
}

function toRecord(row: RequestLogRow): LogRecord {
  return {
    grale_uuid: row.graleUuid,
    ppid: row.ppid,
    pid: row.pid,
    utc_timestamp: row.utcTimestamp,
    request: row.request,
    parameters: parseParameters(row.parameters),
    status: row.status,
    results: parseResults(row.results),
    elapsed_time: row.elapsedTime,
    size: row.size,
  };
}

export class SqliteLineageStore implements LineageStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, command: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, command, startedAt, finishedAt, status)
        VALUES (@runId, @command, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          command = excluded.command,
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({ runId, command, startedAt });
  }

  async finishRun(runId: string, status: RunStatus, finishedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt
        WHERE runId = @runId
      `,
      )
      .run({ runId, status, finishedAt });
  }

  async saveEntries(records: LogRecord[], runId?: string): Promise<number> {
    const statement = this.db.prepare(`
      INSERT INTO request_log (
        pid, ppid, graleUuid, utcTimestamp, request, parameters,
        status, results, elapsedTime, size, runId, savedAt
      )
      VALUES (
        @pid, @ppid, @graleUuid, @utcTimestamp, @request, @parameters,
        @status, @results, @elapsedTime, @size, @runId, @savedAt
      )
      ON CONFLICT(pid) DO UPDATE SET
        status = excluded.status,
        results = excluded.results,
        elapsedTime = excluded.elapsedTime,
        size = excluded.size,
        runId = COALESCE(excluded.runId, request_log.runId),
        savedAt = excluded.savedAt
    `);

    const savedAt = new Date().toISOString();
    const insertAll = this.db.transaction((rows: LogRecord[]) => {
      for (const record of rows) {
        statement.run({
          pid: record.pid,
          ppid: record.ppid,
          graleUuid: record.grale_uuid,
          utcTimestamp: record.utc_timestamp,
          request: record.request,
          parameters: JSON.stringify(record.parameters),
          status: record.status,
          results: JSON.stringify(record.results),
          elapsedTime: record.elapsed_time,
          size: record.size,
          runId: runId ?? null,
          savedAt,
        });
      }
    });
    insertAll(records);
    return records.length;
  }

  async listByPpid(ppid: string): Promise<LogRecord[]> {
    const rows = this.db
      .prepare(
        `
        SELECT pid, ppid, graleUuid, utcTimestamp, request, parameters, status, results, elapsedTime, size
        FROM request_log
        WHERE ppid = ?
        ORDER BY utcTimestamp ASC, pid ASC
      `,
      )
      .all(ppid) as RequestLogRow[];
    return rows.map(toRecord);
  }

  async listHarvests(limit = 50): Promise<HarvestSummary[]> {
    const rows = this.db
      .prepare(
        `
        SELECT
          ppid,
          COUNT(*) AS entries,
          SUM(CASE WHEN status = @success THEN 1 ELSE 0 END) AS succeeded,
          MIN(utcTimestamp) AS firstTimestamp,
          MAX(utcTimestamp) AS lastTimestamp
        FROM request_log
        GROUP BY ppid
        ORDER BY firstTimestamp DESC, ppid ASC
        LIMIT @limit
      `,
      )
      .all({ success: SUCCESS_STATUS, limit }) as HarvestRow[];

    return rows.map((row) => ({ ...row, failed: row.entries - row.succeeded }));
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS request_log (
        pid TEXT PRIMARY KEY,
        ppid TEXT NOT NULL,
        graleUuid TEXT NOT NULL,
        utcTimestamp TEXT NOT NULL,
        request TEXT NOT NULL,
        parameters TEXT NOT NULL,
        status TEXT NOT NULL,
        results TEXT NOT NULL,
        elapsedTime TEXT NOT NULL,
        size TEXT NOT NULL,
        savedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        command TEXT NOT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_request_log_ppid ON request_log(ppid);
      CREATE INDEX IF NOT EXISTS idx_request_log_status ON request_log(status);
    `);

    this.ensureColumn("request_log", "runId", "TEXT NULL");
  }

  private ensureColumn(tableName: string, columnName: string, definition: string): void {
    const columns = this.db.prepare(`PRAGMA table_info(${tableName})`).all() as Array<{ name: string }>;
    if (columns.some((column) => column.name === columnName)) {
      return;
    }

    this.db.exec(`ALTER TABLE ${tableName} ADD COLUMN ${columnName} ${definition}`);
  }
}
