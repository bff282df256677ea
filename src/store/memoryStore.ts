import type { LogRecord } from "../types";
import { summarizeHarvests } from "./summarize";
import type { HarvestSummary, LineageStore, RunStatus } from "./types";

interface RunRow {
  command: string;
  startedAt: string;
  finishedAt?: string;
  status: RunStatus | "running";
}

export class InMemoryLineageStore implements LineageStore {
  private readonly records = new Map<string, LogRecord>();
  readonly runs = new Map<string, RunRow>();

  async startRun(runId: string, command: string, startedAt: string): Promise<void> {
    this.runs.set(runId, { command, startedAt, status: "running" });
  }

  async finishRun(runId: string, status: RunStatus, finishedAt: string): Promise<void> {
    const run = this.runs.get(runId);
    if (run) {
      this.runs.set(runId, { ...run, status, finishedAt });
    }
  }

  async saveEntries(records: LogRecord[]): Promise<number> {
    for (const record of records) {
      this.records.set(record.pid, { ...record, parameters: { ...record.parameters }, results: [...record.results] });
    }
    return records.length;
  }

  async listByPpid(ppid: string): Promise<LogRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.ppid === ppid)
      .sort((a, b) => a.utc_timestamp.localeCompare(b.utc_timestamp) || a.pid.localeCompare(b.pid));
  }

  async listHarvests(limit = 50): Promise<HarvestSummary[]> {
    return summarizeHarvests([...this.records.values()]).slice(0, limit);
  }

  async close(): Promise<void> {
    return;
  }
}
