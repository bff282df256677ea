import type { LogRecord } from "../types";

export interface HarvestSummary {
  ppid: string;
  entries: number;
  succeeded: number;
  failed: number;
  firstTimestamp: string;
  lastTimestamp: string;
}

export type RunStatus = "completed" | "failed";

/** Durable home for request log records once a harvest or crawl has finished. */
export interface LineageStore {
  startRun(runId: string, command: string, startedAt: string): Promise<void>;
  finishRun(runId: string, status: RunStatus, finishedAt: string): Promise<void>;
  saveEntries(records: LogRecord[], runId?: string): Promise<number>;
  listByPpid(ppid: string): Promise<LogRecord[]>;
  listHarvests(limit?: number): Promise<HarvestSummary[]>;
  close(): Promise<void>;
}
