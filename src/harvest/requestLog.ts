import crypto from "node:crypto";
import type { FinalizedLogEntry, LogEntry, LogOutcome, LogRecord, RequestParameters } from "../types";
import { LogStateError } from "./errors";

export interface RequestLogOptions {
  createId?: (ppid: string, request: string) => string;
  now?: () => Date;
}

export const IN_FLIGHT_STATUS = "In-flight";

export function toUtcSeconds(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export function formatSuccessMessage(sizeBytes: number, elapsedMs: number): string {
  return `Size: ${sizeBytes}(B), Time :${Number((elapsedMs / 1000).toFixed(6))}(s)`;
}

export function toLogRecord(entry: LogEntry): LogRecord {
  const finalized = entry.state === "finalized";
  return {
    grale_uuid: entry.graleId,
    ppid: entry.ppid,
    pid: entry.pid,
    utc_timestamp: entry.utcTimestamp,
    request: entry.request,
    parameters: { ...entry.parameters },
    status: finalized ? entry.status : IN_FLIGHT_STATUS,
    results: finalized ? [...entry.results] : [],
    elapsed_time: `${finalized ? entry.elapsedTime : 0}(ms)`,
    size: `${finalized ? entry.size : 0}(B)`,
  };
}

function copyEntry(entry: LogEntry): LogEntry {
  if (entry.state === "finalized") {
    return { ...entry, parameters: { ...entry.parameters }, results: [...entry.results] };
  }
  return { ...entry, parameters: { ...entry.parameters } };
}

/**
 * One entry per request attempt, keyed by pid and grouped by ppid.
 *
 * `create` and `finalize` each run to completion without awaiting, so concurrent
 * chunk tasks on the event loop can never observe a half-written entry and callers
 * hold no lock of their own. A single log may be shared across harvests.
 */
export class RequestLog {
  private readonly entries = new Map<string, LogEntry>();
  private readonly createId: (ppid: string, request: string) => string;
  private readonly now: () => Date;

  constructor(options: RequestLogOptions = {}) {
    this.createId = options.createId ?? (() => crypto.randomUUID());
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.entries.size;
  }

  create(ppid: string, parameters: RequestParameters, request: string): string {
    const pid = this.createId(ppid, request);
    if (this.entries.has(pid)) {
      throw new LogStateError(`Duplicate request log id: ${pid}`, pid);
    }

    this.entries.set(pid, {
      state: "in_flight",
      pid,
      ppid,
      graleId: `${ppid}_${pid}`,
      utcTimestamp: toUtcSeconds(this.now()),
      parameters: { ...parameters },
      request,
    });
    return pid;
  }

  finalize(pid: string, outcome: LogOutcome): FinalizedLogEntry {
    const entry = this.entries.get(pid);
    if (!entry) {
      throw new LogStateError(`Unknown request log id: ${pid}`, pid);
    }
    if (entry.state === "finalized") {
      throw new LogStateError(`Request log entry already finalized: ${pid}`, pid);
    }

    const finalized: FinalizedLogEntry = {
      ...entry,
      state: "finalized",
      status: outcome.status,
      results: [...outcome.results],
      elapsedTime: outcome.elapsedTime,
      size: outcome.size,
    };
    this.entries.set(pid, finalized);
    return { ...finalized, parameters: { ...finalized.parameters }, results: [...finalized.results] };
  }

  get(pid: string): LogEntry | undefined {
    const entry = this.entries.get(pid);
    return entry ? copyEntry(entry) : undefined;
  }

  snapshot(ppid?: string): LogEntry[] {
    const copies: LogEntry[] = [];
    for (const entry of this.entries.values()) {
      if (ppid === undefined || entry.ppid === ppid) {
        copies.push(copyEntry(entry));
      }
    }
    return copies;
  }

  records(ppid?: string): LogRecord[] {
    return this.snapshot(ppid).map(toLogRecord);
  }
}

/** Process-wide log used when a harvest is not handed one explicitly. */
export const DEFAULT_REQUEST_LOG = new RequestLog();
