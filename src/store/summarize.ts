import { SUCCESS_STATUS } from "../harvest/classify";
import type { LogRecord } from "../types";
import type { HarvestSummary } from "./types";

export function summarizeHarvests(records: LogRecord[]): HarvestSummary[] {
  const byPpid = new Map<string, HarvestSummary>();
  for (const record of records) {
    const current = byPpid.get(record.ppid);
    const succeeded = record.status === SUCCESS_STATUS ? 1 : 0;
    if (!current) {
      byPpid.set(record.ppid, {
        ppid: record.ppid,
        entries: 1,
        succeeded,
        failed: 1 - succeeded,
        firstTimestamp: record.utc_timestamp,
        lastTimestamp: record.utc_timestamp,
      });
      continue;
    }
    current.entries += 1;
    current.succeeded += succeeded;
    current.failed += 1 - succeeded;
    if (record.utc_timestamp < current.firstTimestamp) {
      current.firstTimestamp = record.utc_timestamp;
    }
    if (record.utc_timestamp > current.lastTimestamp) {
      current.lastTimestamp = record.utc_timestamp;
    }
  }
  return [...byPpid.values()].sort(
    (a, b) => b.firstTimestamp.localeCompare(a.firstTimestamp) || a.ppid.localeCompare(b.ppid),
  );
}
