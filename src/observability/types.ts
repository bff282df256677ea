export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  ppid?: string;
  pid?: string;
  url?: string;
  offset?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "chunks_dispatched"
  | "chunks_ok"
  | "chunks_failed"
  | "chunks_skipped"
  | "chunks_unreadable"
  | "features_returned"
  | "probe_requests"
  | "catalog_requests";

export type MetricTimerName = "probe_ms" | "chunk_request_ms" | "merge_ms";
