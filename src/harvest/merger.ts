import type { Logger, MetricsRegistry } from "../observability";
import type { ResultSink } from "../sink";
import type { ChunkResult, HarvestedFeature, HarvestFeatureCollection, LogRecord, MergedOutput, ServiceMetadataDocument } from "../types";
import { LogStateError } from "./errors";
import type { RequestLog } from "./requestLog";

export interface MergeInput {
  ppid: string;
  results: ChunkResult[];
  log: RequestLog;
  sink: ResultSink;
  metadata?: ServiceMetadataDocument;
  cleanup: boolean;
  logger?: Logger;
  metrics?: MetricsRegistry;
  /** Called for each stored payload that cannot be read back; its features are left out. */
  onUnreadable?: (result: ChunkResult, error: unknown) => void;
}

function offsetOf(record: LogRecord): number {
  const offset = Number(record.parameters.resultOffset);
  return Number.isFinite(offset) ? offset : Number.MAX_SAFE_INTEGER;
}

/** Log records for one harvest, ordered by the page offset they requested. */
export function orderedRecords(log: RequestLog, ppid: string): LogRecord[] {
  return log.records(ppid).sort((a, b) => offsetOf(a) - offsetOf(b));
}

export async function mergeChunkResults(input: MergeInput): Promise<MergedOutput> {
  const { ppid, log, sink } = input;
  const stopTimer = input.metrics?.startTimer("merge_ms");

  try {
    const ordered = [...input.results].sort((a, b) => a.offset - b.offset);
    const features: HarvestedFeature[] = [];

    for (const result of ordered) {
      const entry = log.get(result.pid);
      if (!entry || entry.state !== "finalized") {
        throw new LogStateError(`Chunk ${result.chunkId} has no finalized log entry`, result.pid);
      }

      let payload: HarvestFeatureCollection;
      try {
        payload = await sink.get(result);
      } catch (error) {
        input.logger?.error("chunk_read_failed", {
          ppid,
          pid: result.pid,
          offset: result.offset,
          error: error instanceof Error ? error.message : String(error),
        });
        input.metrics?.incrementCounter("chunks_unreadable");
        input.onUnreadable?.(result, error);
        continue;
      }
      for (const feature of payload.features) {
        features.push({
          ...feature,
          properties: {
            ...(feature.properties ?? {}),
            grale_utc: entry.utcTimestamp,
            grale_uuid: entry.graleId,
          },
        });
      }
    }

    const metadata: ServiceMetadataDocument[] = input.metadata ? [{ ...input.metadata, ppid }] : [];
    return {
      type: "FeatureCollection",
      features,
      request_logging: orderedRecords(log, ppid),
      request_metadata: metadata,
    };
  } finally {
    if (input.cleanup) {
      const removed = sink.artifacts().length;
      await sink.cleanup();
      input.logger?.debug("sink_cleanup", { ppid, removed });
    }
    stopTimer?.();
  }
}
