import { buildUrl, withPagination } from "../esri/query";
import type { Logger, MetricsRegistry } from "../observability";
import type { SessionProvider, SessionResponse } from "../session";
import type { ResultSink } from "../sink";
import type { Chunk, ChunkResult, LogOutcome, RequestParameters } from "../types";
import { classifyResponse, classifyTransportError, SINK_STATUS } from "./classify";
import type { RequestLog } from "./requestLog";

export interface OrchestratorContext {
  ppid: string;
  session: SessionProvider;
  log: RequestLog;
  sink: ResultSink;
  logger: Logger;
  metrics?: MetricsRegistry;
  maxWorkers: number;
  queryUrl: string;
  baseParameters: RequestParameters;
  layerName: string;
  signal?: AbortSignal;
}

export type ChunkOutcome =
  | { state: "succeeded"; chunk: Chunk; pid: string; status: string; result: ChunkResult }
  | { state: "failed"; chunk: Chunk; pid: string; status: string }
  | { state: "skipped"; chunk: Chunk };

export interface RunReport {
  outcomes: ChunkOutcome[];
  results: ChunkResult[];
  cancelled: boolean;
}

export interface PoolReport {
  dispatched: number;
  skipped: number[];
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls pending at once. Once
 * `signal` aborts no further item is started; items already started run to completion.
 * Every started item settles before the first worker error, if any, is rethrown.
 */
export async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<PoolReport> {
  let index = 0;
  let dispatched = 0;
  const skipped: number[] = [];
  const errors: unknown[] = [];

  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      if (signal?.aborted) {
        skipped.push(current);
        continue;
      }
      dispatched += 1;
      try {
        await worker(items[current], current);
      } catch (error) {
        errors.push(error);
      }
    }
  });
  await Promise.all(slots);

  if (errors.length > 0) {
    throw errors[0];
  }
  return { dispatched, skipped: skipped.sort((a, b) => a - b) };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface ChunkAttempt {
  outcome: LogOutcome;
  result?: ChunkResult;
}

async function fetchAndStore(
  ctx: OrchestratorContext,
  chunk: Chunk,
  pid: string,
  request: string,
  requestedAt: Date,
): Promise<ChunkAttempt> {
  let response: SessionResponse;
  try {
    response = await ctx.session.execute({ url: request });
  } catch (error) {
    return { outcome: classifyTransportError(error) };
  }

  ctx.metrics?.recordDuration("chunk_request_ms", response.elapsedMs);
  const classified = classifyResponse(response);
  if (!classified.ok) {
    return { outcome: classified.outcome };
  }

  try {
    const result = await ctx.sink.put(
      { chunk, ppid: ctx.ppid, pid, layerName: ctx.layerName, requestedAt },
      classified.payload,
    );
    return { outcome: classified.outcome, result };
  } catch (error) {
    ctx.logger.error("chunk_sink_failed", { ppid: ctx.ppid, pid, offset: chunk.offset, error: describeError(error) });
    return { outcome: { ...classified.outcome, status: SINK_STATUS, results: [describeError(error)] } };
  }
}

async function runChunk(ctx: OrchestratorContext, chunk: Chunk): Promise<ChunkOutcome> {
  const { logger, metrics, log } = ctx;
  const parameters = withPagination(ctx.baseParameters, chunk);
  const request = buildUrl(ctx.queryUrl, parameters);

  const pid = log.create(ctx.ppid, parameters, request);
  const requestedAt = new Date(log.get(pid)?.utcTimestamp ?? Date.now());
  metrics?.incrementCounter("chunks_dispatched");
  logger.debug("chunk_start", { ppid: ctx.ppid, pid, offset: chunk.offset, limit: chunk.limit });

  const { outcome, result } = await fetchAndStore(ctx, chunk, pid, request, requestedAt);
  log.finalize(pid, outcome);

  if (result) {
    metrics?.incrementCounter("chunks_ok");
    metrics?.incrementCounter("features_returned", result.featureCount);
    logger.info("chunk_complete", {
      ppid: ctx.ppid,
      pid,
      offset: chunk.offset,
      featureCount: result.featureCount,
      elapsedMs: outcome.elapsedTime,
    });
    return { state: "succeeded", chunk, pid, status: outcome.status, result };
  }

  metrics?.incrementCounter("chunks_failed");
  logger.warn("chunk_failed", {
    ppid: ctx.ppid,
    pid,
    offset: chunk.offset,
    status: outcome.status,
    elapsedMs: outcome.elapsedTime,
  });
  return { state: "failed", chunk, pid, status: outcome.status };
}

/** Dispatches every chunk once; per-chunk failures land in the request log, not in a rejection. */
export async function runChunks(chunks: Chunk[], ctx: OrchestratorContext): Promise<RunReport> {
  const outcomes = new Array<ChunkOutcome | undefined>(chunks.length).fill(undefined);

  const pool = await processWithConcurrency(
    chunks,
    ctx.maxWorkers,
    async (chunk, index) => {
      outcomes[index] = await runChunk(ctx, chunk);
    },
    ctx.signal,
  );

  for (const index of pool.skipped) {
    const chunk = chunks[index];
    outcomes[index] = { state: "skipped", chunk };
    ctx.metrics?.incrementCounter("chunks_skipped");
  }
  if (pool.skipped.length > 0) {
    ctx.logger.warn("harvest_cancelled", {
      ppid: ctx.ppid,
      dispatched: pool.dispatched,
      skipped: pool.skipped.length,
      firstSkippedOffset: chunks[pool.skipped[0]].offset,
    });
  }

  const settled = outcomes.filter((outcome): outcome is ChunkOutcome => outcome !== undefined);
  const results: ChunkResult[] = [];
  for (const outcome of settled) {
    if (outcome.state === "succeeded") {
      results.push(outcome.result);
    }
  }

  return { outcomes: settled, results, cancelled: ctx.signal?.aborted === true && pool.skipped.length > 0 };
}
