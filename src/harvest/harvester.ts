import crypto from "node:crypto";
import os from "node:os";
import { buildBaseParameters, normalizeLayerUrl, queryUrlFor } from "../esri/query";
import { layerLabel } from "../esri/layer";
import { probeLayer } from "../esri/probe";
import type { Logger, MetricsRegistry } from "../observability";
import { formatBytes } from "../output/bytes";
import type { SessionProvider } from "../session";
import { createResultSink, type ResultSink } from "../sink";
import type { Chunk, ChunkResult, MergedOutput, OutputMode, QueryFormat } from "../types";
import { RequestValidationError } from "./errors";
import { mergeChunkResults } from "./merger";
import { runChunks, type RunReport } from "./orchestrator";
import { planChunks } from "./planner";
import { DEFAULT_REQUEST_LOG, type RequestLog } from "./requestLog";

export interface HarvestRequestInput {
  layerUrl: string;
  where?: string;
  outFields?: string[] | string;
  outSR?: string;
  format?: QueryFormat;
  extraParams?: Record<string, string>;
  chunkSize?: number;
  maxWorkers?: number;
  outputMode?: OutputMode;
  spillDir?: string;
  resultOffset?: number;
  recordLimit?: number;
  cleanup?: boolean;
  log?: RequestLog;
}

export interface HarvestRequest {
  readonly layerUrl: string;
  readonly where?: string;
  readonly outFields?: string[] | string;
  readonly outSR?: string;
  readonly format: QueryFormat;
  readonly extraParams: Readonly<Record<string, string>>;
  readonly chunkSize?: number;
  readonly maxWorkers: number;
  readonly outputMode: OutputMode;
  readonly spillDir?: string;
  readonly resultOffset: number;
  readonly recordLimit?: number;
  readonly cleanup: boolean;
  readonly log: RequestLog;
}

export interface HarvestDeps {
  session: SessionProvider;
  logger: Logger;
  metrics?: MetricsRegistry;
  createPpid?: () => string;
  sink?: ResultSink;
  signal?: AbortSignal;
}

export interface HarvestReport {
  ppid: string;
  layerName: string;
  total: number;
  startOffset: number;
  requested: number;
  returned: number;
  plannedChunks: number;
  succeededChunks: number;
  failedChunks: number;
  skippedChunks: number;
  /** Stored as a success but unreadable at merge time; counted in `succeededChunks` too. */
  unreadableChunks: number;
  cancelled: boolean;
  summary: string;
}

export interface HarvestResult {
  output: MergedOutput;
  report: HarvestReport;
  /** Spill artifacts left on disk; empty when the request cleans up. */
  artifacts: string[];
}

export function defaultMaxWorkers(): number {
  return Math.min(32, os.availableParallelism() * 5);
}

function assertPositiveInteger(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    throw new RequestValidationError(`${name} must be a positive integer, got ${value}`);
  }
}

function assertNonNegativeInteger(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new RequestValidationError(`${name} must be a non-negative integer, got ${value}`);
  }
}

function assertLayerUrl(layerUrl: string): void {
  let parsed: URL;
  try {
    parsed = new URL(layerUrl);
  } catch {
    throw new RequestValidationError(`Invalid layer URL: ${layerUrl}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new RequestValidationError(`Layer URL must use http or https: ${layerUrl}`);
  }
}

const PAGINATION_KEYS = new Set(["resultoffset", "resultrecordcount"]);

// Pagination is set per chunk; use resultOffset/recordLimit/chunkSize instead.
function assertNoPaginationParams(extraParams: Record<string, string> | undefined): void {
  for (const key of Object.keys(extraParams ?? {})) {
    if (PAGINATION_KEYS.has(key.toLowerCase())) {
      throw new RequestValidationError(`${key} is set per chunk and cannot be passed as an extra parameter`);
    }
  }
}

export function createHarvestRequest(input: HarvestRequestInput): HarvestRequest {
  assertLayerUrl(input.layerUrl);
  assertPositiveInteger("chunkSize", input.chunkSize);
  assertPositiveInteger("maxWorkers", input.maxWorkers);
  assertNonNegativeInteger("resultOffset", input.resultOffset);
  assertNonNegativeInteger("recordLimit", input.recordLimit);
  assertNoPaginationParams(input.extraParams);

  const format = input.format ?? "geojson";
  if (format !== "geojson" && format !== "json") {
    throw new RequestValidationError(`Unsupported query format: ${String(format)}`);
  }

  return Object.freeze({
    layerUrl: normalizeLayerUrl(input.layerUrl),
    where: input.where,
    outFields: input.outFields,
    outSR: input.outSR,
    format,
    extraParams: Object.freeze({ ...(input.extraParams ?? {}) }),
    chunkSize: input.chunkSize,
    maxWorkers: input.maxWorkers ?? defaultMaxWorkers(),
    outputMode: input.outputMode ?? "memory",
    spillDir: input.spillDir,
    resultOffset: input.resultOffset ?? 0,
    recordLimit: input.recordLimit,
    cleanup: input.cleanup ?? true,
    log: input.log ?? DEFAULT_REQUEST_LOG,
  });
}

function countOutcomes(run: RunReport): Pick<HarvestReport, "succeededChunks" | "failedChunks" | "skippedChunks"> {
  let succeededChunks = 0;
  let failedChunks = 0;
  let skippedChunks = 0;
  for (const outcome of run.outcomes) {
    if (outcome.state === "succeeded") {
      succeededChunks += 1;
    } else if (outcome.state === "failed") {
      failedChunks += 1;
    } else {
      skippedChunks += 1;
    }
  }
  return { succeededChunks, failedChunks, skippedChunks };
}

function logCompression(logger: Logger, ppid: string, results: ChunkResult[]): void {
  let rawBytes = 0;
  let storedBytes = 0;
  for (const result of results) {
    if (result.kind === "spill") {
      rawBytes += result.rawBytes;
      storedBytes += result.storedBytes;
    }
  }
  logger.info("spill_compressed", {
    ppid,
    from: formatBytes(rawBytes),
    to: formatBytes(storedBytes),
  });
}

/**
 * Probe, plan, fetch every page under the worker bound, then merge in offset order.
 * Probe and planning failures reject before any page is requested; page failures are
 * only visible in `request_logging` and the report counts.
 */
export async function harvest(request: HarvestRequest, deps: HarvestDeps): Promise<HarvestResult> {
  const { logger, metrics } = deps;
  const ppid = deps.createPpid ? deps.createPpid() : crypto.randomUUID();
  logger.info("harvest_start", { ppid, url: request.layerUrl, format: request.format, mode: request.outputMode });

  const probe = await probeLayer({ session: deps.session, logger, metrics }, request.layerUrl, request.where);
  const layerName = layerLabel(probe.layer);
  if (probe.layer.supportedQueryFormats.length > 0 && !probe.layer.supportedQueryFormats.includes(request.format)) {
    logger.warn("format_not_supported", {
      ppid,
      format: request.format,
      supported: probe.layer.supportedQueryFormats.join(","),
    });
  }

  const total = request.recordLimit !== undefined ? Math.min(probe.count, request.recordLimit) : probe.count;
  const startOffset = request.resultOffset;
  let chunks: Chunk[] = [];
  if (startOffset < total) {
    chunks = planChunks({
      total,
      parentId: ppid,
      maxPageSize: probe.layer.maxRecordCount,
      requestedPageSize: request.chunkSize,
      startOffset,
    });
  } else if (startOffset > total) {
    logger.warn("offset_beyond_total", { ppid, offset: startOffset, total });
  }
  const requested = Math.max(total - startOffset, 0);
  logger.info("harvest_planned", { ppid, total, requested, chunks: chunks.length, maxWorkers: request.maxWorkers });

  const sink = deps.sink ?? createResultSink(request.outputMode, request.spillDir);
  let run: RunReport;
  try {
    run = await runChunks(chunks, {
      ppid,
      session: deps.session,
      log: request.log,
      sink,
      logger,
      metrics,
      maxWorkers: request.maxWorkers,
      queryUrl: queryUrlFor(request.layerUrl),
      baseParameters: buildBaseParameters(
        {
          where: request.where,
          outFields: request.outFields,
          outSR: request.outSR,
          extraParams: { ...request.extraParams },
        },
        request.format,
      ),
      layerName,
      signal: deps.signal,
    });
  } catch (error) {
    if (request.cleanup) {
      await sink.cleanup();
    }
    throw error;
  }

  if (sink.mode === "spill" && run.results.length > 0) {
    logCompression(logger, ppid, run.results);
  }
  const artifacts = request.cleanup ? [] : sink.artifacts();

  let unreadableChunks = 0;
  const output = await mergeChunkResults({
    ppid,
    results: run.results,
    log: request.log,
    sink,
    metadata: probe.metadata,
    cleanup: request.cleanup,
    logger,
    metrics,
    onUnreadable: () => {
      unreadableChunks += 1;
    },
  });

  const returned = output.features.length;
  const report: HarvestReport = {
    ppid,
    layerName,
    total,
    startOffset,
    requested,
    returned,
    plannedChunks: chunks.length,
    ...countOutcomes(run),
    unreadableChunks,
    cancelled: run.cancelled,
    summary: `${returned} of ${requested} features returned`,
  };
  logger.info("harvest_complete", { ...report });

  return { output, report, artifacts };
}
