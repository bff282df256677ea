import path from "node:path";
import type { AppConfig } from "../config";
import { crawlCatalog, type CatalogOptions, type CatalogResult } from "../catalog";
import { fetchRecordCount, fetchServiceMetadata, readLayerInfo } from "../esri";
import { createHarvestRequest, harvest, type HarvestReport, type RequestLog } from "../harvest";
import type { Logger, MetricsRegistry } from "../observability";
import {
  combineHarvestDocuments,
  MERGED_EXTENSION,
  readHarvestDocument,
  writeLogJsonl,
  writeMergedOutput,
  type HarvestDocument,
} from "../output";
import type { SessionProvider } from "../session";
import { sanitizeSegment } from "../sink";
import type { HarvestSummary, LineageStore } from "../store";
import type { LogRecord, QueryFormat, ServiceMetadataDocument } from "../types";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: LineageStore;
  logger: Logger;
  metrics: MetricsRegistry;
  session: SessionProvider;
  log: RequestLog;
  signal?: AbortSignal;
}

export interface HarvestCommandOptions {
  where?: string;
  outFields?: string;
  outSR?: string;
  format?: QueryFormat;
  chunkSize?: number;
  maxWorkers?: number;
  resultOffset?: number;
  recordLimit?: number;
  lowMemory?: boolean;
  keepArtifacts?: boolean;
  outDir?: string;
  extraParams?: Record<string, string>;
}

export interface HarvestCommandResult {
  report: HarvestReport;
  outputPath: string;
  logPath: string;
  artifacts: string[];
}

export async function runHarvest(
  ctx: CommandContext,
  layerUrl: string,
  options: HarvestCommandOptions = {},
): Promise<HarvestCommandResult> {
  const { config } = ctx;
  const request = createHarvestRequest({
    layerUrl,
    where: options.where,
    outFields: options.outFields,
    outSR: options.outSR ?? config.outSR,
    format: options.format ?? config.queryFormat,
    extraParams: options.extraParams,
    chunkSize: options.chunkSize ?? config.chunkSize,
    maxWorkers: options.maxWorkers ?? config.maxWorkers,
    outputMode: options.lowMemory ? "spill" : config.outputMode,
    spillDir: config.spillDir,
    resultOffset: options.resultOffset,
    recordLimit: options.recordLimit,
    cleanup: options.keepArtifacts ? false : config.cleanupSpill,
    log: ctx.log,
  });

  const result = await harvest(request, {
    session: ctx.session,
    logger: ctx.logger,
    metrics: ctx.metrics,
    signal: ctx.signal,
  });
  const { report, output } = result;

  const outputPath = await writeMergedOutput(
    output,
    path.resolve(options.outDir ?? config.outputDirs.merged),
    sanitizeSegment(report.layerName),
  );
  const logPath = path.resolve(config.outputDirs.logs, `${report.ppid}.jsonl`);
  await writeLogJsonl(output.request_logging, logPath);
  const saved = await ctx.store.saveEntries(output.request_logging, ctx.runId);

  ctx.logger.info("harvest_written", {
    ppid: report.ppid,
    outputPath,
    logPath,
    savedEntries: saved,
    artifacts: result.artifacts.length,
    summary: report.summary,
  });
  return { report, outputPath, logPath, artifacts: result.artifacts };
}

export async function runCount(ctx: CommandContext, layerUrl: string, where?: string): Promise<number> {
  const count = await fetchRecordCount(ctx, layerUrl, where);
  ctx.logger.info("count_complete", { url: layerUrl, count });
  return count;
}

export async function runMetadata(ctx: CommandContext, layerUrl: string): Promise<ServiceMetadataDocument> {
  const metadata = await fetchServiceMetadata(ctx, layerUrl);
  const layer = readLayerInfo(metadata);
  ctx.logger.info("metadata_complete", {
    url: layerUrl,
    name: layer.name,
    id: layer.id,
    maxRecordCount: layer.maxRecordCount,
    supportedQueryFormats: layer.supportedQueryFormats.join(","),
  });
  return metadata;
}

export async function runServices(
  ctx: CommandContext,
  restRoot: string,
  options: CatalogOptions = {},
): Promise<CatalogResult> {
  const result = await crawlCatalog(ctx, restRoot, options);
  for (const source of result.dataSources) {
    ctx.logger.info("catalog_data_source", {
      url: source.url,
      name: source.name,
      kind: source.kind,
      defined: source.definition !== undefined,
    });
  }
  await ctx.store.saveEntries(ctx.log.records(result.ppid), ctx.runId);
  return result;
}

export async function runLineage(ctx: CommandContext, ppid?: string): Promise<LogRecord[] | HarvestSummary[]> {
  if (!ppid) {
    const harvests = await ctx.store.listHarvests();
    for (const entry of harvests) {
      ctx.logger.info("lineage_harvest", { ...entry });
    }
    return harvests;
  }

  const records = await ctx.store.listByPpid(ppid);
  for (const record of records) {
    ctx.logger.info("lineage_entry", {
      ppid: record.ppid,
      pid: record.pid,
      status: record.status,
      offset: Number(record.parameters.resultOffset),
      utc: record.utc_timestamp,
    });
  }
  ctx.logger.info("lineage_complete", { ppid, entries: records.length });
  return records;
}

export async function runMerge(ctx: CommandContext, inputs: string[], outPath: string): Promise<string> {
  const documents: HarvestDocument[] = [];
  for (const input of inputs) {
    documents.push(await readHarvestDocument(input));
  }
  const { output, mixedTypes } = combineHarvestDocuments(documents);
  if (mixedTypes) {
    ctx.logger.warn("merge_mixed_types", { inputs: inputs.length });
  }

  const resolved = path.resolve(outPath);
  const extension = path.extname(resolved);
  const written = await writeMergedOutput(
    output,
    path.dirname(resolved),
    path.basename(resolved, extension),
    extension || MERGED_EXTENSION,
  );
  ctx.logger.info("merge_complete", {
    inputs: inputs.length,
    features: output.features.length,
    entries: output.request_logging.length,
    outputPath: written,
  });
  return written;
}
