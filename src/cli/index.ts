import { loadConfig } from "../config";
import {
  runCount,
  runHarvest,
  runLineage,
  runMerge,
  runMetadata,
  runServices,
  type CommandContext,
  type HarvestCommandOptions,
} from "../core/commands";
import { hasClientCertificate } from "../core/fetch";
import type { CatalogOptions } from "../catalog";
import { RequestLog } from "../harvest";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSession } from "../session";
import { createLineageStore, type LineageStore } from "../store";
import type { QueryFormat } from "../types";

export type CommandName = "harvest" | "count" | "metadata" | "services" | "lineage" | "merge";

export interface ParsedCliArgs {
  command: CommandName;
  positionals: string[];
  configPath?: string;
  ignoreHttpsErrors: boolean;
  where?: string;
  harvest: HarvestCommandOptions;
  catalog: CatalogOptions;
  outPath?: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const HELP_TEXT = `
Usage:
  feature-harvest <command> [options]

Commands:
  harvest <layerUrl>      Download every feature of a layer into one GeoJSON document
  count <layerUrl>        Print the layer's record count
  metadata <layerUrl>     Print the layer's metadata summary
  services <restRoot>     List services and data sources under an ArcGIS REST root
  lineage [ppid]          Show stored request log entries for a harvest, or list harvests
  merge <files...> --out <path>  Combine harvested documents

Options:
  --config <path>          Optional path to JSON config file
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  --where <clause>         Query filter (default 1=1)
  --out-fields <a,b>       Fields to return (default *)
  --out-sr <wkid>          Output spatial reference (default 4326)
  --format <geojson|json>  Query response format
  --chunk-size <n>         Records per request, capped by the layer's maxRecordCount
  --max-workers <n>        Concurrent requests
  --offset <n>             First record offset
  --limit <n>              Maximum records to plan for
  --low-memory             Spill pages to gzip temp files instead of memory
  --keep-artifacts         Keep spilled temp files after the merge
  --out-dir <dir>          Directory for the merged document
  --param <key=value>      Extra query parameter, repeatable
  --types <a,b>            Service types for services (e.g. FeatureServer,MapServer)
  --folders <a,b>          Folders for services ("services" is the root listing)
  --definitions            Also fetch each data source definition
  --out <path>             Output path for merge
  -h, --help               Show this help
`;

const VALUE_OPTIONS = new Set([
  "--config",
  "--where",
  "--out-fields",
  "--out-sr",
  "--format",
  "--chunk-size",
  "--max-workers",
  "--offset",
  "--limit",
  "--out-dir",
  "--param",
  "--types",
  "--folders",
  "--out",
]);

const FLAG_OPTIONS = new Set(["--ignore-https-errors", "--low-memory", "--keep-artifacts", "--definitions"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (
    raw === "harvest" ||
    raw === "count" ||
    raw === "metadata" ||
    raw === "services" ||
    raw === "lineage" ||
    raw === "merge"
  ) {
    return raw;
  }
  return undefined;
}

function parseInteger(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== raw.trim()) {
    throw new CliUsageError(`${name} expects an integer, got "${raw}"`);
  }
  return parsed;
}

function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function parseFormat(raw: string | undefined): QueryFormat | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const lowered = raw.toLowerCase();
  if (lowered === "geojson" || lowered === "json") {
    return lowered;
  }
  throw new CliUsageError(`--format expects geojson or json, got "${raw}"`);
}

function parseParam(raw: string): [string, string] {
  const separator = raw.indexOf("=");
  if (separator <= 0) {
    throw new CliUsageError(`--param expects key=value, got "${raw}"`);
  }
  return [raw.slice(0, separator), raw.slice(separator + 1)];
}

function requiredPositionals(command: CommandName): number {
  switch (command) {
    case "lineage":
      return 0;
    default:
      return 1;
  }
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const values = new Map<string, string>();
  const params: Record<string, string> = {};
  const flags = new Set<string>();
  const positionals: string[] = [];

  for (let index = 1; index < argv.length; index += 1) {
    const arg = argv[index];
    if (VALUE_OPTIONS.has(arg)) {
      const value = argv[index + 1];
      if (value === undefined) {
        throw new CliUsageError(`${arg} requires a value`);
      }
      index += 1;
      if (arg === "--param") {
        const [key, paramValue] = parseParam(value);
        params[key] = paramValue;
      } else {
        values.set(arg, value);
      }
    } else if (FLAG_OPTIONS.has(arg)) {
      flags.add(arg);
    } else if (arg.startsWith("--")) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length < requiredPositionals(command)) {
    throw new CliUsageError(`${command} requires an argument`);
  }
  const outPath = values.get("--out");
  if (command === "merge" && !outPath) {
    throw new CliUsageError("merge requires --out <path>");
  }

  return {
    command,
    positionals,
    configPath: values.get("--config"),
    ignoreHttpsErrors: flags.has("--ignore-https-errors"),
    where: values.get("--where"),
    harvest: {
      where: values.get("--where"),
      outFields: values.get("--out-fields"),
      outSR: values.get("--out-sr"),
      format: parseFormat(values.get("--format")),
      chunkSize: parseInteger("--chunk-size", values.get("--chunk-size")),
      maxWorkers: parseInteger("--max-workers", values.get("--max-workers")),
      resultOffset: parseInteger("--offset", values.get("--offset")),
      recordLimit: parseInteger("--limit", values.get("--limit")),
      lowMemory: flags.has("--low-memory"),
      keepArtifacts: flags.has("--keep-artifacts"),
      outDir: values.get("--out-dir"),
      extraParams: Object.keys(params).length > 0 ? params : undefined,
    },
    catalog: {
      serviceTypes: parseList(values.get("--types")),
      folders: parseList(values.get("--folders")),
      includeDefinitions: flags.has("--definitions"),
    },
    outPath,
  };
}

async function dispatch(parsed: ParsedCliArgs, ctx: CommandContext): Promise<number> {
  const [target] = parsed.positionals;
  switch (parsed.command) {
    case "harvest": {
      const result = await runHarvest({ ...ctx, logger: ctx.logger.child("harvest") }, target, parsed.harvest);
      return result.report.cancelled ? 130 : 0;
    }
    case "count":
      await runCount({ ...ctx, logger: ctx.logger.child("count") }, target, parsed.where);
      return 0;
    case "metadata":
      await runMetadata({ ...ctx, logger: ctx.logger.child("metadata") }, target);
      return 0;
    case "services":
      await runServices({ ...ctx, logger: ctx.logger.child("catalog") }, target, parsed.catalog);
      return 0;
    case "lineage":
      await runLineage({ ...ctx, logger: ctx.logger.child("lineage") }, target);
      return 0;
    case "merge":
      await runMerge({ ...ctx, logger: ctx.logger.child("merge") }, parsed.positionals, parsed.outPath ?? "merged.geojson");
      return 0;
    default:
      console.error(`Unsupported command: ${String(parsed.command)}`);
      return 1;
  }
}

function parseOrReport(argv: string[]): ParsedCliArgs | "help" | CliUsageError {
  try {
    return parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      return error;
    }
    throw error;
  }
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseOrReport(argv);
  if (parsed instanceof CliUsageError) {
    console.error(parsed.message);
    console.error(HELP_TEXT.trim());
    return 2;
  }
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }
  const runId = createRunId();
  const session = createSession(config);
  let store: LineageStore;
  try {
    store = createLineageStore(config);
  } catch (error) {
    await session.close();
    throw error;
  }
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const controller = new AbortController();
  const context: CommandContext = {
    runId,
    config,
    store,
    logger,
    metrics,
    session,
    log: new RequestLog(),
    signal: controller.signal,
  };

  const onSigint = (): void => {
    logger.warn("cancel_requested", { command: parsed.command });
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  logger.info("command_start", {
    command: parsed.command,
    target: parsed.positionals[0],
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    clientCertificate: hasClientCertificate(config.clientCertificate),
  });
  await store.startRun(runId, parsed.command, new Date().toISOString());

  try {
    const exitCode = await dispatch(parsed, context);
    await store.finishRun(runId, exitCode === 0 ? "completed" : "failed", new Date().toISOString());
    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } catch (error) {
    logger.error("command_failed", {
      command: parsed.command,
      errorName: error instanceof Error ? error.name : "Error",
      error: error instanceof Error ? error.message : String(error),
    });
    await store.finishRun(runId, "failed", new Date().toISOString());
    throw error;
  } finally {
    process.removeListener("SIGINT", onSigint);
    await session.close();
    await store.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
