import fs from "node:fs";
import path from "node:path";
import { isLogLevel } from "../observability/logger";
import type { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "feature-harvest/0.1",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 180_000,
  connectTimeoutMs: 30_000,
  maxRetries: 5,
  retryBackoffMs: 250,
  maxWorkers: undefined,
  chunkSize: undefined,
  outputMode: "memory",
  cleanupSpill: true,
  queryFormat: "geojson",
  outSR: "4326",
  spillDir: undefined,
  clientCertificate: {},
  logLevel: "info",
  outputDirs: {
    merged: "data/merged",
    logs: "data/logs",
  },
  storePath: "data/lineage.sqlite",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed as ConfigOverrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toOptionalInt(value: string | undefined, fallback: number | undefined): number | undefined {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    clientCertificate: {
      ...DEFAULT_CONFIG.clientCertificate,
      ...(fileConfig.clientCertificate ?? {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return {
    ...merged,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    connectTimeoutMs: toInt(env.CONNECT_TIMEOUT_MS, merged.connectTimeoutMs),
    maxRetries: toInt(env.MAX_RETRIES, merged.maxRetries),
    retryBackoffMs: toInt(env.RETRY_BACKOFF_MS, merged.retryBackoffMs),
    maxWorkers: toOptionalInt(env.MAX_WORKERS, merged.maxWorkers),
    chunkSize: toOptionalInt(env.CHUNK_SIZE, merged.chunkSize),
    outputMode: env.OUTPUT_MODE === "memory" || env.OUTPUT_MODE === "spill" ? env.OUTPUT_MODE : merged.outputMode,
    cleanupSpill: toBool(env.CLEANUP_SPILL, merged.cleanupSpill),
    queryFormat: env.QUERY_FORMAT === "geojson" || env.QUERY_FORMAT === "json" ? env.QUERY_FORMAT : merged.queryFormat,
    outSR: env.OUT_SR ?? merged.outSR,
    spillDir: env.SPILL_DIR ?? merged.spillDir,
    clientCertificate: {
      pfxPath: env.CLIENT_CERT_PFX ?? merged.clientCertificate.pfxPath,
      passphrase: env.CLIENT_CERT_PASSPHRASE ?? merged.clientCertificate.passphrase,
      certPath: env.CLIENT_CERT_PEM ?? merged.clientCertificate.certPath,
      keyPath: env.CLIENT_KEY_PEM ?? merged.clientCertificate.keyPath,
      caPath: env.CA_BUNDLE_PEM ?? merged.clientCertificate.caPath,
    },
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : merged.logLevel,
    storePath: env.STORE_PATH ?? merged.storePath,
    outputDirs: {
      merged: env.OUTPUT_MERGED_DIR ?? merged.outputDirs.merged,
      logs: env.OUTPUT_LOGS_DIR ?? merged.outputDirs.logs,
    },
  };
}

export { DEFAULT_CONFIG };
