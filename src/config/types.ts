import type { LogLevel } from "../observability/types";
import type { OutputMode, QueryFormat } from "../types";

export interface OutputDirs {
  merged: string;
  logs: string;
}

export interface ClientCertificateConfig {
  pfxPath?: string;
  passphrase?: string;
  certPath?: string;
  keyPath?: string;
  caPath?: string;
}

export interface AppConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  connectTimeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  maxWorkers?: number;
  chunkSize?: number;
  outputMode: OutputMode;
  cleanupSpill: boolean;
  queryFormat: QueryFormat;
  outSR: string;
  spillDir?: string;
  clientCertificate: ClientCertificateConfig;
  logLevel: LogLevel;
  outputDirs: OutputDirs;
  storePath: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "clientCertificate">> & {
  outputDirs?: Partial<OutputDirs>;
  clientCertificate?: Partial<ClientCertificateConfig>;
};
