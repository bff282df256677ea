import type { AppConfig } from "../config";
import type { SessionSettings } from "./types";
import { UndiciSessionProvider } from "./undiciSession";

export function sessionSettingsFromConfig(config: AppConfig): SessionSettings {
  return {
    userAgent: config.userAgent,
    connectTimeoutMs: config.connectTimeoutMs,
    requestTimeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    retryBackoffMs: config.retryBackoffMs,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    clientCertificate: config.clientCertificate,
  };
}

export function createSession(config: AppConfig): UndiciSessionProvider {
  return new UndiciSessionProvider(sessionSettingsFromConfig(config));
}

export * from "./errors";
export * from "./types";
export * from "./undiciSession";
