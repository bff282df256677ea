import type { ClientCertificateConfig } from "../config/types";

export interface RequestSpec {
  url: string;
  headers?: Record<string, string>;
}

export interface SessionResponse {
  statusCode: number;
  body: Buffer;
  elapsedMs: number;
}

/**
 * Executes one outbound request. Retries, timeouts and TLS client authentication
 * are owned by the implementation; callers see one result or one thrown
 * `SessionTransportError` per call.
 */
export interface SessionProvider {
  execute(spec: RequestSpec): Promise<SessionResponse>;
}

export interface SessionSettings {
  userAgent: string;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  ignoreHttpsErrors: boolean;
  clientCertificate: ClientCertificateConfig;
}
