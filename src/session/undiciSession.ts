import { request, type Dispatcher } from "undici";
import { createDispatcher } from "../core/fetch";
import { toSessionError } from "./errors";
import type { RequestSpec, SessionProvider, SessionResponse, SessionSettings } from "./types";

export interface UndiciSessionOptions {
  dispatcher?: Dispatcher;
  sleep?: (ms: number) => Promise<void>;
}

const MAX_BACKOFF_MS = 10_000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Session over an undici dispatcher. Settings are frozen at construction; use
 * `withSettings` to derive a provider with different settings.
 */
export class UndiciSessionProvider implements SessionProvider {
  readonly settings: Readonly<SessionSettings>;
  private readonly dispatcher: Dispatcher;
  private readonly injectedDispatcher?: Dispatcher;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(settings: SessionSettings, options: UndiciSessionOptions = {}) {
    this.settings = Object.freeze({
      ...settings,
      clientCertificate: Object.freeze({ ...settings.clientCertificate }),
    });
    this.injectedDispatcher = options.dispatcher;
    this.dispatcher =
      options.dispatcher ??
      createDispatcher({
        ignoreHttpsErrors: settings.ignoreHttpsErrors,
        connectTimeoutMs: settings.connectTimeoutMs,
        clientCertificate: settings.clientCertificate,
      });
    this.sleepFn = options.sleep ?? sleep;
  }

  withSettings(overrides: Partial<SessionSettings>): UndiciSessionProvider {
    return new UndiciSessionProvider(
      { ...this.settings, ...overrides },
      { dispatcher: this.injectedDispatcher, sleep: this.sleepFn },
    );
  }

  async execute(spec: RequestSpec): Promise<SessionResponse> {
    const startedAt = performance.now();
    const elapsed = (): number => Number((performance.now() - startedAt).toFixed(3));
    let attempt = 0;

    while (true) {
      attempt += 1;
      const canRetry = attempt <= this.settings.maxRetries;

      let statusCode: number;
      let body: Buffer;
      try {
        const response = await request(spec.url, {
          method: "GET",
          dispatcher: this.dispatcher,
          headers: {
            "user-agent": this.settings.userAgent,
            accept: "application/json,application/geo+json,*/*",
            ...(spec.headers ?? {}),
          },
          headersTimeout: this.settings.requestTimeoutMs,
          bodyTimeout: this.settings.requestTimeoutMs,
        });
        statusCode = response.statusCode;
        body = Buffer.from(await response.body.arrayBuffer());
      } catch (error) {
        if (!canRetry) {
          throw toSessionError(error, elapsed());
        }
        await this.backoff(attempt);
        continue;
      }

      if (isRetriableStatus(statusCode) && canRetry) {
        await this.backoff(attempt);
        continue;
      }

      return { statusCode, body, elapsedMs: elapsed() };
    }
  }

  /** Closes the dispatcher this provider created; an injected one is left to its owner. */
  async close(): Promise<void> {
    if (!this.injectedDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async backoff(attempt: number): Promise<void> {
    const delay = Math.min(this.settings.retryBackoffMs * 2 ** (attempt - 1), MAX_BACKOFF_MS);
    if (delay > 0) {
      await this.sleepFn(delay);
    }
  }
}
