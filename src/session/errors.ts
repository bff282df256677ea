export class SessionTransportError extends Error {
  readonly elapsedMs: number;
  readonly code?: string;

  constructor(message: string, elapsedMs: number, options?: { cause?: unknown; code?: string }) {
    super(message, { cause: options?.cause });
    this.name = "SessionTransportError";
    this.elapsedMs = elapsedMs;
    this.code = options?.code;
  }
}

export class SessionTimeoutError extends SessionTransportError {
  constructor(message: string, elapsedMs: number, options?: { cause?: unknown; code?: string }) {
    super(message, elapsedMs, options);
    this.name = "SessionTimeoutError";
  }
}

const TIMEOUT_CODES = new Set(["UND_ERR_CONNECT_TIMEOUT", "UND_ERR_HEADERS_TIMEOUT", "UND_ERR_BODY_TIMEOUT", "ETIMEDOUT"]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function toSessionError(error: unknown, elapsedMs: number): SessionTransportError {
  if (error instanceof SessionTransportError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = errorCode(error);
  const isTimeout =
    (code !== undefined && TIMEOUT_CODES.has(code)) || (error instanceof Error && error.name === "TimeoutError");

  if (isTimeout) {
    return new SessionTimeoutError(message, elapsedMs, { cause: error, code });
  }
  return new SessionTransportError(message, elapsedMs, { cause: error, code });
}
