export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestValidationError";
  }
}

export class PlanningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanningError";
  }
}

export class ProbeError extends Error {
  readonly url: string;
  readonly status: string;
  readonly responseText?: string;

  constructor(message: string, details: { url: string; status: string; responseText?: string; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.name = "ProbeError";
    this.url = details.url;
    this.status = details.status;
    this.responseText = details.responseText;
  }
}

/** Contract violation inside the request log; always a bug in the caller. */
export class LogStateError extends Error {
  readonly pid: string;

  constructor(message: string, pid: string) {
    super(message);
    this.name = "LogStateError";
    this.pid = pid;
  }
}
