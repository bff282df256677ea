import { isEsriFeatureSet, esriFeatureSetToGeoJSON } from "../esri/esriJson";
import { isRecord, parseEnvelope } from "../esri/envelope";
import { SessionTimeoutError, SessionTransportError, type SessionResponse } from "../session";
import type { HarvestFeatureCollection, LogOutcome } from "../types";
import { formatSuccessMessage } from "./requestLog";

export const SUCCESS_STATUS = "Success";
export const TIMEOUT_STATUS = "Timeout";
export const UNIDENTIFIED_STATUS = "Error:(Unidentified)";
export const TRANSPORT_STATUS = "Error:(Transport)";
export const SINK_STATUS = "Error:(Sink)";

export type Classification =
  | { ok: true; outcome: LogOutcome; payload: HarvestFeatureCollection }
  | { ok: false; outcome: LogOutcome };

function isFeatureCollection(value: unknown): value is HarvestFeatureCollection {
  return isRecord(value) && value.type === "FeatureCollection" && Array.isArray(value.features);
}

function failure(status: string, results: string[], response: SessionResponse): { ok: false; outcome: LogOutcome } {
  return {
    ok: false,
    outcome: { status, results, elapsedTime: response.elapsedMs, size: response.body.length },
  };
}

/**
 * Maps one completed page response to its log outcome. A service error envelope wins
 * over the HTTP status, since ArcGIS reports most failures inside a 200 body.
 */
export function classifyResponse(response: SessionResponse): Classification {
  const envelope = parseEnvelope(response.body);

  if (envelope.kind === "service_error") {
    return failure(`Error:(${envelope.code})`, [envelope.text], response);
  }
  if (response.statusCode >= 400) {
    return failure(`Error:(HTTP ${response.statusCode})`, [envelope.text], response);
  }
  if (envelope.kind === "unparseable") {
    return failure(UNIDENTIFIED_STATUS, [envelope.text], response);
  }

  let payload: HarvestFeatureCollection;
  if (isFeatureCollection(envelope.value)) {
    payload = envelope.value;
  } else if (isEsriFeatureSet(envelope.value)) {
    payload = esriFeatureSetToGeoJSON(envelope.value);
  } else {
    return failure(UNIDENTIFIED_STATUS, [envelope.text], response);
  }

  const size = response.body.length;
  return {
    ok: true,
    payload,
    outcome: {
      status: SUCCESS_STATUS,
      results: [formatSuccessMessage(size, response.elapsedMs)],
      elapsedTime: response.elapsedMs,
      size,
    },
  };
}

export type DocumentClassification =
  | { ok: true; outcome: LogOutcome; document: Record<string, unknown> }
  | { ok: false; outcome: LogOutcome };

/** Same status rules as `classifyResponse`, for catalog documents rather than feature pages. */
export function classifyDocumentResponse(response: SessionResponse): DocumentClassification {
  const envelope = parseEnvelope(response.body);

  if (envelope.kind === "service_error") {
    return failure(`Error:(${envelope.code})`, [envelope.text], response);
  }
  if (response.statusCode >= 400) {
    return failure(`Error:(HTTP ${response.statusCode})`, [envelope.text], response);
  }
  if (envelope.kind === "unparseable" || !isRecord(envelope.value)) {
    return failure(UNIDENTIFIED_STATUS, [envelope.text], response);
  }

  const size = response.body.length;
  return {
    ok: true,
    document: envelope.value,
    outcome: {
      status: SUCCESS_STATUS,
      results: [formatSuccessMessage(size, response.elapsedMs)],
      elapsedTime: response.elapsedMs,
      size,
    },
  };
}

export function classifyTransportError(error: unknown): LogOutcome {
  const message = error instanceof Error ? error.message : String(error);
  const elapsedTime = error instanceof SessionTransportError ? error.elapsedMs : 0;
  return {
    status: error instanceof SessionTimeoutError ? TIMEOUT_STATUS : TRANSPORT_STATUS,
    results: [message],
    elapsedTime,
    size: 0,
  };
}
