import type { Logger, MetricsRegistry } from "../observability";
import { ProbeError } from "../harvest/errors";
import { classifyDocumentResponse, classifyTransportError } from "../harvest/classify";
import type { SessionProvider, SessionResponse } from "../session";
import type { ServiceMetadataDocument } from "../types";
import { readLayerInfo, type LayerInfo } from "./layer";
import { buildUrl, DEFAULT_WHERE, normalizeLayerUrl, queryUrlFor } from "./query";

export interface ProbeDeps {
  session: SessionProvider;
  logger: Logger;
  metrics?: MetricsRegistry;
}

export interface ProbeResult {
  metadata: ServiceMetadataDocument;
  layer: LayerInfo;
  count: number;
}

async function fetchProbeJson(deps: ProbeDeps, url: string): Promise<Record<string, unknown>> {
  deps.metrics?.incrementCounter("probe_requests");
  let response: SessionResponse;
  try {
    response = await deps.session.execute({ url });
  } catch (error) {
    const outcome = classifyTransportError(error);
    deps.logger.error("probe_transport_failed", { url, status: outcome.status, error: outcome.results[0] });
    throw new ProbeError(`Probe request failed (${outcome.status}): ${outcome.results[0]}`, {
      url,
      status: outcome.status,
      cause: error,
    });
  }
  deps.metrics?.recordDuration("probe_ms", response.elapsedMs);

  const classified = classifyDocumentResponse(response);
  if (!classified.ok) {
    const { status, results } = classified.outcome;
    deps.logger.error("probe_rejected", { url, status, statusCode: response.statusCode });
    throw new ProbeError(`Probe request returned ${status}`, { url, status, responseText: results[0] });
  }
  return classified.document;
}

export async function fetchServiceMetadata(deps: ProbeDeps, layerUrl: string): Promise<ServiceMetadataDocument> {
  return fetchProbeJson(deps, buildUrl(normalizeLayerUrl(layerUrl), { f: "json" }));
}

export async function fetchRecordCount(deps: ProbeDeps, layerUrl: string, where = DEFAULT_WHERE): Promise<number> {
  const url = buildUrl(queryUrlFor(layerUrl), { where, returnCountOnly: "true", f: "json" });
  const body = await fetchProbeJson(deps, url);
  const { count } = body;
  if (typeof count !== "number" || !Number.isInteger(count) || count < 0) {
    throw new ProbeError("Count response carries no valid record count", {
      url,
      status: "Error:(Unidentified)",
      responseText: JSON.stringify(body),
    });
  }
  return count;
}

/** Metadata first, then the count; either failing aborts the harvest before planning. */
export async function probeLayer(deps: ProbeDeps, layerUrl: string, where?: string): Promise<ProbeResult> {
  const metadata = await fetchServiceMetadata(deps, layerUrl);
  const count = await fetchRecordCount(deps, layerUrl, where);
  const layer = readLayerInfo(metadata);
  deps.logger.info("probe_complete", {
    url: normalizeLayerUrl(layerUrl),
    count,
    maxRecordCount: layer.maxRecordCount,
    layerName: layer.name,
  });
  return { metadata, layer, count };
}
