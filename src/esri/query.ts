import type { Chunk, QueryFormat, RequestParameters } from "../types";

export interface QueryOptions {
  where?: string;
  outFields?: string[] | string;
  outSR?: string;
  resultOffset?: number;
  recordLimit?: number;
  extraParams?: Record<string, string>;
}

export const DEFAULT_WHERE = "1=1";
export const DEFAULT_OUT_SR = "4326";

export function normalizeLayerUrl(layerUrl: string): string {
  return layerUrl.replace(/\/+$/, "").replace(/\/query$/i, "");
}

export function queryUrlFor(layerUrl: string): string {
  return `${normalizeLayerUrl(layerUrl)}/query`;
}

function joinFields(outFields: string[] | string | undefined): string {
  if (outFields === undefined) {
    return "*";
  }
  const fields = Array.isArray(outFields) ? outFields : outFields.split(",");
  const trimmed = fields.map((field) => field.trim()).filter((field) => field.length > 0);
  return trimmed.length > 0 ? trimmed.join(",") : "*";
}

/**
 * Parameters shared by every page of one harvest. Explicit options take precedence
 * over pass-through parameters; pagination is applied per chunk afterwards.
 */
export function buildBaseParameters(options: QueryOptions, format: QueryFormat): RequestParameters {
  return {
    ...(options.extraParams ?? {}),
    where: options.where ?? DEFAULT_WHERE,
    outFields: joinFields(options.outFields),
    outSR: options.outSR ?? DEFAULT_OUT_SR,
    returnGeometry: "true",
    f: format,
  };
}

export function withPagination(parameters: RequestParameters, chunk: Pick<Chunk, "offset" | "limit">): RequestParameters {
  return {
    ...parameters,
    resultOffset: String(chunk.offset),
    resultRecordCount: String(chunk.limit),
  };
}

export function buildUrl(baseUrl: string, parameters: RequestParameters): string {
  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(parameters)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

export function parseQueryParameters(url: string): RequestParameters {
  const parameters: RequestParameters = {};
  for (const [key, value] of new URL(url).searchParams) {
    parameters[key] = value;
  }
  return parameters;
}
