import crypto from "node:crypto";
import { isRecord } from "../esri/envelope";
import { buildUrl, parseQueryParameters } from "../esri/query";
import { classifyDocumentResponse, classifyTransportError } from "../harvest/classify";
import type { RequestLog } from "../harvest/requestLog";
import type { Logger, MetricsRegistry } from "../observability";
import type { SessionProvider, SessionResponse } from "../session";
import { CatalogError, type CatalogOptions, type CatalogResult, type DataSource, type ServiceEntry } from "./types";

interface CatalogDependencies {
  session: SessionProvider;
  log: RequestLog;
  logger: Logger;
  metrics?: MetricsRegistry;
  createPpid?: () => string;
}

interface CrawlState {
  deps: CatalogDependencies;
  ppid: string;
  failed: number;
}

const ROOT_DIRECTORY = "services";

export function normalizeRestRoot(restRoot: string): string {
  return restRoot.replace(/\/+$/, "").replace(/\/services$/i, "");
}

async function fetchDocument(state: CrawlState, baseUrl: string): Promise<Record<string, unknown> | undefined> {
  const { session, log, logger, metrics } = state.deps;
  const url = buildUrl(baseUrl, { f: "json" });
  const pid = log.create(state.ppid, parseQueryParameters(url), url);
  metrics?.incrementCounter("catalog_requests");

  let response: SessionResponse;
  try {
    response = await session.execute({ url });
  } catch (error) {
    const outcome = classifyTransportError(error);
    log.finalize(pid, outcome);
    logger.warn("catalog_request_failed", { ppid: state.ppid, pid, url, status: outcome.status });
    state.failed += 1;
    return undefined;
  }

  const classified = classifyDocumentResponse(response);
  log.finalize(pid, classified.outcome);
  if (classified.ok) {
    return classified.document;
  }
  logger.warn("catalog_request_failed", { ppid: state.ppid, pid, url, status: classified.outcome.status });
  state.failed += 1;
  return undefined;
}

function listServices(document: Record<string, unknown>): Array<{ name: string; type: string }> {
  const { services } = document;
  if (!Array.isArray(services)) {
    return [];
  }
  const listed: Array<{ name: string; type: string }> = [];
  for (const service of services) {
    if (isRecord(service) && typeof service.name === "string" && typeof service.type === "string") {
      listed.push({ name: service.name, type: service.type });
    }
  }
  return listed;
}

function listFolders(document: Record<string, unknown>): string[] {
  const { folders } = document;
  return Array.isArray(folders) ? folders.filter((folder): folder is string => typeof folder === "string") : [];
}

/** Root listing first (`services`), then each folder; an empty filter keeps everything. */
function selectDirectories(root: Record<string, unknown>, folders: string[]): string[] {
  const wanted = new Set(folders);
  const directories: string[] = [];
  if ((wanted.size === 0 || wanted.has(ROOT_DIRECTORY)) && listServices(root).length > 0) {
    directories.push(ROOT_DIRECTORY);
  }
  for (const folder of listFolders(root)) {
    if (wanted.size === 0 || wanted.has(folder)) {
      directories.push(folder);
    }
  }
  return directories;
}

export function extractDataSources(services: ServiceEntry[]): DataSource[] {
  const sources: DataSource[] = [];
  for (const service of services) {
    for (const kind of ["layer", "table"] as const) {
      const entries = service.definition[kind === "layer" ? "layers" : "tables"];
      if (!Array.isArray(entries)) {
        continue;
      }
      for (const entry of entries) {
        if (!isRecord(entry) || typeof entry.id !== "number") {
          continue;
        }
        sources.push({
          url: `${service.url}/${entry.id}`,
          serviceUrl: service.url,
          id: entry.id,
          name: typeof entry.name === "string" ? entry.name : undefined,
          kind,
          properties: { ...entry },
        });
      }
    }
  }
  return sources;
}

/**
 * Walks an ArcGIS REST root one request at a time. Every request is written to the
 * request log under a single crawl ppid; only a failing root listing aborts the crawl.
 */
export async function crawlCatalog(
  deps: CatalogDependencies,
  restRoot: string,
  options: CatalogOptions = {},
): Promise<CatalogResult> {
  const root = normalizeRestRoot(restRoot);
  const state: CrawlState = { deps, ppid: deps.createPpid ? deps.createPpid() : crypto.randomUUID(), failed: 0 };
  const { logger } = deps;
  const serviceTypes = new Set(options.serviceTypes ?? []);
  logger.info("catalog_start", { ppid: state.ppid, url: root });

  const rootDocument = await fetchDocument(state, `${root}/services`);
  if (!rootDocument) {
    throw new CatalogError(`Unable to list services at ${root}/services`, root);
  }

  const services: ServiceEntry[] = [];
  for (const directory of selectDirectories(rootDocument, options.folders ?? [])) {
    const listing =
      directory === ROOT_DIRECTORY ? rootDocument : await fetchDocument(state, `${root}/services/${directory}`);
    if (!listing) {
      continue;
    }

    for (const service of listServices(listing)) {
      if (serviceTypes.size > 0 && !serviceTypes.has(service.type)) {
        continue;
      }
      const url = `${root}/services/${service.name}/${service.type}`;
      const definition = await fetchDocument(state, url);
      if (definition) {
        services.push({ url, name: service.name, type: service.type, directory, definition });
      }
    }
  }

  const dataSources = extractDataSources(services);
  if (options.includeDefinitions) {
    for (const source of dataSources) {
      source.definition = await fetchDocument(state, source.url);
    }
  }

  logger.info("catalog_complete", {
    ppid: state.ppid,
    services: services.length,
    dataSources: dataSources.length,
    failed: state.failed,
  });
  return { ppid: state.ppid, root, services, dataSources, failedRequests: state.failed };
}
