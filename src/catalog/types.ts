export interface CatalogOptions {
  /** e.g. `FeatureServer`, `MapServer`; empty keeps every type. */
  serviceTypes?: string[];
  /** Folder names; `services` selects the root listing itself. */
  folders?: string[];
  includeDefinitions?: boolean;
}

export interface ServiceEntry {
  url: string;
  name: string;
  type: string;
  directory: string;
  definition: Record<string, unknown>;
}

export interface DataSource {
  url: string;
  serviceUrl: string;
  id: number;
  name?: string;
  kind: "layer" | "table";
  properties: Record<string, unknown>;
  definition?: Record<string, unknown>;
}

export interface CatalogResult {
  ppid: string;
  root: string;
  services: ServiceEntry[];
  dataSources: DataSource[];
  failedRequests: number;
}

export class CatalogError extends Error {
  readonly url: string;

  constructor(message: string, url: string) {
    super(message);
    this.name = "CatalogError";
    this.url = url;
  }
}
