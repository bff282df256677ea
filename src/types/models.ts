import type { Feature, FeatureCollection, Geometry } from "geojson";

export type QueryFormat = "geojson" | "json";

export type OutputMode = "memory" | "spill";

export interface Chunk {
  offset: number;
  limit: number;
  parentId: string;
  ownId: string;
}

export type RequestParameters = Record<string, string>;

export interface LogEntryBase {
  pid: string;
  ppid: string;
  graleId: string;
  utcTimestamp: string;
  parameters: RequestParameters;
  request: string;
}

export interface InFlightLogEntry extends LogEntryBase {
  state: "in_flight";
}

export interface FinalizedLogEntry extends LogEntryBase {
  state: "finalized";
  status: string;
  results: string[];
  elapsedTime: number;
  size: number;
}

export type LogEntry = InFlightLogEntry | FinalizedLogEntry;

export interface LogOutcome {
  status: string;
  results: string[];
  elapsedTime: number;
  size: number;
}

/**
 * Read-only view of a log entry as it appears in merged output, exports and the lineage store.
 */
export interface LogRecord {
  grale_uuid: string;
  ppid: string;
  pid: string;
  utc_timestamp: string;
  request: string;
  parameters: RequestParameters;
  status: string;
  results: string[];
  elapsed_time: string;
  size: string;
}

export interface ChunkResultBase {
  chunkId: string;
  ppid: string;
  pid: string;
  offset: number;
  limit: number;
  featureCount: number;
}

export interface MemoryChunkResult extends ChunkResultBase {
  kind: "memory";
}

export interface SpilledChunkResult extends ChunkResultBase {
  kind: "spill";
  path: string;
  compressed: true;
  rawBytes: number;
  storedBytes: number;
}

export type ChunkResult = MemoryChunkResult | SpilledChunkResult;

export interface LineageProperties {
  grale_utc: string;
  grale_uuid: string;
}

export type SourceFeature = Feature<Geometry | null>;

export type HarvestFeatureCollection = FeatureCollection<Geometry | null>;

export type HarvestedFeature = SourceFeature & {
  properties: Record<string, unknown> & LineageProperties;
};

export type ServiceMetadataDocument = Record<string, unknown>;

export interface MergedOutput {
  type: "FeatureCollection";
  features: HarvestedFeature[];
  request_logging: LogRecord[];
  request_metadata: ServiceMetadataDocument[];
}

