import fs from "node:fs";
import { promisify } from "node:util";
import zlib from "node:zlib";
import { isRecord } from "../esri/envelope";
import type { HarvestedFeature, LogRecord, ServiceMetadataDocument } from "../types";

const gunzip = promisify(zlib.gunzip);

export interface HarvestDocument {
  type: string;
  features: HarvestedFeature[];
  request_logging: LogRecord[];
  request_metadata: ServiceMetadataDocument[];
}

export class HarvestDocumentError extends Error {
  readonly path: string;

  constructor(message: string, filePath: string) {
    super(message);
    this.name = "HarvestDocumentError";
    this.path = filePath;
  }
}

function isGzip(buffer: Buffer): boolean {
  return buffer.length >= 2 && buffer[0] === 0x1f && buffer[1] === 0x8b;
}

function isHarvestedFeature(value: unknown): value is HarvestedFeature {
  return (
    isRecord(value) &&
    value.type === "Feature" &&
    isRecord(value.properties) &&
    typeof value.properties.grale_uuid === "string" &&
    typeof value.properties.grale_utc === "string"
  );
}

function isLogRecord(value: unknown): value is LogRecord {
  return (
    isRecord(value) &&
    typeof value.grale_uuid === "string" &&
    typeof value.ppid === "string" &&
    typeof value.pid === "string" &&
    typeof value.status === "string" &&
    isRecord(value.parameters) &&
    Array.isArray(value.results)
  );
}

function listOf<T>(value: unknown, guard: (item: unknown) => item is T): T[] {
  return Array.isArray(value) ? value.filter(guard) : [];
}

/**
 * Reads a merged document (plain or gzip, detected from the bytes). Features without
 * lineage properties and malformed log records are dropped.
 */
export async function readHarvestDocument(filePath: string): Promise<HarvestDocument> {
  const raw = await fs.promises.readFile(filePath);
  const text = (isGzip(raw) ? await gunzip(raw) : raw).toString("utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new HarvestDocumentError(`Not a JSON document: ${filePath}`, filePath);
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.features)) {
    throw new HarvestDocumentError(`Not a feature collection: ${filePath}`, filePath);
  }

  return {
    type: typeof parsed.type === "string" ? parsed.type : "FeatureCollection",
    features: listOf(parsed.features, isHarvestedFeature),
    request_logging: listOf(parsed.request_logging, isLogRecord),
    request_metadata: listOf(parsed.request_metadata, isRecord),
  };
}
