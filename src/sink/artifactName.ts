export const ARTIFACT_DELIMITER = "_._";
export const SPILL_EXTENSION = "geojson.gz";

export interface ArtifactNameParts {
  layerName: string;
  timestamp: string;
  chunkEndOffset: number;
  ppid: string;
  pid: string;
  extension: string;
}

// Dots are replaced so that no segment can contain the delimiter.
export function sanitizeSegment(value: string): string {
  const cleaned = value.trim().replace(/[^A-Za-z0-9_-]+/g, "-");
  return cleaned.length > 0 ? cleaned : "layer";
}

/** `2026-10-19T12:30:05.123Z` becomes `2026-10-19t123005`. */
export function artifactTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)}t${iso.slice(11, 19).replace(/:/g, "")}`;
}

export function artifactName(parts: Omit<ArtifactNameParts, "timestamp" | "extension"> & { at: Date; extension?: string }): string {
  const stem = [
    sanitizeSegment(parts.layerName),
    artifactTimestamp(parts.at),
    String(parts.chunkEndOffset),
    sanitizeSegment(parts.ppid),
    sanitizeSegment(parts.pid),
  ].join(ARTIFACT_DELIMITER);
  return `${stem}.${parts.extension ?? SPILL_EXTENSION}`;
}

export function parseArtifactName(fileName: string): ArtifactNameParts | null {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  const segments = base.split(ARTIFACT_DELIMITER);
  if (segments.length !== 5) {
    return null;
  }

  const last = segments[4];
  const dot = last.indexOf(".");
  if (dot <= 0) {
    return null;
  }
  segments[4] = last.slice(0, dot);

  const [layerName, timestamp, endOffset, ppid, pid] = segments;
  const chunkEndOffset = Number(endOffset);
  if (!/^\d+$/.test(endOffset) || !/^\d{4}-\d{2}-\d{2}t\d{6}$/.test(timestamp)) {
    return null;
  }

  return { layerName, timestamp, chunkEndOffset, ppid, pid, extension: last.slice(dot + 1) };
}
