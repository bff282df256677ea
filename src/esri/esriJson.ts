import type { Geometry, Position } from "geojson";
import type { HarvestFeatureCollection, SourceFeature } from "../types";
import { isRecord } from "./envelope";

// Esri JSON (f=json) feature sets. Polygon rings are clockwise for outer
// boundaries and counter-clockwise for holes; GeoJSON wants the reverse.

interface EsriFeature {
  attributes?: Record<string, unknown> | null;
  geometry?: unknown;
}

export interface EsriFeatureSet {
  features: EsriFeature[];
  objectIdFieldName?: string;
  geometryType?: string;
}

function isPosition(value: unknown): value is Position {
  return Array.isArray(value) && value.length >= 2 && value.every((n) => typeof n === "number");
}

function isPositionList(value: unknown): value is Position[] {
  return Array.isArray(value) && value.every(isPosition);
}

function isPositionLists(value: unknown): value is Position[][] {
  return Array.isArray(value) && value.every(isPositionList);
}

export function isEsriFeatureSet(value: unknown): value is EsriFeatureSet {
  return isRecord(value) && Array.isArray(value.features) && value.features.every(isRecord);
}

function signedArea(ring: Position[]): number {
  let total = 0;
  for (let i = 0; i < ring.length - 1; i += 1) {
    const [x1, y1] = ring[i];
    const [x2, y2] = ring[i + 1];
    total += (x2 - x1) * (y2 + y1);
  }
  return total;
}

function isClockwise(ring: Position[]): boolean {
  return signedArea(ring) > 0;
}

function closeRing(ring: Position[]): Position[] {
  if (ring.length === 0) {
    return ring;
  }
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first[0] === last[0] && first[1] === last[1]) {
    return ring;
  }
  return [...ring, first];
}

function ringContains(ring: Position[], point: Position): boolean {
  const [x, y] = point;
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i, i += 1) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    const crosses = yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi;
    if (crosses) {
      inside = !inside;
    }
  }
  return inside;
}

function ringsToGeometry(rawRings: Position[][]): Geometry | null {
  const rings = rawRings.map(closeRing).filter((ring) => ring.length >= 4);
  const polygons: Position[][][] = [];
  const holes: Position[][] = [];

  for (const ring of rings) {
    if (isClockwise(ring)) {
      polygons.push([[...ring].reverse()]);
    } else {
      holes.push([...ring].reverse());
    }
  }

  for (const hole of holes) {
    const owner = polygons.find((polygon) => ringContains(polygon[0], hole[0]));
    if (owner) {
      owner.push(hole);
    } else {
      // Orphaned holes are kept as shells rather than dropped.
      polygons.push([[...hole].reverse()]);
    }
  }

  if (polygons.length === 0) {
    return null;
  }
  if (polygons.length === 1) {
    return { type: "Polygon", coordinates: polygons[0] };
  }
  return { type: "MultiPolygon", coordinates: polygons };
}

export function esriGeometryToGeoJSON(geometry: unknown): Geometry | null {
  if (!isRecord(geometry)) {
    return null;
  }

  if (typeof geometry.x === "number" && typeof geometry.y === "number") {
    const position: Position = typeof geometry.z === "number" ? [geometry.x, geometry.y, geometry.z] : [geometry.x, geometry.y];
    return { type: "Point", coordinates: position };
  }

  if (isPositionList(geometry.points)) {
    return { type: "MultiPoint", coordinates: geometry.points };
  }

  if (isPositionLists(geometry.paths)) {
    if (geometry.paths.length === 1) {
      return { type: "LineString", coordinates: geometry.paths[0] };
    }
    return { type: "MultiLineString", coordinates: geometry.paths };
  }

  if (isPositionLists(geometry.rings)) {
    return ringsToGeometry(geometry.rings);
  }

  return null;
}

export function esriFeatureSetToGeoJSON(featureSet: EsriFeatureSet): HarvestFeatureCollection {
  const idField = featureSet.objectIdFieldName;
  const features: SourceFeature[] = featureSet.features.map((esriFeature) => {
    const properties: Record<string, unknown> = isRecord(esriFeature.attributes) ? { ...esriFeature.attributes } : {};
    const rawId = idField ? properties[idField] : undefined;
    const feature: SourceFeature = {
      type: "Feature",
      geometry: esriGeometryToGeoJSON(esriFeature.geometry),
      properties,
    };
    if (typeof rawId === "number" || typeof rawId === "string") {
      feature.id = rawId;
    }
    return feature;
  });

  return { type: "FeatureCollection", features };
}
