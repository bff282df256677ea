import { describe, expect, it } from "vitest";
import { esriFeatureSetToGeoJSON, esriGeometryToGeoJSON, isEsriFeatureSet } from "../esriJson";

// Outer rings clockwise, holes counter-clockwise.
const OUTER = [
  [0, 0],
  [0, 10],
  [10, 10],
  [10, 0],
  [0, 0],
];
const HOLE = [
  [2, 2],
  [4, 2],
  [4, 4],
  [2, 4],
  [2, 2],
];
const SECOND_OUTER = [
  [20, 20],
  [20, 30],
  [30, 30],
  [30, 20],
  [20, 20],
];

describe("esriGeometryToGeoJSON", () => {
  it("converts points, keeping z", () => {
    expect(esriGeometryToGeoJSON({ x: -72.5, y: 44.2 })).toEqual({ type: "Point", coordinates: [-72.5, 44.2] });
    expect(esriGeometryToGeoJSON({ x: 1, y: 2, z: 3 })).toEqual({ type: "Point", coordinates: [1, 2, 3] });
  });

  it("converts multipoints and polylines", () => {
    expect(esriGeometryToGeoJSON({ points: [[1, 2], [3, 4]] })).toEqual({
      type: "MultiPoint",
      coordinates: [
        [1, 2],
        [3, 4],
      ],
    });
    expect(esriGeometryToGeoJSON({ paths: [[[0, 0], [1, 1]]] })).toEqual({
      type: "LineString",
      coordinates: [
        [0, 0],
        [1, 1],
      ],
    });
    expect(esriGeometryToGeoJSON({ paths: [[[0, 0], [1, 1]], [[2, 2], [3, 3]]] })?.type).toBe("MultiLineString");
  });

  it("turns a clockwise ring with a hole into one polygon with GeoJSON winding", () => {
    expect(esriGeometryToGeoJSON({ rings: [OUTER, HOLE] })).toEqual({
      type: "Polygon",
      coordinates: [[...OUTER].reverse(), [...HOLE].reverse()],
    });
  });

  it("splits several outer rings into a multipolygon", () => {
    const geometry = esriGeometryToGeoJSON({ rings: [OUTER, SECOND_OUTER, HOLE] });
    expect(geometry).toEqual({
      type: "MultiPolygon",
      coordinates: [
        [[...OUTER].reverse(), [...HOLE].reverse()],
        [[...SECOND_OUTER].reverse()],
      ],
    });
  });

  it("closes open rings", () => {
    const open = OUTER.slice(0, 4);
    expect(esriGeometryToGeoJSON({ rings: [open] })).toEqual({ type: "Polygon", coordinates: [[...OUTER].reverse()] });
  });

  it("returns null for missing or unknown geometry", () => {
    expect(esriGeometryToGeoJSON(null)).toBeNull();
    expect(esriGeometryToGeoJSON({ curveRings: [] })).toBeNull();
  });
});

describe("esriFeatureSetToGeoJSON", () => {
  it("keeps attributes as properties and uses the object id field", () => {
    const set = {
      objectIdFieldName: "FID",
      features: [
        { attributes: { FID: 11, NAME: "A" }, geometry: { x: 0, y: 0 } },
        { attributes: null },
      ],
    };
    expect(isEsriFeatureSet(set)).toBe(true);
    expect(esriFeatureSetToGeoJSON(set)).toEqual({
      type: "FeatureCollection",
      features: [
        { type: "Feature", id: 11, geometry: { type: "Point", coordinates: [0, 0] }, properties: { FID: 11, NAME: "A" } },
        { type: "Feature", geometry: null, properties: {} },
      ],
    });
  });
});
