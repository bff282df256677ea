import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeFeatureService, hashedIds, quietLogger, type FakeServiceOptions } from "../../__tests__/fakeService";
import { MetricsRegistry } from "../../observability";
import { MemorySink, parseArtifactName, readSpilledPayload } from "../../sink";
import type { ChunkResult, HarvestFeatureCollection } from "../../types";
import { PlanningError, ProbeError, RequestValidationError } from "../errors";
import { createHarvestRequest, harvest, type HarvestRequestInput } from "../harvester";
import { RequestLog } from "../requestLog";

const LAYER_URL = "https://gis.example.test/arcgis/rest/services/Parcels/FeatureServer/0";
const FIXED_NOW = new Date("2026-10-19T12:30:05Z");

function fixedLog(): RequestLog {
  return new RequestLog({ createId: hashedIds(), now: () => FIXED_NOW });
}

async function run(service: FakeServiceOptions, input: Partial<HarvestRequestInput> = {}) {
  const session = new FakeFeatureService(service);
  const log = input.log ?? fixedLog();
  const result = await harvest(createHarvestRequest({ layerUrl: LAYER_URL, maxWorkers: 4, ...input, log }), {
    session,
    logger: quietLogger(),
    createPpid: () => "ppid-fixed",
  });
  return { ...result, session, log };
}

/** mulberry32; deterministic so a failing ordering can be replayed. */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

class UnreadableAt extends MemorySink {
  constructor(private readonly offset: number) {
    super();
  }

  async get(result: ChunkResult): Promise<HarvestFeatureCollection> {
    if (result.offset === this.offset) {
      throw new Error("artifact unreadable");
    }
    return super.get(result);
  }
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("harvest", () => {
  it("returns 3000 of 3050 features when one of four pages fails", async () => {
    const { output, report } = await run({
      total: 3050,
      maxRecordCount: 1000,
      faults: new Map([[3000, { kind: "service_error", code: 400, message: "Invalid or missing input parameters." }]]),
    });

    expect(report.plannedChunks).toBe(4);
    expect(output.features).toHaveLength(3000);
    expect(output.request_logging.map((record) => record.status)).toEqual([
      "Success",
      "Success",
      "Success",
      "Error:(400)",
    ]);
    expect(output.request_logging.map((record) => record.parameters.resultRecordCount)).toEqual([
      "1000",
      "1000",
      "1000",
      "50",
    ]);
    expect(report.summary).toBe("3000 of 3050 features returned");
    expect(report).toMatchObject({
      succeededChunks: 3,
      failedChunks: 1,
      skippedChunks: 0,
      unreadableChunks: 0,
      cancelled: false,
    });
  });

  it("leaves out a page that cannot be read back and keeps the rest", async () => {
    const session = new FakeFeatureService({ total: 30, maxRecordCount: 10 });
    const log = fixedLog();
    const metrics = new MetricsRegistry();

    const { output, report } = await harvest(createHarvestRequest({ layerUrl: LAYER_URL, maxWorkers: 4, log }), {
      session,
      logger: quietLogger(),
      metrics,
      createPpid: () => "ppid-fixed",
      sink: new UnreadableAt(10),
    });

    expect(output.features.map((feature) => feature.properties.OBJECTID)).toEqual([
      0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 20, 21, 22, 23, 24, 25, 26, 27, 28, 29,
    ]);
    expect(output.request_logging).toHaveLength(3);
    expect(report).toMatchObject({ succeededChunks: 3, unreadableChunks: 1, returned: 20 });
    expect(report.summary).toBe("20 of 30 features returned");
    expect(metrics.getCounters().chunks_unreadable).toBe(1);
  });

  it("keeps the raw service error text in the failed entry", async () => {
    const { output } = await run({
      total: 20,
      maxRecordCount: 10,
      faults: new Map([[10, { kind: "service_error", code: 400, message: "Bad where" }]]),
    });

    expect(output.request_logging[1].results).toEqual(['{"error":{"code":400,"message":"Bad where","details":[]}}']);
  });

  it("tags every feature with the lineage of the request that produced it", async () => {
    const { output, log } = await run({ total: 30, maxRecordCount: 10 });
    const feature = output.features[25];
    const record = output.request_logging[2];

    expect(feature.properties.OBJECTID).toBe(25);
    expect(feature.properties.grale_uuid).toBe(record.grale_uuid);
    expect(feature.properties.grale_utc).toBe("2026-10-19T12:30:05Z");
    expect(record.grale_uuid).toBe(`ppid-fixed_${record.pid}`);
    expect(log.get(record.pid)?.state).toBe("finalized");
  });

  it("adds the layer metadata with the harvest ppid", async () => {
    const { output } = await run({ total: 5, maxRecordCount: 10, name: "parcels", id: 3 });

    expect(output.request_metadata).toEqual([
      {
        name: "parcels",
        id: 3,
        maxRecordCount: 10,
        supportedQueryFormats: "JSON, geoJSON",
        ppid: "ppid-fixed",
      },
    ]);
  });

  it("aborts before planning when the count probe times out", async () => {
    const log = fixedLog();
    const session = new FakeFeatureService({ total: 3050, maxRecordCount: 1000, probeFault: "count" });

    await expect(
      harvest(createHarvestRequest({ layerUrl: LAYER_URL, log }), { session, logger: quietLogger() }),
    ).rejects.toBeInstanceOf(ProbeError);
    expect(log.size).toBe(0);
    expect(session.calls.some((url) => url.includes("resultOffset"))).toBe(false);
  });

  it("aborts when the metadata probe fails", async () => {
    const log = fixedLog();
    await expect(run({ total: 10, maxRecordCount: 10, probeFault: "metadata" }, { log })).rejects.toMatchObject({
      name: "ProbeError",
      status: "Timeout",
    });
    expect(log.snapshot()).toEqual([]);
  });

  it("plans nothing for an empty layer", async () => {
    const { output, report, session } = await run({ total: 0, maxRecordCount: 1000 });

    expect(report.plannedChunks).toBe(0);
    expect(output.features).toEqual([]);
    expect(output.request_logging).toEqual([]);
    expect(report.summary).toBe("0 of 0 features returned");
    expect(session.calls).toHaveLength(2);
  });

  it("plans nothing when the start offset is past the total", async () => {
    const { report } = await run({ total: 100, maxRecordCount: 10 }, { resultOffset: 500 });
    expect(report).toMatchObject({ plannedChunks: 0, requested: 0, startOffset: 500, total: 100 });
  });

  it("starts from the requested offset and stops at the record limit", async () => {
    const { output, report } = await run({ total: 1000, maxRecordCount: 100 }, { resultOffset: 50, recordLimit: 260 });

    expect(report.total).toBe(260);
    expect(report.plannedChunks).toBe(3);
    expect(output.features.map((feature) => feature.properties.OBJECTID)[0]).toBe(50);
    expect(output.features).toHaveLength(210);
    expect(report.summary).toBe("210 of 210 features returned");
  });

  it("uses the smaller of the requested chunk size and maxRecordCount", async () => {
    const { report } = await run({ total: 1000, maxRecordCount: 400 }, { chunkSize: 250 });
    expect(report.plannedChunks).toBe(4);
  });

  it("fails planning when no page size is known", async () => {
    await expect(run({ total: 10 })).rejects.toBeInstanceOf(PlanningError);
  });

  it("produces identical output whatever order the pages complete in", async () => {
    const baseline = JSON.stringify((await run({ total: 95, maxRecordCount: 10 })).output);
    const random = seededRandom(20261019);

    for (let iteration = 0; iteration < 8; iteration += 1) {
      const delays = new Map<number, number>();
      for (let offset = 0; offset < 95; offset += 10) {
        delays.set(offset, Math.floor(random() * 15));
      }
      const shuffled = await run({ total: 95, maxRecordCount: 10, delayFor: (offset) => delays.get(offset) ?? 0 });

      expect(JSON.stringify(shuffled.output)).toBe(baseline);
    }
  });
});

describe("harvest with spilled pages", () => {
  let parentDir: string;

  beforeEach(() => {
    parentDir = fs.mkdtempSync(path.join(os.tmpdir(), "harvest-spill-test-"));
  });

  afterEach(() => {
    fs.rmSync(parentDir, { recursive: true, force: true });
  });

  it("removes every artifact after the merge when cleanup is set", async () => {
    const { output, artifacts } = await run(
      { total: 35, maxRecordCount: 10 },
      { outputMode: "spill", spillDir: parentDir, cleanup: true },
    );

    expect(output.features).toHaveLength(35);
    expect(artifacts).toEqual([]);
    expect(fs.readdirSync(parentDir)).toEqual([]);
  });

  it("leaves one readable artifact per page when cleanup is off", async () => {
    const { output, artifacts } = await run(
      { total: 35, maxRecordCount: 10, name: "parcels" },
      { outputMode: "spill", spillDir: parentDir, cleanup: false },
    );

    expect(output.features).toHaveLength(35);
    expect(artifacts).toHaveLength(4);
    for (const artifact of artifacts) {
      expect(fs.existsSync(artifact)).toBe(true);
    }

    const endOffsets = artifacts.map((artifact) => parseArtifactName(artifact)?.chunkEndOffset).sort((a, b) => (a ?? 0) - (b ?? 0));
    expect(endOffsets).toEqual([10, 20, 30, 35]);

    const last = artifacts.find((artifact) => parseArtifactName(artifact)?.chunkEndOffset === 35);
    expect(last).toBeDefined();
    if (last) {
      const payload = await readSpilledPayload(last);
      expect(payload.features.map((feature) => feature.id)).toEqual([30, 31, 32, 33, 34]);
      expect(parseArtifactName(last)).toMatchObject({
        layerName: "parcels",
        timestamp: "2026-10-19t123005",
        ppid: "ppid-fixed",
        extension: "geojson.gz",
      });
    }
  });
});

describe("createHarvestRequest", () => {
  it("rejects malformed URLs and options", () => {
    expect(() => createHarvestRequest({ layerUrl: "not a url" })).toThrow(RequestValidationError);
    expect(() => createHarvestRequest({ layerUrl: "ftp://gis.example.test/layer/0" })).toThrow(RequestValidationError);
    expect(() => createHarvestRequest({ layerUrl: LAYER_URL, chunkSize: 0 })).toThrow(RequestValidationError);
    expect(() => createHarvestRequest({ layerUrl: LAYER_URL, maxWorkers: -2 })).toThrow(RequestValidationError);
    expect(() => createHarvestRequest({ layerUrl: LAYER_URL, resultOffset: 1.5 })).toThrow(RequestValidationError);
  });

  it("refuses pagination keys among the extra parameters", () => {
    expect(() => createHarvestRequest({ layerUrl: LAYER_URL, extraParams: { resultOffset: "500" } })).toThrow(
      new RequestValidationError("resultOffset is set per chunk and cannot be passed as an extra parameter"),
    );
    expect(() => createHarvestRequest({ layerUrl: LAYER_URL, extraParams: { RESULTRECORDCOUNT: "5" } })).toThrow(
      RequestValidationError,
    );
    expect(createHarvestRequest({ layerUrl: LAYER_URL, extraParams: { gdbVersion: "qa" } }).extraParams).toEqual({
      gdbVersion: "qa",
    });
  });

  it("fills defaults and freezes the request", () => {
    const request = createHarvestRequest({ layerUrl: `${LAYER_URL}/query/` });

    expect(request.layerUrl).toBe(LAYER_URL);
    expect(request).toMatchObject({ format: "geojson", outputMode: "memory", cleanup: true, resultOffset: 0 });
    expect(request.maxWorkers).toBeGreaterThanOrEqual(5);
    expect(request.maxWorkers).toBeLessThanOrEqual(32);
    expect(Object.isFrozen(request)).toBe(true);
  });
});
