import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Chunk, HarvestFeatureCollection } from "../../types";
import { SinkSlotError } from "../baseSink";
import { createResultSink } from "../index";
import { MemorySink } from "../memorySink";
import { SpillSink } from "../spillSink";
import type { ChunkSlot } from "../types";

const CHUNK: Chunk = { offset: 1000, limit: 2, parentId: "ppid", ownId: "ppid:1000" };
const PAYLOAD: HarvestFeatureCollection = {
  type: "FeatureCollection",
  features: [
    { type: "Feature", geometry: { type: "Point", coordinates: [1, 2] }, properties: { NAME: "a" } },
    { type: "Feature", geometry: null, properties: { NAME: "b" } },
  ],
};

function slot(chunk: Chunk = CHUNK, pid = "pid-1"): ChunkSlot {
  return { chunk, ppid: "ppid", pid, layerName: "roads", requestedAt: new Date("2026-10-19T12:00:00Z") };
}

describe("MemorySink", () => {
  it("stores and returns the payload under the chunk id", async () => {
    const sink = new MemorySink();
    const result = await sink.put(slot(), PAYLOAD);

    expect(result).toEqual({
      kind: "memory",
      chunkId: "ppid:1000",
      ppid: "ppid",
      pid: "pid-1",
      offset: 1000,
      limit: 2,
      featureCount: 2,
    });
    expect(await sink.get(result)).toBe(PAYLOAD);
    expect(sink.artifacts()).toEqual([]);
  });

  it("refuses to overwrite a slot", async () => {
    const sink = new MemorySink();
    await sink.put(slot(), PAYLOAD);
    await expect(sink.put(slot(CHUNK, "pid-2"), PAYLOAD)).rejects.toBeInstanceOf(SinkSlotError);
  });
});

describe("SpillSink", () => {
  let parentDir: string;

  beforeEach(() => {
    parentDir = fs.mkdtempSync(path.join(os.tmpdir(), "spill-sink-test-"));
  });

  afterEach(() => {
    fs.rmSync(parentDir, { recursive: true, force: true });
  });

  it("writes a gzip artifact that reads back to the same payload", async () => {
    const sink = new SpillSink({ parentDir });
    const result = await sink.put(slot(), PAYLOAD);

    expect(result.kind).toBe("spill");
    expect(result.compressed).toBe(true);
    expect(result.rawBytes).toBe(Buffer.byteLength(JSON.stringify(PAYLOAD)));
    expect(path.basename(result.path)).toBe("roads_._2026-10-19t120000_._1002_._ppid_._pid-1.geojson.gz");
    const header = fs.readFileSync(result.path).subarray(0, 2);
    expect([...header]).toEqual([0x1f, 0x8b]);
    expect(await sink.get(result)).toEqual(PAYLOAD);
    expect(sink.artifacts()).toEqual([result.path]);
  });

  it("removes its directory on cleanup", async () => {
    const sink = new SpillSink({ parentDir });
    await sink.put(slot(), PAYLOAD);
    await sink.put(slot({ offset: 1002, limit: 1, parentId: "ppid", ownId: "ppid:1002" }, "pid-2"), PAYLOAD);
    expect(sink.artifacts()).toHaveLength(2);

    await sink.cleanup();

    expect(sink.artifacts()).toEqual([]);
    expect(fs.readdirSync(parentDir)).toEqual([]);
  });

  it("creates nothing until the first put", async () => {
    const sink = new SpillSink({ parentDir });
    await sink.cleanup();
    expect(fs.readdirSync(parentDir)).toEqual([]);
  });

  it("frees the slot when the write fails", async () => {
    const sink = new SpillSink({ parentDir });
    const dir = await sink.directory();
    fs.writeFileSync(path.join(dir, "roads_._2026-10-19t120000_._1002_._ppid_._pid-1.geojson.gz"), "taken");

    await expect(sink.put(slot(), PAYLOAD)).rejects.toMatchObject({ code: "EEXIST" });
    const retried = await sink.put(slot(CHUNK, "pid-2"), PAYLOAD);
    expect(retried.pid).toBe("pid-2");
  });
});

describe("createResultSink", () => {
  it("picks the variant for the output mode", () => {
    expect(createResultSink("memory").mode).toBe("memory");
    expect(createResultSink("spill", os.tmpdir()).mode).toBe("spill");
  });
});
