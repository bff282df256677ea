import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import zlib from "node:zlib";
import type { ChunkResult, HarvestFeatureCollection, SpilledChunkResult } from "../types";
import { artifactName } from "./artifactName";
import { BaseSink, SinkSlotError } from "./baseSink";
import type { ChunkSlot } from "./types";

const gzip = promisify(zlib.gzip);
const gunzip = promisify(zlib.gunzip);

export interface SpillSinkOptions {
  /** Parent for the per-harvest temp directory; defaults to the OS temp dir. */
  parentDir?: string;
}

/**
 * Writes each chunk payload as a gzip artifact inside a temp directory owned by one
 * harvest. Files are opened exclusively, so a name collision fails instead of overwriting.
 */
export class SpillSink extends BaseSink {
  readonly mode = "spill";
  private readonly parentDir: string;
  private dir?: Promise<string>;
  private readonly written = new Set<string>();

  constructor(options: SpillSinkOptions = {}) {
    super();
    this.parentDir = options.parentDir ?? os.tmpdir();
  }

  async put(slot: ChunkSlot, payload: HarvestFeatureCollection): Promise<SpilledChunkResult> {
    this.claimSlot(slot);
    try {
      const dir = await this.ensureDir();
      const filePath = path.join(
        dir,
        artifactName({
          layerName: slot.layerName,
          at: slot.requestedAt,
          chunkEndOffset: slot.chunk.offset + slot.chunk.limit,
          ppid: slot.ppid,
          pid: slot.pid,
        }),
      );
      const raw = Buffer.from(JSON.stringify(payload), "utf-8");
      const compressed = await gzip(raw);
      await fs.promises.writeFile(filePath, compressed, { flag: "wx" });
      this.written.add(filePath);

      return {
        kind: "spill",
        ...this.describe(slot, payload),
        path: filePath,
        compressed: true,
        rawBytes: raw.length,
        storedBytes: compressed.length,
      };
    } catch (error) {
      this.releaseSlot(slot.chunk.ownId);
      throw error;
    }
  }

  async get(result: ChunkResult): Promise<HarvestFeatureCollection> {
    if (result.kind !== "spill") {
      throw new SinkSlotError(`Chunk ${result.chunkId} was not spilled`, result.chunkId);
    }
    return readSpilledPayload(result.path);
  }

  async cleanup(): Promise<void> {
    if (!this.dir) {
      return;
    }
    const dir = await this.dir;
    await fs.promises.rm(dir, { recursive: true, force: true });
    this.written.clear();
    this.dir = undefined;
  }

  artifacts(): string[] {
    return [...this.written].sort();
  }

  directory(): Promise<string> {
    return this.ensureDir();
  }

  private ensureDir(): Promise<string> {
    if (!this.dir) {
      this.dir = fs.promises
        .mkdir(this.parentDir, { recursive: true })
        .then(() => fs.promises.mkdtemp(path.join(this.parentDir, "feature-harvest-")));
    }
    return this.dir;
  }
}

export async function readSpilledPayload(filePath: string): Promise<HarvestFeatureCollection> {
  const compressed = await fs.promises.readFile(filePath);
  const raw = await gunzip(compressed);
  return JSON.parse(raw.toString("utf-8")) as HarvestFeatureCollection;
}
