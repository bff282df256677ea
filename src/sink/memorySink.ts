import type { ChunkResult, HarvestFeatureCollection, MemoryChunkResult } from "../types";
import { BaseSink, SinkSlotError } from "./baseSink";
import type { ChunkSlot } from "./types";

export class MemorySink extends BaseSink {
  readonly mode = "memory";
  private readonly payloads = new Map<string, HarvestFeatureCollection>();

  async put(slot: ChunkSlot, payload: HarvestFeatureCollection): Promise<MemoryChunkResult> {
    this.claimSlot(slot);
    this.payloads.set(slot.chunk.ownId, payload);
    return { kind: "memory", ...this.describe(slot, payload) };
  }

  async get(result: ChunkResult): Promise<HarvestFeatureCollection> {
    const payload = this.payloads.get(result.chunkId);
    if (!payload) {
      throw new SinkSlotError(`No payload held for chunk ${result.chunkId}`, result.chunkId);
    }
    return payload;
  }

  async cleanup(): Promise<void> {
    this.payloads.clear();
  }

  artifacts(): string[] {
    return [];
  }
}
