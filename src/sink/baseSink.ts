import type { ChunkResult, ChunkResultBase, HarvestFeatureCollection, OutputMode } from "../types";
import type { ChunkSlot, ResultSink } from "./types";

export class SinkSlotError extends Error {
  readonly chunkId: string;

  constructor(message: string, chunkId: string) {
    super(message);
    this.name = "SinkSlotError";
    this.chunkId = chunkId;
  }
}

export abstract class BaseSink implements ResultSink {
  abstract readonly mode: OutputMode;
  private readonly claimed = new Set<string>();

  abstract put(slot: ChunkSlot, payload: HarvestFeatureCollection): Promise<ChunkResult>;
  abstract get(result: ChunkResult): Promise<HarvestFeatureCollection>;
  abstract cleanup(): Promise<void>;
  abstract artifacts(): string[];

  protected claimSlot(slot: ChunkSlot): void {
    const id = slot.chunk.ownId;
    if (this.claimed.has(id)) {
      throw new SinkSlotError(`Chunk slot already written: ${id}`, id);
    }
    this.claimed.add(id);
  }

  protected releaseSlot(chunkId: string): void {
    this.claimed.delete(chunkId);
  }

  protected describe(slot: ChunkSlot, payload: HarvestFeatureCollection): ChunkResultBase {
    return {
      chunkId: slot.chunk.ownId,
      ppid: slot.ppid,
      pid: slot.pid,
      offset: slot.chunk.offset,
      limit: slot.chunk.limit,
      featureCount: payload.features.length,
    };
  }
}
