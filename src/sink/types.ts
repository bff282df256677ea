import type { Chunk, ChunkResult, HarvestFeatureCollection, OutputMode } from "../types";

export interface ChunkSlot {
  chunk: Chunk;
  ppid: string;
  pid: string;
  layerName: string;
  requestedAt: Date;
}

/**
 * Captures one chunk's payload under its chunk id. A slot is written at most once;
 * `get` hands back the payload that `put` stored for that result.
 */
export interface ResultSink {
  readonly mode: OutputMode;
  put(slot: ChunkSlot, payload: HarvestFeatureCollection): Promise<ChunkResult>;
  get(result: ChunkResult): Promise<HarvestFeatureCollection>;
  cleanup(): Promise<void>;
  artifacts(): string[];
}
