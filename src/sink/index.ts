import type { OutputMode } from "../types";
import { MemorySink } from "./memorySink";
import { SpillSink } from "./spillSink";
import type { ResultSink } from "./types";

export function createResultSink(mode: OutputMode, spillDir?: string): ResultSink {
  switch (mode) {
    case "memory":
      return new MemorySink();
    case "spill":
      return new SpillSink({ parentDir: spillDir });
    default:
      throw new Error(`Unsupported output mode: ${String(mode)}`);
  }
}

export * from "./artifactName";
export * from "./baseSink";
export * from "./memorySink";
export * from "./spillSink";
export * from "./types";
