import type { AppConfig } from "../config";
import { SqliteLineageStore } from "./sqliteStore";
import type { LineageStore } from "./types";

export function createLineageStore(config: AppConfig): LineageStore {
  return new SqliteLineageStore(config.storePath);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./summarize";
export * from "./types";
