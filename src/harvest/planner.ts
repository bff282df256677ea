import type { Chunk } from "../types";
import { PlanningError } from "./errors";

export interface PlanInput {
  total: number;
  parentId: string;
  maxPageSize?: number;
  requestedPageSize?: number;
  startOffset?: number;
}

export function resolvePageSize(requestedPageSize: number | undefined, maxPageSize: number | undefined): number {
  const candidates = [requestedPageSize, maxPageSize].filter((value): value is number => value !== undefined);
  if (candidates.length === 0) {
    throw new PlanningError("No page size available: the service advertises no maximum and none was requested");
  }

  const pageSize = Math.min(...candidates);
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new PlanningError(`Page size must be a positive integer, got ${pageSize}`);
  }
  return pageSize;
}

export function chunkId(parentId: string, offset: number): string {
  return `${parentId}:${offset}`;
}

/**
 * Splits `[startOffset, total)` into consecutive, non-overlapping pages of at most
 * `min(requestedPageSize, maxPageSize)` records.
 */
export function planChunks(input: PlanInput): Chunk[] {
  const { total, parentId } = input;
  const startOffset = input.startOffset ?? 0;

  if (!Number.isInteger(total) || total < 0) {
    throw new PlanningError(`Total record count must be a non-negative integer, got ${total}`);
  }
  if (!Number.isInteger(startOffset) || startOffset < 0) {
    throw new PlanningError(`Start offset must be a non-negative integer, got ${startOffset}`);
  }

  const pageSize = resolvePageSize(input.requestedPageSize, input.maxPageSize);
  const chunks: Chunk[] = [];
  for (let offset = startOffset; offset < total; offset += pageSize) {
    chunks.push({
      offset,
      limit: Math.min(pageSize, total - offset),
      parentId,
      ownId: chunkId(parentId, offset),
    });
  }
  return chunks;
}
