/**
 * Static assignment of page numbers to workers
 */

import { ConfigError } from "../errors";
import type { PartitionStrategy } from "../types";

export interface WorkerAssignment {
  workerId: number;
  /** Distance between consecutive pages of a striped assignment */
  stride: number;
  /** Pages to visit, strictly increasing */
  pages: number[];
}

/**
 * Pages for worker `workerId` under striping: workerId, workerId + W, … ≤ totalPages
 */
export function stripedPages(
  workerId: number,
  totalWorkers: number,
  totalPages: number,
): number[] {
  const pages: number[] = [];
  for (let p = workerId; p <= totalPages; p += totalWorkers) pages.push(p);
  return pages;
}

/**
 * Contiguous block of pages for worker `workerId`; blocks have ceil(P/W) pages
 * and trailing workers may get a shorter or empty block.
 */
export function sequentialPages(
  workerId: number,
  totalWorkers: number,
  totalPages: number,
): number[] {
  const size = Math.ceil(totalPages / totalWorkers);
  const start = (workerId - 1) * size + 1;
  const end = Math.min(totalPages, workerId * size);
  const pages: number[] = [];
  for (let p = start; p <= end; p++) pages.push(p);
  return pages;
}

/**
 * Splits pages 1..totalPages across `totalWorkers` workers so that every page
 * is assigned to exactly one worker. Workers whose sequence is empty are
 * still returned; they terminate immediately.
 * @throws ConfigError when totalWorkers < 1 or totalPages < 0
 */
export function partitionPages(
  totalWorkers: number,
  totalPages: number,
  strategy: PartitionStrategy = "striped",
): WorkerAssignment[] {
  if (!Number.isInteger(totalWorkers) || totalWorkers < 1) {
    throw new ConfigError(`totalWorkers must be an integer >= 1 (got ${totalWorkers})`, "workers");
  }
  if (!Number.isInteger(totalPages) || totalPages < 0) {
    throw new ConfigError(`totalPages must be an integer >= 0 (got ${totalPages})`, "totalPages");
  }

  const pick = strategy === "sequential" ? sequentialPages : stripedPages;
  return Array.from({ length: totalWorkers }, (_, i) => ({
    workerId: i + 1,
    stride: totalWorkers,
    pages: pick(i + 1, totalWorkers, totalPages),
  }));
}
