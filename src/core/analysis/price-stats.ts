/**
 * Historical price statistics
 */

import type { ItemDatabase, ItemStats } from "../types";

/** Median of `values`; the mean of the two middle values for an even count */
export function median(values: readonly number[]): number {
  if (values.length === 0) throw new RangeError("median of an empty list");
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Price statistics for one item
 * @returns null when the item has no recorded sales
 */
export function getItemStats(db: ItemDatabase, itemName: string): ItemStats | null {
  const sales = Object.hasOwn(db, itemName) ? db[itemName] : undefined;
  if (!sales || sales.length === 0) return null;

  const prices = sales.map((s) => s.price);
  return {
    count: prices.length,
    min: Math.min(...prices),
    max: Math.max(...prices),
    average: prices.reduce((sum, p) => sum + p, 0) / prices.length,
    median: median(prices),
    lastSold: sales[sales.length - 1],
  };
}
