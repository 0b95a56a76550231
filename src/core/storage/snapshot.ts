/**
 * CSV exports: per-checkpoint history snapshots and generic tables
 */

import path from "node:path";
import { STORAGE_CONSTANTS } from "../constants";
import type { SaleRecord, SnapshotFormat } from "../types";
import { type CsvValue, toCsv } from "../utils/csv";
import { fileStamp } from "../utils/date";
import { Logger } from "../utils/logger";
import { writeFileAtomic } from "./checkpoint";

export const BASIC_SNAPSHOT_HEADER = ["name", "price", "datetime"] as const;
export const DETAILED_SNAPSHOT_HEADER = [
  "name",
  "quantity",
  "price",
  "price_per_unit",
  "status",
  "datetime",
] as const;

/** Unit price rounded to two decimals */
export function pricePerUnit(record: Pick<SaleRecord, "price" | "quantity">): number {
  return Math.round((record.price / Math.max(1, record.quantity)) * 100) / 100;
}

/** Snapshot file name, e.g. history_snapshot_batch2_20240305_140709.csv */
export function snapshotFileName(batchNumber: number | null, now: Date): string {
  const batch = batchNumber === null ? "" : `_batch${batchNumber}`;
  return `${STORAGE_CONSTANTS.SNAPSHOT_PREFIX}${batch}_${fileStamp(now)}.csv`;
}

export function renderSnapshot(
  records: readonly SaleRecord[],
  format: Exclude<SnapshotFormat, "none">,
): string {
  if (format === "basic") {
    return toCsv(
      BASIC_SNAPSHOT_HEADER,
      records.map((r) => ({ name: r.itemName, price: r.price, datetime: r.timestamp })),
    );
  }
  return toCsv(
    DETAILED_SNAPSHOT_HEADER,
    records.map((r) => ({
      name: r.itemName,
      quantity: r.quantity,
      price: r.price,
      price_per_unit: pricePerUnit(r),
      status: r.status,
      datetime: r.timestamp,
    })),
  );
}

/**
 * Writes the records received since the previous checkpoint
 * @returns Path of the written file, or null when snapshots are disabled
 * @throws PersistError when the file cannot be written
 */
export async function writeSnapshot(
  dir: string,
  records: readonly SaleRecord[],
  format: SnapshotFormat,
  batchNumber: number | null,
  now: Date = new Date(),
): Promise<string | null> {
  if (format === "none") return null;
  const file = path.join(dir, snapshotFileName(batchNumber, now));
  await writeFileAtomic(file, renderSnapshot(records, format));
  Logger.info(`History snapshot saved to ${file}`, { count: records.length });
  return file;
}

/**
 * Writes a CSV table to `file`
 * @throws PersistError when the file cannot be written
 */
export async function writeCsvFile<K extends string>(
  file: string,
  header: readonly K[],
  rows: ReadonlyArray<Record<K, CsvValue>>,
): Promise<void> {
  await writeFileAtomic(file, toCsv(header, rows));
  Logger.info(`Saved ${rows.length} rows to ${file}`, { count: rows.length });
}
