/**
 * Reads sale records from the currently displayed history page
 */

import { ExtractionError } from "../errors";
import type { ElementHandle, HistorySelectors, SaleRecord, Session } from "../types";
import { type Clock, systemClock } from "../utils/clock";
import { parseSaleTimestamp } from "../utils/date";
import { Logger } from "../utils/logger";
import { parsePrice, splitQuantity } from "./parsers";

export interface ExtractOptions {
  workerId: number;
  page: number;
  waitTimeoutMs: number;
  /** Reads of an empty table before accepting zero rows */
  attempts: number;
  retryDelayMs: number;
  clock?: Clock;
}

export interface ExtractedPage {
  records: SaleRecord[];
  skipped: number;
}

/** Trimmed text of the first descendant matching `selector`, or null */
export async function cellText(row: ElementHandle, selector: string): Promise<string | null> {
  const cell = await row.query(selector);
  if (!cell) return null;
  const text = (await cell.textContent())?.trim();
  return text ? text : null;
}

/**
 * Turns one table row into a sale record
 * @throws ExtractionError when the name, price or sale date cannot be read
 */
export async function readSaleRow(
  row: ElementHandle,
  selectors: HistorySelectors,
  rowIndex: number,
): Promise<SaleRecord> {
  const rawName = await cellText(row, selectors.name);
  if (!rawName) {
    throw new ExtractionError(`Row ${rowIndex} has no item name`, rowIndex, "name");
  }
  const priceText = await cellText(row, selectors.price);
  const price = parsePrice(priceText);
  if (price === null) {
    throw new ExtractionError(
      `Row ${rowIndex} has an unreadable price: ${priceText ?? "<missing>"}`,
      rowIndex,
      "price",
    );
  }

  const date = await cellText(row, selectors.date);
  if (!date) {
    throw new ExtractionError(`Row ${rowIndex} has no sale date`, rowIndex, "timestamp");
  }
  const time = await cellText(row, selectors.time);
  const rawTimestamp = time ? `${date} ${time}` : date;

  const { name, quantity } = splitQuantity(rawName);
  const record: SaleRecord = {
    itemName: name,
    price,
    timestamp: parseSaleTimestamp(rawTimestamp) ?? rawTimestamp,
    quantity,
  };
  if (selectors.status) {
    const status = await cellText(row, selectors.status);
    if (status) record.status = status;
  }
  return record;
}

/**
 * Waits for the sale table and reads every row in page order. Rows that fail
 * to parse are skipped; an empty table is re-read before it is accepted.
 */
export async function extractHistoryPage(
  session: Session,
  selectors: HistorySelectors,
  options: ExtractOptions,
): Promise<ExtractedPage> {
  const { workerId, page, waitTimeoutMs, attempts, retryDelayMs } = options;
  const clock = options.clock ?? systemClock;

  for (let attempt = 1; ; attempt++) {
    await session.waitFor(selectors.table, waitTimeoutMs, "visible");

    if (selectors.emptyState && (await session.query(selectors.emptyState))) {
      Logger.info(`Worker ${workerId}: page ${page} shows no auctions`, { workerId, page });
      return { records: [], skipped: 0 };
    }

    const rows = await session.queryAll(selectors.rows);
    if (rows.length === 0) {
      if (attempt >= attempts) {
        Logger.warn(`Worker ${workerId}: no rows on page ${page}`, { workerId, page, attempt });
        return { records: [], skipped: 0 };
      }
      Logger.debug(`Worker ${workerId}: no rows on page ${page} yet, retrying`, {
        workerId,
        page,
        attempt,
      });
      await clock.sleep(retryDelayMs);
      continue;
    }

    const records: SaleRecord[] = [];
    let skipped = 0;
    for (const [index, row] of rows.entries()) {
      try {
        records.push(await readSaleRow(row, selectors, index));
      } catch (error) {
        if (!(error instanceof ExtractionError)) throw error;
        skipped++;
        Logger.debug(`Skipping row: ${error.message}`, { workerId, page, field: error.field });
      }
    }
    return { records, skipped };
  }
}
