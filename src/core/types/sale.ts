/**
 * Sale-history types
 */

/** One completed sale read from a history row */
export interface SaleRecord {
  itemName: string;
  /** Total price in the smallest currency unit */
  price: number;
  /** ISO-8601 when the rendered date parsed, otherwise the raw text */
  timestamp: string;
  quantity: number;
  status?: string;
}

/** All records read from one confirmed page, the unit of transfer to the aggregator */
export interface PageBatch {
  pageNumber: number;
  workerId: number;
  records: SaleRecord[];
}

/**
 * A sale as persisted in the item database. Fields written by other tools
 * (older files carry `status` and `price_per_unit`) are kept as they are.
 */
export interface StoredSale {
  price: number;
  timestamp: string;
  type: "sale";
  quantity?: number;
  status?: string;
  price_per_unit?: number;
  [field: string]: unknown;
}

/** Persisted database: item name → sales in arrival order */
export type ItemDatabase = Record<string, StoredSale[]>;

/** Navigation progress of one worker */
export interface WorkerState {
  workerId: number;
  stride: number;
  currentConfirmedPage: number;
  nextTargetPage: number | null;
}

export interface ItemStats {
  count: number;
  min: number;
  max: number;
  average: number;
  median: number;
  lastSold: StoredSale | null;
}
