/**
 * Configuration-related types
 */

export type PartitionStrategy = "striped" | "sequential";

export type SnapshotFormat = "basic" | "detailed" | "none";

/** Selectors for the sale-history table and its pager */
export interface HistorySelectors {
  table: string;
  rows: string;
  name: string;
  price: string;
  date: string;
  time: string;
  status?: string;
  pageIndicator: string;
  nextButton: string;
  emptyState?: string;
}

/** Selectors for the live auctions table */
export interface ListingSelectors {
  table: string;
  rows: string;
  name: string;
  bid: string;
  buyout: string;
  timeLeft: string;
  pageIndicator: string;
  nextButton: string;
}

/** Polling policy used while confirming a page change after a click */
export interface BackoffPolicy {
  pollAttempts: number;
  pollIntervalMs: number;
  maxStalledClicks: number;
}

/** Options accepted by the crawl engine; omitted fields take defaults */
export interface CrawlOptions {
  baseUrl?: string;
  historyPath?: string;
  /** 0 discovers the page count from the pager */
  totalPages?: number;
  workers?: number;
  strategy?: PartitionStrategy;
  checkpointEvery?: number;
  channelCapacity?: number;
  launchConcurrency?: number;
  navTimeoutMs?: number;
  waitTimeoutMs?: number;
  stepTimeoutMs?: number;
  sendTimeoutMs?: number;
  navigationRetries?: number;
  extractionAttempts?: number;
  backoff?: Partial<BackoffPolicy>;
  dataDir?: string;
  dbFile?: string;
  snapshotFormat?: SnapshotFormat;
  selectors?: Partial<HistorySelectors>;
}

export type CrawlConfig = Required<Omit<CrawlOptions, "backoff" | "selectors">> & {
  backoff: BackoffPolicy;
  selectors: HistorySelectors;
};
