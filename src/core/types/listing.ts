/**
 * Live auction listing types
 */

import type { BackoffPolicy, ListingSelectors } from "./config";

export interface AuctionListing {
  name: string;
  bidPrice: number;
  buyoutPrice: number | null;
  /** Minutes until the auction closes */
  timeLeft: number;
  rawTime: string;
}

export type RecommendedAction = "bid" | "buyout" | "skip" | "no history";

export interface Recommendation extends AuctionListing {
  historicalMedian: number | null;
  action: RecommendedAction;
}

/** Options for the listing evaluation; omitted fields take defaults */
export interface EvaluationOptions {
  baseUrl?: string;
  auctionsPath?: string;
  navTimeoutMs?: number;
  waitTimeoutMs?: number;
  navigationRetries?: number;
  /** Stop after this many pages; 0 reads until the pager ends */
  maxPages?: number;
  backoff?: Partial<BackoffPolicy>;
  dataDir?: string;
  dbFile?: string;
  selectors?: Partial<ListingSelectors>;
}

export type EvaluationConfig = Required<Omit<EvaluationOptions, "backoff" | "selectors">> & {
  backoff: BackoffPolicy;
  selectors: ListingSelectors;
};
