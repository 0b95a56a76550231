/**
 * Crawl configuration defaults and validation
 */

import { CRAWL_CONSTANTS, NAVIGATION_CONSTANTS, STORAGE_CONSTANTS } from "../constants";
import { ConfigError } from "../errors";
import type { BackoffPolicy, CrawlConfig, CrawlOptions, HistorySelectors } from "../types";
import { DEFAULT_HISTORY_SELECTORS } from "./selectors";

const DEFAULTS: Omit<CrawlConfig, "backoff" | "selectors"> = {
  baseUrl: "",
  historyPath: "history",
  totalPages: 0,
  workers: CRAWL_CONSTANTS.DEFAULT_WORKERS,
  strategy: "striped",
  checkpointEvery: CRAWL_CONSTANTS.DEFAULT_CHECKPOINT_EVERY,
  channelCapacity: CRAWL_CONSTANTS.DEFAULT_CHANNEL_CAPACITY,
  launchConcurrency: CRAWL_CONSTANTS.DEFAULT_LAUNCH_CONCURRENCY,
  navTimeoutMs: CRAWL_CONSTANTS.DEFAULT_NAV_TIMEOUT_MS,
  waitTimeoutMs: CRAWL_CONSTANTS.DEFAULT_WAIT_TIMEOUT_MS,
  stepTimeoutMs: CRAWL_CONSTANTS.DEFAULT_STEP_TIMEOUT_MS,
  sendTimeoutMs: CRAWL_CONSTANTS.DEFAULT_SEND_TIMEOUT_MS,
  navigationRetries: CRAWL_CONSTANTS.DEFAULT_NAVIGATION_RETRIES,
  extractionAttempts: CRAWL_CONSTANTS.DEFAULT_EXTRACTION_ATTEMPTS,
  dataDir: STORAGE_CONSTANTS.DEFAULT_DATA_DIR,
  dbFile: STORAGE_CONSTANTS.DEFAULT_DB_FILE,
  snapshotFormat: "basic",
};

export const DEFAULT_BACKOFF: BackoffPolicy = {
  pollAttempts: NAVIGATION_CONSTANTS.DEFAULT_POLL_ATTEMPTS,
  pollIntervalMs: NAVIGATION_CONSTANTS.DEFAULT_POLL_INTERVAL_MS,
  maxStalledClicks: NAVIGATION_CONSTANTS.DEFAULT_MAX_STALLED_CLICKS,
};

function positiveInt(value: number, field: string, min = 1): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${field} must be an integer >= ${min} (got ${value})`, field);
  }
  return value;
}

/**
 * Fills in defaults and validates a crawl configuration. One configuration
 * object covers the sequential single-session crawl (workers = 1) as well as
 * the striped multi-worker crawl.
 * @throws ConfigError on out-of-range values or a missing base URL
 */
export function resolveCrawlConfig(opts: CrawlOptions = {}): CrawlConfig {
  const c = withDefaults(DEFAULTS, opts);
  const backoff = withDefaults(DEFAULT_BACKOFF, opts.backoff ?? {});

  if (!c.baseUrl) {
    throw new ConfigError("baseUrl is required", "baseUrl");
  }
  try {
    new URL(c.baseUrl);
  } catch {
    throw new ConfigError(`baseUrl is not a valid URL: ${c.baseUrl}`, "baseUrl");
  }

  positiveInt(c.totalPages, "totalPages", 0);
  positiveInt(c.workers, "workers");
  if (c.workers > CRAWL_CONSTANTS.MAX_WORKERS) {
    throw new ConfigError(
      `workers must be <= ${CRAWL_CONSTANTS.MAX_WORKERS} (got ${c.workers})`,
      "workers",
    );
  }
  positiveInt(c.checkpointEvery, "checkpointEvery");
  positiveInt(c.channelCapacity, "channelCapacity");
  positiveInt(c.launchConcurrency, "launchConcurrency");
  positiveInt(c.navigationRetries, "navigationRetries", 0);
  positiveInt(c.extractionAttempts, "extractionAttempts");
  positiveInt(backoff.pollAttempts, "backoff.pollAttempts");
  positiveInt(backoff.pollIntervalMs, "backoff.pollIntervalMs", 0);
  positiveInt(backoff.maxStalledClicks, "backoff.maxStalledClicks");

  return {
    ...c,
    backoff,
    selectors: withDefaults<HistorySelectors>(DEFAULT_HISTORY_SELECTORS, opts.selectors ?? {}),
  };
}

/** Absolute URL of the sale-history listing */
export function historyUrl(config: Pick<CrawlConfig, "baseUrl" | "historyPath">): string {
  return new URL(config.historyPath, config.baseUrl).toString();
}

/**
 * Copies `defaults`, replacing every key the overrides set to a defined value
 * @param defaults - Complete base object
 * @param overrides - Partial overrides; undefined entries are ignored
 */
export function withDefaults<T extends object>(defaults: T, overrides: Partial<T>): T {
  const out = { ...defaults };
  for (const key in defaults) {
    const value = overrides[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** The entries of `value` whose value is defined */
export function definedFields<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) out[key] = value[key];
  }
  return out;
}

/**
 * Layers `overrides` over `base`. Nested `backoff` and `selectors` are merged
 * field by field, so overriding one poll setting keeps the others.
 */
export function mergeCrawlOptions(base: CrawlOptions, overrides: CrawlOptions = {}): CrawlOptions {
  const merged: CrawlOptions = { ...base, ...definedFields(overrides) };
  if (base.backoff || overrides.backoff) {
    merged.backoff = { ...base.backoff, ...definedFields<Partial<BackoffPolicy>>(overrides.backoff ?? {}) };
  }
  if (base.selectors || overrides.selectors) {
    merged.selectors = { ...base.selectors, ...definedFields<Partial<HistorySelectors>>(overrides.selectors ?? {}) };
  }
  return merged;
}
