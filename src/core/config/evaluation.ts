/**
 * Listing evaluation configuration defaults and validation
 */

import { CRAWL_CONSTANTS, STORAGE_CONSTANTS } from "../constants";
import { ConfigError } from "../errors";
import type { BackoffPolicy, EvaluationConfig, EvaluationOptions, ListingSelectors } from "../types";
import { DEFAULT_BACKOFF, definedFields, withDefaults } from "./crawl";
import { DEFAULT_LISTING_SELECTORS } from "./selectors";

const DEFAULTS: Omit<EvaluationConfig, "backoff" | "selectors"> = {
  baseUrl: "",
  auctionsPath: "",
  navTimeoutMs: CRAWL_CONSTANTS.DEFAULT_NAV_TIMEOUT_MS,
  waitTimeoutMs: CRAWL_CONSTANTS.DEFAULT_WAIT_TIMEOUT_MS,
  navigationRetries: CRAWL_CONSTANTS.DEFAULT_NAVIGATION_RETRIES,
  maxPages: 0,
  dataDir: STORAGE_CONSTANTS.DEFAULT_DATA_DIR,
  dbFile: STORAGE_CONSTANTS.DEFAULT_DB_FILE,
};

/**
 * Fills in defaults and validates the evaluation options
 * @throws ConfigError on a missing base URL or negative limits
 */
export function resolveEvaluationConfig(opts: EvaluationOptions = {}): EvaluationConfig {
  const c = withDefaults(DEFAULTS, opts);
  if (!c.baseUrl) {
    throw new ConfigError("baseUrl is required", "baseUrl");
  }
  try {
    new URL(c.baseUrl);
  } catch {
    throw new ConfigError(`baseUrl is not a valid URL: ${c.baseUrl}`, "baseUrl");
  }
  if (!Number.isInteger(c.maxPages) || c.maxPages < 0) {
    throw new ConfigError(`maxPages must be an integer >= 0 (got ${c.maxPages})`, "maxPages");
  }
  if (!Number.isInteger(c.navigationRetries) || c.navigationRetries < 0) {
    throw new ConfigError(
      `navigationRetries must be an integer >= 0 (got ${c.navigationRetries})`,
      "navigationRetries",
    );
  }
  return {
    ...c,
    backoff: withDefaults(DEFAULT_BACKOFF, opts.backoff ?? {}),
    selectors: withDefaults<ListingSelectors>(DEFAULT_LISTING_SELECTORS, opts.selectors ?? {}),
  };
}

/** Absolute URL of the live auctions listing */
export function auctionsUrl(config: Pick<EvaluationConfig, "baseUrl" | "auctionsPath">): string {
  return new URL(config.auctionsPath, config.baseUrl).toString();
}

/** Layers `overrides` over `base`, merging `backoff` and `selectors` field by field */
export function mergeEvaluationOptions(
  base: EvaluationOptions,
  overrides: EvaluationOptions = {},
): EvaluationOptions {
  const merged: EvaluationOptions = { ...base, ...definedFields(overrides) };
  if (base.backoff || overrides.backoff) {
    merged.backoff = {
      ...base.backoff,
      ...definedFields<Partial<BackoffPolicy>>(overrides.backoff ?? {}),
    };
  }
  if (base.selectors || overrides.selectors) {
    merged.selectors = {
      ...base.selectors,
      ...definedFields<Partial<ListingSelectors>>(overrides.selectors ?? {}),
    };
  }
  return merged;
}
