/**
 * Application constants
 */

// Crawl constants
export const CRAWL_CONSTANTS = {
  DEFAULT_WORKERS: 4,
  MAX_WORKERS: 32,
  DEFAULT_CHECKPOINT_EVERY: 40, // pages per checkpoint
  DEFAULT_CHANNEL_CAPACITY: 16,
  DEFAULT_LAUNCH_CONCURRENCY: 2, // browsers launched at once, avoids memory spikes
  DEFAULT_NAV_TIMEOUT_MS: 60_000,
  DEFAULT_WAIT_TIMEOUT_MS: 15_000,
  DEFAULT_STEP_TIMEOUT_MS: 120_000,
  DEFAULT_SEND_TIMEOUT_MS: 300_000,
  DEFAULT_NAVIGATION_RETRIES: 2,
  DEFAULT_EXTRACTION_ATTEMPTS: 3,
  EXTRACTION_RETRY_DELAY_MS: 3000,
  PROGRESS_EVERY_PAGES: 10,
} as const;

// Navigation polling constants
export const NAVIGATION_CONSTANTS = {
  DEFAULT_POLL_ATTEMPTS: 10,
  DEFAULT_POLL_INTERVAL_MS: 500,
  DEFAULT_MAX_STALLED_CLICKS: 3,
} as const;

// Storage constants
export const STORAGE_CONSTANTS = {
  DEFAULT_DATA_DIR: "market_data",
  DEFAULT_DB_FILE: "item_database.json",
  SNAPSHOT_PREFIX: "history_snapshot",
  LISTINGS_FILE: "auction_full_listings.csv",
  RECOMMENDATIONS_FILE: "auction_recommendations.csv",
} as const;

// Browser constants
export const BROWSER_CONSTANTS = {
  VIEWPORT: { width: 1280, height: 1024 },
  BLOCKED_RESOURCE_TYPES: ["image", "font", "stylesheet"],
  LAUNCH_ARGS: ["--disable-dev-shm-usage", "--no-sandbox"],
} as const;
