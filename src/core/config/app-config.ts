/**
 * Centralized application configuration
 */

import type {
  CrawlOptions,
  EvaluationOptions,
  PartitionStrategy,
  SnapshotFormat,
} from "../types";
import { envBool, envChoice, envInt, envStr } from "./env";

export class AppConfig {
  // Listing configuration
  static readonly BASE_URL = envStr("BASE_URL", "");
  static readonly HISTORY_PATH = envStr("HISTORY_PATH", "history");
  static readonly AUCTIONS_PATH = envStr("AUCTIONS_PATH", "");

  // Storage configuration
  static readonly DATA_DIR = envStr("DATA_DIR", "market_data");
  static readonly DB_FILE = envStr("DB_FILE", "item_database.json");
  static readonly SNAPSHOT_FORMAT = envChoice<SnapshotFormat>(
    "SNAPSHOT_FORMAT",
    ["basic", "detailed", "none"],
    "basic",
  );

  // Browser configuration
  static readonly HEADLESS = envBool("HEADLESS", true);

  // Crawl configuration
  static readonly TOTAL_PAGES = envInt("TOTAL_PAGES", 0);
  static readonly WORKERS = envInt("WORKERS", 4);
  static readonly PARTITION_STRATEGY = envChoice<PartitionStrategy>(
    "PARTITION_STRATEGY",
    ["striped", "sequential"],
    "striped",
  );
  static readonly CHECKPOINT_EVERY = envInt("CHECKPOINT_EVERY", 40);
  static readonly CHANNEL_CAPACITY = envInt("CHANNEL_CAPACITY", 16);
  static readonly LAUNCH_CONCURRENCY = envInt("LAUNCH_CONCURRENCY", 2);
  static readonly NAV_TIMEOUT_MS = envInt("NAV_TIMEOUT_MS", 60_000);
  static readonly STEP_TIMEOUT_MS = envInt("STEP_TIMEOUT_MS", 120_000);
  static readonly POLL_ATTEMPTS = envInt("POLL_ATTEMPTS", 10);
  static readonly POLL_INTERVAL_MS = envInt("POLL_INTERVAL_MS", 500);
  static readonly MAX_STALLED_CLICKS = envInt("MAX_STALLED_CLICKS", 3);

  // Evaluation configuration
  static readonly AUCTION_MAX_PAGES = envInt("AUCTION_MAX_PAGES", 0);

  // Queue configuration
  static readonly REDIS_HOST = envStr("REDIS_HOST", "localhost");
  static readonly REDIS_PORT = envInt("REDIS_PORT", 6379);
  static readonly REDIS_PASSWORD = process.env.REDIS_PASSWORD || undefined;
  static readonly HEALTH_PORT = envInt("HEALTH_PORT", 8080);
  static readonly CRAWL_CRON = envStr("CRAWL_CRON", "0 2 * * *");
  static readonly EVALUATE_CRON = envStr("EVALUATE_CRON", "*/30 * * * *");

  /**
   * Crawl options derived from the environment
   */
  static crawlOptions(): CrawlOptions {
    return {
      baseUrl: this.BASE_URL,
      historyPath: this.HISTORY_PATH,
      totalPages: this.TOTAL_PAGES,
      workers: this.WORKERS,
      strategy: this.PARTITION_STRATEGY,
      checkpointEvery: this.CHECKPOINT_EVERY,
      channelCapacity: this.CHANNEL_CAPACITY,
      launchConcurrency: this.LAUNCH_CONCURRENCY,
      navTimeoutMs: this.NAV_TIMEOUT_MS,
      stepTimeoutMs: this.STEP_TIMEOUT_MS,
      dataDir: this.DATA_DIR,
      dbFile: this.DB_FILE,
      snapshotFormat: this.SNAPSHOT_FORMAT,
      backoff: {
        pollAttempts: this.POLL_ATTEMPTS,
        pollIntervalMs: this.POLL_INTERVAL_MS,
        maxStalledClicks: this.MAX_STALLED_CLICKS,
      },
    };
  }

  /**
   * Listing evaluation options derived from the environment
   */
  static evaluationOptions(): EvaluationOptions {
    return {
      baseUrl: this.BASE_URL,
      auctionsPath: this.AUCTIONS_PATH,
      navTimeoutMs: this.NAV_TIMEOUT_MS,
      maxPages: this.AUCTION_MAX_PAGES,
      dataDir: this.DATA_DIR,
      dbFile: this.DB_FILE,
      backoff: {
        pollAttempts: this.POLL_ATTEMPTS,
        pollIntervalMs: this.POLL_INTERVAL_MS,
        maxStalledClicks: this.MAX_STALLED_CLICKS,
      },
    };
  }
}
