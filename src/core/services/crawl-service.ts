/**
 * Crawl Service - history crawl and listing evaluation as reusable calls
 * Can be used from the CLI, BullMQ workers, or any other context
 */

import path from "node:path";
import { crawlListings } from "../analysis/listings";
import { evaluateListings, exportEvaluation, type EvaluationFiles } from "../analysis/evaluator";
import { PlaywrightDriver } from "../browser/playwright-driver";
import { AppConfig } from "../config/app-config";
import { resolveEvaluationConfig } from "../config/evaluation";
import type { CrawlControl } from "../crawl/control";
import { errorMessage } from "../errors";
import { runCrawl, type CrawlSummary } from "../execution/runner";
import { loadDatabase } from "../storage/checkpoint";
import type { CrawlOptions, EvaluationOptions, PageDriver, RecommendedAction } from "../types";
import type { Clock } from "../utils/clock";
import { Logger } from "../utils/logger";

export interface ServiceDeps {
  /** Page driver to use; a Playwright driver is created and closed when omitted */
  driver?: PageDriver;
  control?: CrawlControl;
  clock?: Clock;
}

async function withDriver<T>(
  deps: ServiceDeps,
  run: (driver: PageDriver) => Promise<T>,
): Promise<T> {
  if (deps.driver) return run(deps.driver);
  const driver = new PlaywrightDriver();
  try {
    return await run(driver);
  } finally {
    await driver.close().catch((error: unknown) => {
      Logger.warn("Closing the browser failed", { error: errorMessage(error) });
    });
  }
}

/**
 * Crawls the sale history into the item database
 * @param options - Crawl options; defaults come from the environment
 */
export async function runHistoryCrawl(
  options: CrawlOptions = AppConfig.crawlOptions(),
  deps: ServiceDeps = {},
): Promise<CrawlSummary> {
  return withDriver(deps, (driver) =>
    runCrawl(options, { driver, control: deps.control, clock: deps.clock }),
  );
}

export interface EvaluationResult {
  listings: number;
  actions: Record<RecommendedAction, number>;
  files: EvaluationFiles | null;
}

/**
 * Reads the live auctions and recommends bids against historical medians
 * @param options - Evaluation options; defaults come from the environment
 */
export async function runEvaluation(
  options: EvaluationOptions = AppConfig.evaluationOptions(),
  deps: ServiceDeps = {},
): Promise<EvaluationResult> {
  const config = resolveEvaluationConfig(options);
  const db = await loadDatabase(path.join(config.dataDir, config.dbFile));
  if (Object.keys(db).length === 0) {
    Logger.info("History database is empty; every listing will have no history");
  }

  const listings = await withDriver(deps, (driver) => crawlListings(driver, config, deps.clock, deps.control));
  const actions: Record<RecommendedAction, number> = {
    bid: 0,
    buyout: 0,
    skip: 0,
    "no history": 0,
  };
  if (listings.length === 0) {
    Logger.info("No listings extracted.");
    return { listings: 0, actions, files: null };
  }

  const recommendations = evaluateListings(listings, db);
  for (const rec of recommendations) actions[rec.action]++;
  const files = await exportEvaluation(config.dataDir, listings, recommendations);
  Logger.info("Evaluation complete", { count: listings.length, ...actions });
  return { listings: listings.length, actions, files };
}
