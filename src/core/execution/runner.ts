/**
 * Main execution runner
 */

import path from "node:path";
import pLimit from "p-limit";
import { resolveCrawlConfig } from "../config/crawl";
import { CRAWL_CONSTANTS } from "../constants";
import { ResultChannel } from "../crawl/channel";
import { CrawlControl } from "../crawl/control";
import { discoverTotalPages } from "../crawl/discovery";
import { partitionPages } from "../crawl/partition";
import { CrawlWorker, type WorkerReport } from "../crawl/worker";
import { CrawlError } from "../errors";
import { loadDatabase } from "../storage/checkpoint";
import { DedupStore } from "../storage/dedup-store";
import type { CrawlOptions, PageBatch, PageDriver } from "../types";
import { type Clock, systemClock } from "../utils/clock";
import { formatDuration } from "../utils/date";
import { Logger } from "../utils/logger";
import { Aggregator, type AggregatorStats } from "./aggregator";

export interface CrawlDeps {
  driver: PageDriver;
  control?: CrawlControl;
  clock?: Clock;
  now?: () => Date;
}

export interface CrawlSummary {
  totalPages: number;
  dbPath: string;
  workers: WorkerReport[];
  stats: AggregatorStats;
  /** False when the final checkpoint could not be written */
  persisted: boolean;
  /** Pages no worker delivered */
  missingPages: number[];
  durationSec: number;
}

/**
 * Runs one partitioned crawl of the sale history: W workers feed a bounded
 * channel drained by a single aggregator, which checkpoints every K pages and
 * flushes once all workers have ended. Worker failures only reduce coverage.
 * @param options - Crawl options; omitted fields take defaults
 * @param deps - Page driver and optional control, clock and date source
 * @throws ConfigError on invalid options or an unreadable database file
 * @throws CrawlError when no worker could open a session
 * @throws the aggregator's error when ingesting or checkpointing fails unexpectedly
 */
export async function runCrawl(options: CrawlOptions, deps: CrawlDeps): Promise<CrawlSummary> {
  const config = resolveCrawlConfig(options);
  const clock = deps.clock ?? systemClock;
  const control = deps.control ?? new CrawlControl();
  const t0 = clock.now();
  const dbPath = path.join(config.dataDir, config.dbFile);

  const store = DedupStore.fromDatabase(await loadDatabase(dbPath));
  Logger.info(`Loaded ${store.recordCount} sales for ${store.itemCount} items`, { path: dbPath });

  const totalPages = config.totalPages || (await discoverTotalPages(deps.driver, config, clock));
  const assignments = partitionPages(config.workers, totalPages, config.strategy);
  Logger.info(`Starting crawl of ${totalPages} pages with ${config.workers} workers`, {
    count: totalPages,
    strategy: config.strategy,
  });

  const channel = new ResultChannel<PageBatch>(config.channelCapacity);
  const aggregator = new Aggregator({
    dbPath,
    dataDir: config.dataDir,
    checkpointEvery: config.checkpointEvery,
    snapshotFormat: config.snapshotFormat,
    store,
    now: deps.now,
  });

  const progressEvery = CRAWL_CONSTANTS.PROGRESS_EVERY_PAGES;
  const draining = aggregator
    .drain(channel, (stats) => {
      if (stats.pagesIngested % progressEvery !== 0) return;
      const elapsedSec = Math.max(0.001, (clock.now() - t0) / 1000);
      Logger.crawlProgress(stats.pagesIngested, totalPages, stats.pagesIngested / elapsedSec);
    })
    .then(
      () => null,
      (error: unknown) => {
        Logger.error("Aggregator failed; stopping workers", error);
        control.stop();
        channel.close();
        return { error };
      },
    );

  const launchLimit = pLimit(config.launchConcurrency);
  const reports = await Promise.all(
    assignments.map((assignment) =>
      new CrawlWorker({ driver: deps.driver, channel, config, control, clock, launchLimit }).run(
        assignment,
      ),
    ),
  );
  channel.close();

  const aggregatorFailure = await draining;
  if (aggregatorFailure) throw aggregatorFailure.error;

  const attempted = reports.filter((r) => assignments[r.workerId - 1].pages.length > 0);
  if (attempted.length > 0 && attempted.every((r) => r.outcome === "session-failed")) {
    throw new CrawlError("No worker could open a browser session", {
      cause: attempted[0].error,
    });
  }

  const persisted = await aggregator.finalFlush();

  const delivered = new Set(reports.flatMap((r) => r.visitedPages));
  const missingPages: number[] = [];
  for (let page = 1; page <= totalPages; page++) {
    if (!delivered.has(page)) missingPages.push(page);
  }

  const durationSec = (clock.now() - t0) / 1000;
  const stats = aggregator.stats;
  Logger.info(
    `Crawl done pages=${stats.pagesIngested}/${totalPages} new=${stats.recordsAdded} ` +
      `duplicates=${stats.duplicates} elapsed=${formatDuration(durationSec)}`,
    { count: stats.recordsAdded, missing: missingPages.length },
  );
  for (const report of reports) {
    if (report.outcome !== "completed") {
      Logger.warn(`Worker ${report.workerId} ended early: ${report.outcome}`, {
        workerId: report.workerId,
        pages: report.visitedPages.length,
        error: report.error?.message,
      });
    }
  }

  return { totalPages, dbPath, workers: reports, stats, persisted, missingPages, durationSec };
}
