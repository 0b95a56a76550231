/**
 * BullMQ Queue Configuration
 * Handles job scheduling and processing for history crawls and evaluations
 */

import { type Job, Queue, Worker } from "bullmq";
import Redis from "ioredis";
import { AppConfig } from "../config/app-config";
import { mergeCrawlOptions } from "../config/crawl";
import { mergeEvaluationOptions } from "../config/evaluation";
import { CrawlControl } from "../crawl/control";
import type { CrawlOptions, EvaluationOptions } from "../types";
import { Logger } from "../utils/logger";
import { runEvaluation, runHistoryCrawl } from "./crawl-service";

let connection: Redis | null = null;

/**
 * Shared Redis connection, opened on first use
 */
export function getConnection(): Redis {
  if (!connection) {
    connection = new Redis({
      host: AppConfig.REDIS_HOST,
      port: AppConfig.REDIS_PORT,
      password: AppConfig.REDIS_PASSWORD,
      maxRetriesPerRequest: null, // Required for BullMQ
    });
  }
  return connection;
}

export async function closeConnection(): Promise<void> {
  if (!connection) return;
  const current = connection;
  connection = null;
  await current.quit();
}

export type CrawlJobKind = "history" | "evaluate";

export type CrawlJobData =
  | { kind: "history"; options?: CrawlOptions }
  | { kind: "evaluate"; options?: EvaluationOptions };

export const QUEUE_NAMES = {
  CRAWL: "crawl-jobs",
} as const;

/**
 * Create a new crawl queue
 */
export function createCrawlQueue() {
  return new Queue<CrawlJobData>(QUEUE_NAMES.CRAWL, {
    connection: getConnection(),
  });
}

export interface JobRunners {
  history: typeof runHistoryCrawl;
  evaluate: typeof runEvaluation;
}

const DEFAULT_RUNNERS: JobRunners = {
  history: runHistoryCrawl,
  evaluate: runEvaluation,
};

const activeControls = new Set<CrawlControl>();

/**
 * Asks every running job to stop at its next page boundary. Crawls still
 * write their final checkpoint before the job returns.
 */
export function stopActiveJobs(): number {
  for (const control of activeControls) control.stop();
  return activeControls.size;
}

/**
 * Default processor for crawl jobs. Options in the job data override the
 * environment defaults field by field.
 */
export async function processCrawlJob(
  job: Pick<Job<CrawlJobData>, "id" | "data">,
  runners: JobRunners = DEFAULT_RUNNERS,
  control: CrawlControl = new CrawlControl(),
) {
  const { data } = job;
  Logger.info(`Processing job ${job.id}`, { kind: data.kind });

  activeControls.add(control);
  try {
    if (data.kind === "history") {
      const summary = await runners.history(
        mergeCrawlOptions(AppConfig.crawlOptions(), data.options),
        { control },
      );
      Logger.info(`Job ${job.id} completed`, {
        count: summary.stats.recordsAdded,
        missing: summary.missingPages.length,
      });
      return {
        kind: data.kind,
        recordsAdded: summary.stats.recordsAdded,
        missingPages: summary.missingPages,
        persisted: summary.persisted,
      };
    }

    const result = await runners.evaluate(
      mergeEvaluationOptions(AppConfig.evaluationOptions(), data.options),
      { control },
    );
    Logger.info(`Job ${job.id} completed`, { count: result.listings });
    return { kind: data.kind, listings: result.listings, actions: result.actions };
  } catch (error) {
    Logger.error(`Job ${job.id} failed`, error);
    throw error;
  } finally {
    activeControls.delete(control);
  }
}

/**
 * Setup default event handlers for a worker
 */
export function setupWorkerEventHandlers(worker: Worker<CrawlJobData>) {
  worker.on("completed", (job) => {
    Logger.info(`Job ${job.id} completed successfully`);
  });

  worker.on("failed", (job, err) => {
    Logger.error(`Job ${job?.id} failed: ${err.message}`);
  });

  worker.on("error", (err) => {
    Logger.error(`Worker error: ${err.message}`);
  });
}

/**
 * Create a worker to process crawl jobs
 * Can use default processor or custom processor
 */
export function createCrawlWorker(
  processor: (job: Job<CrawlJobData>) => Promise<unknown> = (job) => processCrawlJob(job),
  setupEvents = true,
) {
  const worker = new Worker<CrawlJobData>(
    QUEUE_NAMES.CRAWL,
    async (job) => {
      Logger.info(`Processing crawl job: ${job.id}`, { kind: job.data.kind });
      return await processor(job);
    },
    {
      connection: getConnection(),
      concurrency: 1, // One browser fleet at a time
    },
  );

  if (setupEvents) {
    setupWorkerEventHandlers(worker);
  }

  return worker;
}

/**
 * Schedule a recurring crawl or evaluation using upsertJobScheduler
 */
export async function scheduleRecurringJob(
  queue: Pick<Queue<CrawlJobData>, "upsertJobScheduler">,
  data: CrawlJobData,
  cron: string,
) {
  const schedulerId = `${data.kind}-recurring`;
  await queue.upsertJobScheduler(
    schedulerId,
    { pattern: cron },
    {
      name: schedulerId,
      data,
      opts: {
        removeOnComplete: {
          age: 24 * 3600, // Keep completed jobs for 24 hours
          count: 1000,
        },
        removeOnFail: {
          age: 7 * 24 * 3600, // Keep failed jobs for 7 days
        },
      },
    },
  );

  Logger.info(`Scheduled recurring ${data.kind} job`, { cron, schedulerId });
  return schedulerId;
}

/**
 * Schedule a one-time job
 */
export async function scheduleOneTimeJob(
  queue: Queue<CrawlJobData>,
  data: CrawlJobData,
  options: { delay?: number } = {},
) {
  const job = await queue.add(`${data.kind}-onetime`, data, {
    delay: options.delay,
    attempts: 3,
    backoff: {
      type: "exponential",
      delay: 60000, // 1 minute
    },
  });

  Logger.info(`Scheduled one-time ${data.kind} job: ${job.id}`);
  return job;
}

/**
 * Get all scheduled jobs using the Job Scheduler API
 */
export async function getScheduledJobs(queue: Queue<CrawlJobData>) {
  return await queue.getJobSchedulers();
}

/**
 * Remove a scheduled recurring job by scheduler ID
 */
export async function removeScheduledJob(queue: Queue<CrawlJobData>, schedulerId: string) {
  await queue.removeJobScheduler(schedulerId);
  Logger.info(`Removed scheduled job: ${schedulerId}`);
}
