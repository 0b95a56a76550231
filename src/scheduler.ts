/**
 * Scheduler Entry Point
 * Sets up recurring crawl and evaluation jobs, or queues a one-time run
 */

import "dotenv/config";
import { AppConfig } from "./core/config/app-config";
import {
  closeConnection,
  createCrawlQueue,
  getScheduledJobs,
  removeScheduledJob,
  scheduleOneTimeJob,
  scheduleRecurringJob,
  type CrawlJobKind,
} from "./core/services/queue";
import { argReader } from "./core/utils/args";
import { Logger } from "./core/utils/logger";

const USAGE = `
Scheduler - Configure recurring crawl jobs

Usage:
  npm run scheduler                      # Schedule history crawl and evaluation
  npm run scheduler -- --kind history    # Schedule one kind only

Options:
  --kind <kind>     history or evaluate (default: both)
  --cron <pattern>  Cron pattern (default: CRAWL_CRON / EVALUATE_CRON)
  --once            Queue a single run now instead of a schedule
  --remove          Remove the recurring schedule of --kind

Environment Variables:
  REDIS_HOST        Redis host (default: localhost)
  REDIS_PORT        Redis port (default: 6379)
  REDIS_PASSWORD    Redis password (optional)

Examples:
  npm run scheduler
  npm run scheduler -- --kind history --cron "0 */6 * * *"
  npm run scheduler -- --kind evaluate --once
`;

async function main() {
  const { hasFlag, getArg, getChoice } = argReader(process.argv.slice(2));

  if (hasFlag("--help") || hasFlag("-h")) {
    Logger.info(USAGE);
    return;
  }

  const kind = getChoice<CrawlJobKind>("--kind", ["history", "evaluate"]);
  const kinds: CrawlJobKind[] = kind ? [kind] : ["history", "evaluate"];
  const cron = getArg("--cron");
  const queue = createCrawlQueue();

  try {
    for (const k of kinds) {
      if (hasFlag("--remove")) {
        await removeScheduledJob(queue, `${k}-recurring`);
      } else if (hasFlag("--once")) {
        await scheduleOneTimeJob(queue, { kind: k });
      } else {
        const pattern = cron ?? (k === "history" ? AppConfig.CRAWL_CRON : AppConfig.EVALUATE_CRON);
        await scheduleRecurringJob(queue, { kind: k }, pattern);
        Logger.info(`✅ Scheduled recurring ${k} job`);
      }
    }

    // Show current scheduled jobs
    const scheduled = await getScheduledJobs(queue);
    Logger.info(`Total scheduled jobs: ${scheduled.length}`);
    for (const scheduler of scheduled) {
      Logger.info(`  - ${scheduler.key}: ${scheduler.pattern ?? `every ${scheduler.every}ms`}`);
    }
  } finally {
    await queue.close();
    await closeConnection();
  }
  Logger.info("Scheduler completed");
}

main().catch((e) => {
  Logger.error("Scheduler failed", e);
  process.exit(1);
});
