/**
 * CLI Mode - bypass the queue and run a crawl or an evaluation directly
 */

import "dotenv/config";
import { AppConfig } from "./core/config/app-config";
import { withDefaults } from "./core/config/crawl";
import { CrawlControl } from "./core/crawl/control";
import { runEvaluation, runHistoryCrawl } from "./core/services/crawl-service";
import { parseCliArgs } from "./core/utils/args";
import { formatDuration } from "./core/utils/date";
import { Logger } from "./core/utils/logger";

const USAGE = `Usage:
  npm run crawl -- [options]       Crawl the sale history into the item database
  npm run evaluate -- [options]    Evaluate live auctions against price history

Crawl options:
  --pages N             Pages to crawl (default: TOTAL_PAGES, 0 = read from pager)
  --workers N           Parallel browser sessions (default: WORKERS)
  --strategy S          striped | sequential (default: PARTITION_STRATEGY)
  --checkpoint-every N  Pages between checkpoints (default: CHECKPOINT_EVERY)
  --snapshot F          basic | detailed | none (default: SNAPSHOT_FORMAT)

Evaluate options:
  --max-pages N         Stop after N auction pages (default: AUCTION_MAX_PAGES)

Common options:
  --base-url URL        Auction house address (default: BASE_URL)
  --data-dir DIR        Database and export directory (default: DATA_DIR)

Examples:
  npm run crawl -- --workers 8 --pages 200
  npm run evaluate -- --max-pages 5

Note: For queue-based processing, use: npm start`;

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.command === "help") {
    Logger.info(USAGE);
    return;
  }

  const control = new CrawlControl();
  const stop = () => {
    if (control.isStopped) {
      Logger.warn("Forced exit");
      process.exit(1);
    }
    Logger.info("Stopping after the current pages; press Ctrl+C again to exit now");
    control.stop();
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);

  if (args.command === "crawl") {
    const summary = await runHistoryCrawl(withDefaults(AppConfig.crawlOptions(), args.crawl), {
      control,
    });
    Logger.info(
      `✅ Crawl completed: ${summary.stats.recordsAdded} new sales from ` +
        `${summary.stats.pagesIngested}/${summary.totalPages} pages in ${formatDuration(summary.durationSec)}`,
    );
    if (!summary.persisted) {
      Logger.error(`❌ Final checkpoint to ${summary.dbPath} failed`);
      process.exitCode = 1;
    }
    return;
  }

  const result = await runEvaluation(withDefaults(AppConfig.evaluationOptions(), args.evaluate), {
    control,
  });
  Logger.info(`✅ Evaluation completed: ${result.listings} listings`, result.actions);
}

main().catch((e) => {
  Logger.error("❌ Run failed", e);
  process.exit(1);
});
