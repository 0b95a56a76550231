/**
 * Page-count discovery for runs started without a known total
 */

import { historyUrl } from "../config/crawl";
import { errorMessage } from "../errors";
import { parseTotalPages } from "../extraction/parsers";
import type { CrawlConfig, PageDriver } from "../types";
import { type Clock, systemClock } from "../utils/clock";
import { Logger } from "../utils/logger";
import { NAVIGATION_RETRY_OPTIONS, withRetry } from "../utils/retry";

/**
 * Opens a probe session and reads "Page N of M" from the pager.
 * Falls back to a single page when the total cannot be read.
 */
export async function discoverTotalPages(
  driver: PageDriver,
  config: CrawlConfig,
  clock: Clock = systemClock,
): Promise<number> {
  const url = historyUrl(config);
  const session = await driver.openSession();
  try {
    await withRetry(
      async () => {
        await session.navigate(url, config.navTimeoutMs);
        await session.waitForNetworkIdle(config.waitTimeoutMs);
      },
      { ...NAVIGATION_RETRY_OPTIONS, maxRetries: config.navigationRetries, sleep: clock.sleep },
    );
    const indicator = await session.query(config.selectors.pageIndicator);
    const total = parseTotalPages(indicator ? await indicator.textContent() : null);
    if (total === null || total < 1) {
      Logger.warn("Could not read the total page count; crawling one page", { url });
      return 1;
    }
    Logger.info(`Discovered ${total} history pages`, { url, count: total });
    return total;
  } finally {
    await session.close().catch((error: unknown) => {
      Logger.warn("Closing the probe session failed", { error: errorMessage(error) });
    });
  }
}
