/**
 * Sequential read of the live auctions listing
 */

import { auctionsUrl } from "../config/evaluation";
import type { CrawlControl } from "../crawl/control";
import { NavigationStateMachine } from "../crawl/navigation";
import { errorMessage } from "../errors";
import { cellText } from "../extraction/history";
import { parsePrice, parseTotalPages } from "../extraction/parsers";
import type {
  AuctionListing,
  ElementHandle,
  EvaluationConfig,
  ListingSelectors,
  PageDriver,
  Session,
} from "../types";
import { type Clock, systemClock } from "../utils/clock";
import { Logger } from "../utils/logger";
import { NAVIGATION_RETRY_OPTIONS, withRetry } from "../utils/retry";
import { parseTimeLeft } from "./time-left";

/**
 * Reads one listing row
 * @returns null when the row has no readable bid
 */
export async function readListingRow(
  row: ElementHandle,
  selectors: ListingSelectors,
): Promise<AuctionListing | null> {
  const bidPrice = parsePrice(await cellText(row, selectors.bid));
  if (bidPrice === null) return null;
  const rawTime = (await cellText(row, selectors.timeLeft)) ?? "";
  return {
    name: (await cellText(row, selectors.name)) ?? "Unknown",
    bidPrice,
    buyoutPrice: parsePrice(await cellText(row, selectors.buyout)),
    timeLeft: parseTimeLeft(rawTime),
    rawTime,
  };
}

export async function extractListingsPage(
  session: Session,
  selectors: ListingSelectors,
  waitTimeoutMs: number,
): Promise<AuctionListing[]> {
  await session.waitFor(selectors.rows, waitTimeoutMs, "attached");
  const rows = await session.queryAll(selectors.rows);
  const listings: AuctionListing[] = [];
  for (const row of rows) {
    const listing = await readListingRow(row, selectors);
    if (listing) listings.push(listing);
  }
  return listings;
}

/**
 * Walks the auctions pager from the first page, reading every listing.
 * Stops at the last page, at `maxPages`, when the pager stops responding or
 * when `control` is stopped.
 */
export async function crawlListings(
  driver: PageDriver,
  config: EvaluationConfig,
  clock: Clock = systemClock,
  control?: CrawlControl,
): Promise<AuctionListing[]> {
  const url = auctionsUrl(config);
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
    const pagerTotal = parseTotalPages(indicator ? await indicator.textContent() : null) ?? 1;
    const totalPages = config.maxPages > 0 ? Math.min(pagerTotal, config.maxPages) : pagerTotal;
    Logger.info(`Total auction pages: ${totalPages}`, { url, count: totalPages });

    const nav = new NavigationStateMachine(session, {
      workerId: 0,
      selectors: config.selectors,
      backoff: config.backoff,
      clock,
      control,
    });
    let page = await nav.confirmStart();
    const listings: AuctionListing[] = [];

    for (;;) {
      const found = await extractListingsPage(session, config.selectors, config.waitTimeoutMs);
      listings.push(...found);
      Logger.info(`Extracted ${found.length} listings from page ${page}`, { page, count: found.length });

      if (page >= totalPages || control?.isStopped) break;
      const outcome = await nav.advanceTo(page + 1);
      if (outcome.state !== "Confirmed") {
        Logger.info(`Auction pager ended on page ${outcome.page}: ${outcome.state}`, {
          page: outcome.page,
        });
        break;
      }
      page = outcome.page;
    }

    Logger.info(`Total listings extracted from all pages: ${listings.length}`, {
      count: listings.length,
    });
    return listings;
  } finally {
    await session.close().catch((error: unknown) => {
      Logger.warn("Closing the listings session failed", { error: errorMessage(error) });
    });
  }
}
