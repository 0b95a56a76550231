/**
 * Compares live listings with historical sale prices
 */

import path from "node:path";
import { STORAGE_CONSTANTS } from "../constants";
import type { AuctionListing, ItemDatabase, ItemStats, Recommendation } from "../types";
import { writeCsvFile } from "../storage/snapshot";
import { Logger } from "../utils/logger";
import { getItemStats } from "./price-stats";

/**
 * Bid when the current bid is under the historical median, otherwise buy out
 * when the buyout is under it, otherwise skip. Items never sold before get
 * "no history".
 */
export function evaluateListing(listing: AuctionListing, stats: ItemStats | null): Recommendation {
  if (!stats) return { ...listing, historicalMedian: null, action: "no history" };

  const { median } = stats;
  let action: Recommendation["action"] = "skip";
  if (listing.bidPrice < median) action = "bid";
  else if (listing.buyoutPrice !== null && listing.buyoutPrice < median) action = "buyout";
  return { ...listing, historicalMedian: median, action };
}

export function evaluateListings(
  listings: readonly AuctionListing[],
  db: ItemDatabase,
): Recommendation[] {
  return listings.map((listing) => evaluateListing(listing, getItemStats(db, listing.name)));
}

export const LISTINGS_HEADER = [
  "name",
  "bid_price",
  "buyout_price",
  "time_left",
  "raw_time",
] as const;

export const RECOMMENDATIONS_HEADER = [...LISTINGS_HEADER, "historical_median", "action"] as const;

function listingRow(listing: AuctionListing) {
  return {
    name: listing.name,
    bid_price: listing.bidPrice,
    buyout_price: listing.buyoutPrice,
    time_left: listing.timeLeft,
    raw_time: listing.rawTime,
  };
}

export interface EvaluationFiles {
  listingsFile: string;
  recommendationsFile: string;
}

/**
 * Writes all listings and their recommendations as CSV into `dir`
 * @throws PersistError when a file cannot be written
 */
export async function exportEvaluation(
  dir: string,
  listings: readonly AuctionListing[],
  recommendations: readonly Recommendation[],
): Promise<EvaluationFiles> {
  const listingsFile = path.join(dir, STORAGE_CONSTANTS.LISTINGS_FILE);
  const recommendationsFile = path.join(dir, STORAGE_CONSTANTS.RECOMMENDATIONS_FILE);

  await writeCsvFile(listingsFile, LISTINGS_HEADER, listings.map(listingRow));
  await writeCsvFile(
    recommendationsFile,
    RECOMMENDATIONS_HEADER,
    recommendations.map((rec) => ({
      ...listingRow(rec),
      historical_median: rec.historicalMedian,
      action: rec.action,
    })),
  );

  for (const rec of recommendations) {
    Logger.debug(
      `${rec.name}: Bid ${rec.bidPrice}, Buyout ${rec.buyoutPrice ?? "N/A"}, ` +
        `Time Left ${rec.timeLeft}m (raw: '${rec.rawTime}'), ` +
        `Historical Median: ${rec.historicalMedian ?? "N/A"} -> ${rec.action}`,
    );
  }
  return { listingsFile, recommendationsFile };
}
