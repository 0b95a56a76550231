import type { HistorySelectors, ListingSelectors } from "../types";

/**
 * Default selectors for the sale-history page. Playwright selector syntax:
 * cell selectors are resolved relative to a row.
 */
export const DEFAULT_HISTORY_SELECTORS: HistorySelectors = {
  table: "main table",
  rows: "main table tbody tr",
  name: "td:nth-child(1) span:not(small span)",
  price: "td:nth-child(2) div.justify-end",
  date: "td:nth-child(3) div.justify-end",
  time: "td:nth-child(3) small",
  pageIndicator: 'main p:has-text("Page")',
  nextButton: 'main button:has-text("Next")',
  emptyState: 'text="No auctions found"',
};

/** Default selectors for the live auctions table */
export const DEFAULT_LISTING_SELECTORS: ListingSelectors = {
  table: "main table",
  rows: "main table tbody tr",
  name: "td:nth-child(1)",
  bid: "td:nth-child(2)",
  buyout: "td:nth-child(3)",
  timeLeft: "td:nth-child(4)",
  pageIndicator: 'main p:has-text("Page")',
  nextButton: 'main button:has-text("Next")',
};
