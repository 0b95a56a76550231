import { describe, expect, it } from "vitest";
import { fakeClock, FakeDriver, historyRow, type FakeRow } from "../../../tests/helpers/fake-driver";
import { DEFAULT_HISTORY_SELECTORS } from "../config/selectors";
import { extractHistoryPage } from "./history";

async function sessionOn(rows: FakeRow[]) {
  const driver = new FakeDriver([rows]);
  const session = await driver.openSession();
  await session.navigate("https://auction.test/history", 1000);
  return session;
}

const options = { workerId: 1, page: 1, waitTimeoutMs: 1000, attempts: 3, retryDelayMs: 3000 };

describe("extractHistoryPage", () => {
  it("reads rows in page order", async () => {
    const session = await sessionOn([
      historyRow({ name: "Iron Ore x5", price: "1,250", date: "3/5/2024", time: "2:07:09 PM" }),
      historyRow({ name: "Silver Ring", price: "900 gold", date: "12/31/2023", time: "12:00:00 AM" }),
    ]);

    const page = await extractHistoryPage(session, DEFAULT_HISTORY_SELECTORS, options);

    expect(page).toEqual({
      records: [
        { itemName: "Iron Ore", price: 1250, timestamp: "2024-03-05T14:07:09", quantity: 5 },
        { itemName: "Silver Ring", price: 900, timestamp: "2023-12-31T00:00:00", quantity: 1 },
      ],
      skipped: 0,
    });
  });

  it("keeps the raw text of an unparsable timestamp", async () => {
    const session = await sessionOn([
      historyRow({ name: "Wool", price: "12", date: "yesterday", time: null }),
    ]);
    const page = await extractHistoryPage(session, DEFAULT_HISTORY_SELECTORS, options);
    expect(page.records[0].timestamp).toBe("yesterday");
  });

  it("skips rows without a name or a readable price", async () => {
    const session = await sessionOn([
      historyRow({ name: null, price: "10", date: "1/1/2024", time: "1:00:00 PM" }),
      historyRow({ name: "Wool", price: "n/a", date: "1/1/2024", time: "1:00:00 PM" }),
      historyRow({ name: "Linen", price: "7", date: "1/1/2024", time: "1:00:00 PM" }),
    ]);
    const page = await extractHistoryPage(session, DEFAULT_HISTORY_SELECTORS, options);
    expect(page.skipped).toBe(2);
    expect(page.records.map((r) => r.itemName)).toEqual(["Linen"]);
  });

  it("skips rows without a sale date", async () => {
    const session = await sessionOn([
      historyRow({ name: "Wool", price: "10", date: null, time: null }),
      historyRow({ name: "Wool", price: "10", date: null, time: "1:00:00 PM" }),
      historyRow({ name: "Wool", price: "10", date: "1/1/2024", time: "1:00:00 PM" }),
    ]);
    const page = await extractHistoryPage(session, DEFAULT_HISTORY_SELECTORS, options);
    expect(page.skipped).toBe(2);
    expect(page.records).toEqual([
      { itemName: "Wool", price: 10, timestamp: "2024-01-01T13:00:00", quantity: 1 },
    ]);
  });

  it("returns an empty page when the empty marker is shown", async () => {
    const session = await sessionOn([]);
    const clock = fakeClock();
    const page = await extractHistoryPage(session, DEFAULT_HISTORY_SELECTORS, { ...options, clock });
    expect(page).toEqual({ records: [], skipped: 0 });
    expect(clock.sleeps).toEqual([]);
  });

  it("re-reads an empty table before accepting zero rows", async () => {
    const session = await sessionOn([]);
    const clock = fakeClock();
    const selectors = { ...DEFAULT_HISTORY_SELECTORS, emptyState: undefined };
    const page = await extractHistoryPage(session, selectors, { ...options, clock });
    expect(page).toEqual({ records: [], skipped: 0 });
    expect(clock.sleeps).toEqual([3000, 3000]);
    expect(session.pagesRead).toEqual([1, 1, 1]);
  });

  it("reads the status cell when a selector is configured", async () => {
    const selectors = { ...DEFAULT_HISTORY_SELECTORS, status: "td:nth-child(4)" };
    const session = await sessionOn([
      { ...historyRow({ name: "Wool", price: "3", date: "1/1/2024", time: "1:00:00 PM" }), "td:nth-child(4)": "Sold" },
    ]);
    const page = await extractHistoryPage(session, selectors, options);
    expect(page.records[0]).toEqual({
      itemName: "Wool",
      price: 3,
      timestamp: "2024-01-01T13:00:00",
      quantity: 1,
      status: "Sold",
    });
  });
});
