import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, CrawlError } from "../src/core/errors";
import { runCrawl } from "../src/core/execution/runner";
import { loadDatabase } from "../src/core/storage/checkpoint";
import type { CrawlOptions } from "../src/core/types";
import { fakeClock, FakeDriver, type FakeBehavior } from "./helpers/fake-driver";
import { historyPages, TEST_BASE_URL } from "./helpers/fixtures";

let dataDir: string;

beforeEach(async () => {
  dataDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "crawl-e2e-"));
});

afterEach(async () => {
  await fs.promises.rm(dataDir, { recursive: true, force: true });
});

function crawl(
  pages: number,
  options: CrawlOptions,
  behavior: FakeBehavior = {},
) {
  const driver = new FakeDriver(historyPages(pages), () => behavior);
  const run = runCrawl(
    { baseUrl: TEST_BASE_URL, dataDir, snapshotFormat: "none", ...options },
    { driver, clock: fakeClock() },
  );
  return { driver, run };
}

describe("partitioned crawl", () => {
  it("collects every record from every page exactly once", async () => {
    const { run } = crawl(4, { totalPages: 4, workers: 2, checkpointEvery: 2 });
    const summary = await run;

    expect(summary.workers.map((w) => [w.workerId, w.outcome, w.visitedPages])).toEqual([
      [1, "completed", [1, 3]],
      [2, "completed", [2, 4]],
    ]);
    expect(summary.missingPages).toEqual([]);
    expect(summary.persisted).toBe(true);
    expect(summary.stats.recordsAdded).toBe(8);

    const db = await loadDatabase(summary.dbPath);
    expect(Object.keys(db).sort()).toEqual([
      "Item 1-1",
      "Item 1-2",
      "Item 2-1",
      "Item 2-2",
      "Item 3-1",
      "Item 3-2",
      "Item 4-1",
      "Item 4-2",
    ]);
    expect(db["Item 3-2"]).toEqual([{ price: 302, timestamp: "2024-01-02T15:04:05", type: "sale" }]);
    const raw: unknown = JSON.parse(await fs.promises.readFile(summary.dbPath, "utf8"));
    expect(raw).toEqual(db);
  });

  it("adds nothing when the same pages are crawled again", async () => {
    const first = await crawl(3, { totalPages: 3, workers: 2 }).run;
    const before = await loadDatabase(first.dbPath);

    const second = await crawl(3, { totalPages: 3, workers: 3 }).run;
    expect(second.stats.recordsAdded).toBe(0);
    expect(second.stats.duplicates).toBe(6);
    expect(await loadDatabase(second.dbPath)).toEqual(before);
  });

  it("flushes other workers' records when one worker desyncs", async () => {
    const { run } = crawl(4, { totalPages: 4, workers: 2 }, { stuckFrom: 3 });
    const summary = await run;

    expect(summary.workers.map((w) => w.outcome)).toEqual(["completed", "desync"]);
    expect(summary.missingPages).toEqual([4]);
    expect(summary.persisted).toBe(true);
    const db = await loadDatabase(summary.dbPath);
    expect(Object.keys(db)).toHaveLength(6);
    expect(db["Item 4-1"]).toBeUndefined();
  });

  it("discovers the page count when none is given", async () => {
    const { driver, run } = crawl(3, { workers: 3 });
    const summary = await run;
    expect(summary.totalPages).toBe(3);
    expect(summary.stats.recordsAdded).toBe(6);
    expect(driver.sessions).toHaveLength(4);
    expect(driver.sessions.every((s) => s.closed)).toBe(true);
  });

  it("writes a snapshot per checkpoint", async () => {
    const summary = await crawl(2, {
      totalPages: 2,
      workers: 1,
      checkpointEvery: 1,
      snapshotFormat: "basic",
    }).run;
    const files = await fs.promises.readdir(dataDir);
    expect(files.filter((f) => f.startsWith("history_snapshot_batch"))).toHaveLength(2);
    expect(summary.stats.checkpointsWritten).toBe(3);
  });

  it("fails when no worker can open a session", async () => {
    const { run } = crawl(2, { totalPages: 2, workers: 2 }, { failOpen: true });
    await expect(run).rejects.toBeInstanceOf(CrawlError);
    await expect(run).rejects.toThrow("No worker could open a browser session");
  });

  it("refuses to start on a corrupt database file", async () => {
    await fs.promises.writeFile(path.join(dataDir, "item_database.json"), "[1, 2");
    const { driver, run } = crawl(2, { totalPages: 2 });
    await expect(run).rejects.toBeInstanceOf(ConfigError);
    expect(driver.sessions).toHaveLength(0);
  });
});
