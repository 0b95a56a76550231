import { describe, expect, it } from "vitest";
import { fakeClock, FakeDriver, type FakeBehavior } from "../../../tests/helpers/fake-driver";
import { historyPages, TEST_BASE_URL } from "../../../tests/helpers/fixtures";
import { resolveCrawlConfig } from "../config/crawl";
import {
  ChannelTimeoutError,
  DesyncError,
  NavigationTimeoutError,
  SessionAcquisitionError,
} from "../errors";
import type { CrawlOptions, PageBatch } from "../types";
import { RetryError } from "../utils/retry";
import { ResultChannel } from "./channel";
import { CrawlControl } from "./control";
import { CrawlWorker } from "./worker";

function setup(
  totalPages: number,
  behavior: FakeBehavior = {},
  options: CrawlOptions = {},
  capacity = 16,
) {
  const driver = new FakeDriver(historyPages(totalPages), () => behavior);
  const channel = new ResultChannel<PageBatch>(capacity);
  const control = new CrawlControl();
  const clock = fakeClock();
  const config = resolveCrawlConfig({ baseUrl: TEST_BASE_URL, totalPages, ...options });
  const worker = new CrawlWorker({ driver, channel, config, control, clock });
  return { driver, channel, control, clock, worker };
}

async function drain(channel: ResultChannel<PageBatch>): Promise<PageBatch[]> {
  channel.close();
  const batches: PageBatch[] = [];
  for await (const batch of channel) batches.push(batch);
  return batches;
}

const nextMacrotask = () => new Promise<void>((resolve) => setTimeout(resolve, 10));

describe("CrawlWorker", () => {
  it("visits its assigned pages and sends one batch per page", async () => {
    const { driver, channel, worker } = setup(4);

    const report = await worker.run({ workerId: 2, stride: 2, pages: [2, 4] });

    expect(report).toEqual({ workerId: 2, visitedPages: [2, 4], outcome: "completed" });
    const batches = await drain(channel);
    expect(batches.map((b) => b.pageNumber)).toEqual([2, 4]);
    expect(batches[0]).toEqual({
      pageNumber: 2,
      workerId: 2,
      records: [
        { itemName: "Item 2-1", price: 201, timestamp: "2024-01-02T15:04:05", quantity: 1 },
        { itemName: "Item 2-2", price: 202, timestamp: "2024-01-02T15:04:05", quantity: 1 },
      ],
    });
    expect(driver.sessions[0].clicks).toBe(3);
    expect(driver.sessions[0].closed).toBe(true);
    expect(worker.state).toEqual({
      workerId: 2,
      stride: 2,
      currentConfirmedPage: 4,
      nextTargetPage: null,
    });
  });

  it("ends without opening a session when nothing is assigned", async () => {
    const { driver, worker } = setup(2);
    const report = await worker.run({ workerId: 3, stride: 3, pages: [] });
    expect(report.outcome).toBe("completed");
    expect(driver.sessions).toHaveLength(0);
  });

  it("stops normally when the listing runs out of pages", async () => {
    const { channel, worker } = setup(4);
    const report = await worker.run({ workerId: 2, stride: 2, pages: [2, 4, 6] });
    expect(report.outcome).toBe("exhausted");
    expect(report.visitedPages).toEqual([2, 4]);
    expect((await drain(channel)).length).toBe(2);
  });

  it("reports desync and keeps the pages it already sent", async () => {
    const { driver, channel, worker } = setup(4, { stuckFrom: 2 });
    const report = await worker.run({ workerId: 1, stride: 2, pages: [1, 3] });

    expect(report.outcome).toBe("desync");
    expect(report.visitedPages).toEqual([1]);
    expect(report.error).toBeInstanceOf(DesyncError);
    expect(report.error).toMatchObject({ expectedPage: 3, confirmedPage: 2 });
    expect((await drain(channel)).map((b) => b.pageNumber)).toEqual([1]);
    expect(driver.sessions[0].closed).toBe(true);
  });

  it("reports a session that cannot be opened", async () => {
    const { worker } = setup(2, { failOpen: true });
    const report = await worker.run({ workerId: 1, stride: 1, pages: [1, 2] });
    expect(report.outcome).toBe("session-failed");
    expect(report.error).toBeInstanceOf(SessionAcquisitionError);
    expect(report.visitedPages).toEqual([]);
  });

  it("retries a navigation timeout", async () => {
    const { worker, clock } = setup(2, { navigateTimeouts: 1 });
    const report = await worker.run({ workerId: 1, stride: 1, pages: [1, 2] });
    expect(report.outcome).toBe("completed");
    expect(clock.sleeps[0]).toBeGreaterThanOrEqual(1000);
  });

  it("fails once navigation retries are used up", async () => {
    const { driver, worker } = setup(2, { navigateTimeouts: 5 }, { navigationRetries: 1 });
    const report = await worker.run({ workerId: 1, stride: 1, pages: [1, 2] });
    expect(report.outcome).toBe("failed");
    expect(report.error).toBeInstanceOf(RetryError);
    expect(driver.sessions[0].closed).toBe(true);
  });

  it("ends as cancelled when the run is stopped", async () => {
    const { control, worker } = setup(3);
    control.stop();
    const report = await worker.run({ workerId: 1, stride: 1, pages: [1, 2, 3] });
    expect(report).toEqual({ workerId: 1, visitedPages: [], outcome: "cancelled" });
  });

  it("gives up when the channel stays full", async () => {
    const { worker } = setup(3, {}, { sendTimeoutMs: 20 }, 1);
    const report = await worker.run({ workerId: 1, stride: 1, pages: [1, 2, 3] });
    expect(report.outcome).toBe("failed");
    expect(report.error).toBeInstanceOf(ChannelTimeoutError);
    expect(report.visitedPages).toEqual([1]);
  });

  it("waits between pages while paused, keeping its session open", async () => {
    const { driver, channel, control, worker } = setup(4);
    control.pause();

    const running = worker.run({ workerId: 2, stride: 2, pages: [2, 4] });
    await nextMacrotask();
    expect(driver.sessions).toHaveLength(1);
    expect(driver.sessions[0].closed).toBe(false);
    expect(driver.sessions[0].clicks).toBe(0);
    expect(channel.size).toBe(0);

    control.resume();
    const report = await running;
    expect(report).toEqual({ workerId: 2, visitedPages: [2, 4], outcome: "completed" });
    expect(driver.sessions[0].closed).toBe(true);
  });

  it("fails and closes its session when a step exceeds the step timeout", async () => {
    const { driver, channel, worker } = setup(4, { hangRowsFrom: 4 }, { stepTimeoutMs: 20 });

    const report = await worker.run({ workerId: 2, stride: 2, pages: [2, 4] });

    expect(report.outcome).toBe("failed");
    expect(report.visitedPages).toEqual([2]);
    expect(report.error).toBeInstanceOf(NavigationTimeoutError);
    expect(report.error?.message).toBe("Worker 2: extracting page 4 took longer than 20ms");
    expect(driver.sessions[0].closed).toBe(true);
    expect((await drain(channel)).map((b) => b.pageNumber)).toEqual([2]);
  });
});
