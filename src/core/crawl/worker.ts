/**
 * Crawl worker: owns one browser session and visits its assigned pages in
 * increasing order, sending one batch per confirmed page.
 */

import pLimit, { type LimitFunction } from "p-limit";
import { historyUrl } from "../config/crawl";
import { CRAWL_CONSTANTS } from "../constants";
import {
  DesyncError,
  NavigationTimeoutError,
  SessionAcquisitionError,
  errorMessage,
} from "../errors";
import { extractHistoryPage } from "../extraction/history";
import type { CrawlConfig, PageBatch, PageDriver, Session, WorkerState } from "../types";
import { type Clock, systemClock, withTimeout } from "../utils/clock";
import { Logger } from "../utils/logger";
import { NAVIGATION_RETRY_OPTIONS, withRetry } from "../utils/retry";
import type { ResultChannel } from "./channel";
import { CrawlControl } from "./control";
import { NavigationStateMachine } from "./navigation";
import type { WorkerAssignment } from "./partition";

export type WorkerOutcome =
  | "completed"
  | "exhausted"
  | "desync"
  | "cancelled"
  | "failed"
  | "session-failed";

export interface WorkerReport {
  workerId: number;
  /** Pages whose batch reached the channel, in visit order */
  visitedPages: number[];
  outcome: WorkerOutcome;
  error?: Error;
}

export interface CrawlWorkerDeps {
  driver: PageDriver;
  channel: ResultChannel<PageBatch>;
  config: CrawlConfig;
  control?: CrawlControl;
  clock?: Clock;
  /** Shared limiter for session launches; defaults to `config.launchConcurrency` */
  launchLimit?: LimitFunction;
}

export class CrawlWorker {
  private readonly control: CrawlControl;
  private readonly clock: Clock;
  private readonly launchLimit: LimitFunction;
  private _state: WorkerState | null = null;

  constructor(private readonly deps: CrawlWorkerDeps) {
    this.control = deps.control ?? new CrawlControl();
    this.clock = deps.clock ?? systemClock;
    this.launchLimit = deps.launchLimit ?? pLimit(deps.config.launchConcurrency);
  }

  /** Progress of the current or last run */
  get state(): WorkerState | null {
    return this._state;
  }

  /**
   * Visits every page of `assignment`. Never throws: failures end the worker
   * and are reported in the returned outcome.
   */
  async run(assignment: WorkerAssignment): Promise<WorkerReport> {
    const { workerId, stride, pages } = assignment;
    const visitedPages: number[] = [];
    this._state = {
      workerId,
      stride,
      currentConfirmedPage: 1,
      nextTargetPage: pages[0] ?? null,
    };

    if (pages.length === 0) {
      Logger.debug(`Worker ${workerId} has no pages assigned`, { workerId });
      return this.finish({ workerId, visitedPages, outcome: "completed" });
    }

    let session: Session;
    try {
      session = await this.launchLimit(() => this.deps.driver.openSession());
    } catch (cause) {
      const error = new SessionAcquisitionError(workerId, { cause });
      Logger.error(error.message, cause, { workerId });
      return this.finish({ workerId, visitedPages, outcome: "session-failed", error });
    }

    try {
      return await this.crawl(session, assignment, visitedPages);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      Logger.error(`Worker ${workerId} failed`, err, { workerId });
      return this.finish({ workerId, visitedPages, outcome: "failed", error: err });
    } finally {
      try {
        await session.close();
      } catch (error) {
        Logger.warn(`Worker ${workerId}: closing session failed`, {
          workerId,
          error: errorMessage(error),
        });
      }
    }
  }

  private async crawl(
    session: Session,
    { workerId, pages }: WorkerAssignment,
    visitedPages: number[],
  ): Promise<WorkerReport> {
    const { config, channel } = this.deps;
    const url = historyUrl(config);

    await withRetry(
      async () => {
        await session.navigate(url, config.navTimeoutMs);
        await session.waitForNetworkIdle(config.waitTimeoutMs);
      },
      {
        ...NAVIGATION_RETRY_OPTIONS,
        maxRetries: config.navigationRetries,
        sleep: this.clock.sleep,
        onRetry: (error, attempt, delayMs) =>
          Logger.warn(`Worker ${workerId}: retrying navigation (attempt ${attempt})`, {
            workerId,
            url,
            error: error.message,
            delayMs,
          }),
      },
    );

    const nav = new NavigationStateMachine(session, {
      workerId,
      selectors: config.selectors,
      backoff: config.backoff,
      clock: this.clock,
      control: this.control,
    });
    this.updateState(await nav.confirmStart(), pages[0]);

    for (const [index, target] of pages.entries()) {
      if ((await this.control.checkpoint()) === "stop") {
        return this.finish({ workerId, visitedPages, outcome: "cancelled" });
      }

      const outcome = await withTimeout(
        nav.advanceTo(target),
        config.stepTimeoutMs,
        () =>
          new NavigationTimeoutError(
            `Worker ${workerId}: reaching page ${target} took longer than ${config.stepTimeoutMs}ms`,
            config.stepTimeoutMs,
          ),
      );
      this.updateState(nav.currentConfirmedPage, target);

      if (outcome.state === "Exhausted") {
        Logger.info(`Worker ${workerId}: no more pages after ${outcome.page}`, { workerId });
        return this.finish({ workerId, visitedPages, outcome: "exhausted" });
      }
      if (outcome.state === "DesyncAborted") {
        const error = new DesyncError(workerId, outcome.target, outcome.page);
        Logger.warn(error.message, { workerId, page: outcome.page });
        return this.finish({ workerId, visitedPages, outcome: "desync", error });
      }
      if (outcome.state === "Cancelled") {
        return this.finish({ workerId, visitedPages, outcome: "cancelled" });
      }

      const extracted = await withTimeout(
        extractHistoryPage(session, config.selectors, {
          workerId,
          page: target,
          waitTimeoutMs: config.waitTimeoutMs,
          attempts: config.extractionAttempts,
          retryDelayMs: CRAWL_CONSTANTS.EXTRACTION_RETRY_DELAY_MS,
          clock: this.clock,
        }),
        config.stepTimeoutMs,
        () =>
          new NavigationTimeoutError(
            `Worker ${workerId}: extracting page ${target} took longer than ${config.stepTimeoutMs}ms`,
            config.stepTimeoutMs,
          ),
      );

      await channel.send(
        { pageNumber: target, workerId, records: extracted.records },
        config.sendTimeoutMs,
      );
      visitedPages.push(target);
      this.updateState(target, pages[index + 1] ?? null);
      Logger.pageExtracted(workerId, target, extracted.records.length, extracted.skipped);
    }

    return this.finish({ workerId, visitedPages, outcome: "completed" });
  }

  private updateState(confirmedPage: number, nextTarget: number | null): void {
    if (!this._state) return;
    this._state = {
      ...this._state,
      currentConfirmedPage: Math.max(this._state.currentConfirmedPage, confirmedPage),
      nextTargetPage: nextTarget,
    };
  }

  private finish(report: WorkerReport): WorkerReport {
    Logger.workerFinished(report.workerId, report.outcome, report.visitedPages.length);
    return report;
  }
}
