/**
 * Per-worker pager navigation: reaches a target page by clicking "next" and
 * confirming every move by reading the rendered page indicator.
 */

import { parsePageIndicator } from "../extraction/parsers";
import type { BackoffPolicy, Session } from "../types";
import { type Clock, systemClock } from "../utils/clock";
import { Logger } from "../utils/logger";
import type { CrawlControl } from "./control";

export type NavigationState =
  | "AtStart"
  | "AdvancingToTarget"
  | "Confirmed"
  | "Exhausted"
  | "DesyncAborted"
  | "Cancelled";

export type NavigationOutcome =
  | { state: "Confirmed"; page: number }
  | { state: "Exhausted"; page: number }
  | { state: "DesyncAborted"; page: number; target: number }
  | { state: "Cancelled"; page: number };

export interface PagerSelectors {
  pageIndicator: string;
  nextButton: string;
}

export interface NavigationOptions {
  workerId: number;
  selectors: PagerSelectors;
  backoff: BackoffPolicy;
  clock?: Clock;
  control?: CrawlControl;
}

export class NavigationStateMachine {
  private _state: NavigationState = "AtStart";
  private _confirmedPage = 1;
  private readonly clock: Clock;

  constructor(
    private readonly session: Session,
    private readonly options: NavigationOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  get state(): NavigationState {
    return this._state;
  }

  get currentConfirmedPage(): number {
    return this._confirmedPage;
  }

  /**
   * Reads the page the session starts on. An unreadable indicator leaves the
   * confirmed page at 1.
   */
  async confirmStart(): Promise<number> {
    const page = await this.readIndicator();
    if (page !== null && page > this._confirmedPage) this._confirmedPage = page;
    return this._confirmedPage;
  }

  /**
   * Advances until the confirmed page equals `target`. Never moves backward:
   * a target below the confirmed page aborts as desync.
   */
  async advanceTo(target: number): Promise<NavigationOutcome> {
    const { workerId, backoff, control } = this.options;
    let stalledClicks = 0;

    for (;;) {
      if (this._confirmedPage === target) {
        this._state = "Confirmed";
        return { state: "Confirmed", page: target };
      }
      if (this._confirmedPage > target) {
        Logger.warn(
          `Worker ${workerId} expected page ${target} but is already on ${this._confirmedPage}`,
          { workerId, page: this._confirmedPage, target },
        );
        return this.desync(target);
      }

      if (control?.isStopped) {
        this._state = "Cancelled";
        return { state: "Cancelled", page: this._confirmedPage };
      }

      this._state = "AdvancingToTarget";
      const next = await this.session.query(this.options.selectors.nextButton);
      if (!next) {
        Logger.info(`Worker ${workerId}: Next button not found`, {
          workerId,
          page: this._confirmedPage,
        });
        this._state = "Exhausted";
        return { state: "Exhausted", page: this._confirmedPage };
      }
      if (await isDisabled(next)) {
        Logger.info(`Worker ${workerId}: Next button disabled`, {
          workerId,
          page: this._confirmedPage,
        });
        this._state = "Exhausted";
        return { state: "Exhausted", page: this._confirmedPage };
      }

      await next.click();
      const moved = await this.pollForAdvance();
      if (moved) {
        stalledClicks = 0;
        Logger.debug(`Worker ${workerId} navigated to page ${this._confirmedPage}`, {
          workerId,
          page: this._confirmedPage,
        });
        continue;
      }

      stalledClicks++;
      Logger.info(
        `Worker ${workerId} expected page ${target} but got ${this._confirmedPage}. Retrying...`,
        { workerId, page: this._confirmedPage, target, stalledClicks },
      );
      if (stalledClicks >= backoff.maxStalledClicks) {
        return this.desync(target);
      }
    }
  }

  /** Polls the indicator after a click until it reports a higher page */
  private async pollForAdvance(): Promise<boolean> {
    const { pollAttempts, pollIntervalMs } = this.options.backoff;
    for (let attempt = 0; attempt < pollAttempts; attempt++) {
      await this.clock.sleep(pollIntervalMs);
      const page = await this.readIndicator();
      if (page !== null && page > this._confirmedPage) {
        this._confirmedPage = page;
        return true;
      }
    }
    return false;
  }

  private async readIndicator(): Promise<number | null> {
    const el = await this.session.query(this.options.selectors.pageIndicator);
    if (!el) return null;
    return parsePageIndicator(await el.textContent());
  }

  private desync(target: number): NavigationOutcome {
    this._state = "DesyncAborted";
    return { state: "DesyncAborted", page: this._confirmedPage, target };
  }
}

async function isDisabled(el: {
  getAttribute(name: string): Promise<string | null>;
}): Promise<boolean> {
  if ((await el.getAttribute("disabled")) !== null) return true;
  return (await el.getAttribute("aria-disabled")) === "true";
}
