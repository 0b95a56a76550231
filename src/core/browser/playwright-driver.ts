/**
 * PageDriver backed by Playwright: one shared Chromium, one browser context
 * per session
 */

import {
  type Browser,
  type BrowserContext,
  type ElementHandle as PlaywrightElementHandle,
  type Page,
  errors,
} from "playwright";
import { BROWSER_CONSTANTS } from "../constants";
import { NavigationTimeoutError } from "../errors";
import type { ElementHandle, PageDriver, Session, WaitState } from "../types";
import { Logger } from "../utils/logger";
import { launchBrowser } from "./launcher";
import { optimizeContext } from "./optimization";

type DomHandle = PlaywrightElementHandle<SVGElement | HTMLElement>;

async function boundedWait<T>(operation: Promise<T>, timeoutMs: number, what: string): Promise<T> {
  try {
    return await operation;
  } catch (error) {
    if (error instanceof errors.TimeoutError) {
      throw new NavigationTimeoutError(`${what} timed out after ${timeoutMs}ms`, timeoutMs, {
        cause: error,
      });
    }
    throw error;
  }
}

class PlaywrightElement implements ElementHandle {
  constructor(private readonly handle: DomHandle) {}

  textContent(): Promise<string | null> {
    return this.handle.textContent();
  }

  getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async query(selector: string): Promise<ElementHandle | null> {
    const child = await this.handle.$(selector);
    return child ? new PlaywrightElement(child) : null;
  }

  click(): Promise<void> {
    return this.handle.click();
  }
}

class PlaywrightSession implements Session {
  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
  ) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    await boundedWait(this.page.goto(url, { timeout: timeoutMs }), timeoutMs, `Navigation to ${url}`);
  }

  async waitFor(selector: string, timeoutMs: number, state: WaitState): Promise<void> {
    await boundedWait(
      this.page.waitForSelector(selector, { timeout: timeoutMs, state }),
      timeoutMs,
      `Waiting for ${selector}`,
    );
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<void> {
    await boundedWait(
      this.page.waitForLoadState("networkidle", { timeout: timeoutMs }),
      timeoutMs,
      "Waiting for network idle",
    );
  }

  async queryAll(selector: string): Promise<ElementHandle[]> {
    const handles = await this.page.$$(selector);
    return handles.map((h) => new PlaywrightElement(h));
  }

  async query(selector: string): Promise<ElementHandle | null> {
    const handle = await this.page.$(selector);
    return handle ? new PlaywrightElement(handle) : null;
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

export class PlaywrightDriver implements PageDriver {
  private browser: Promise<Browser> | null = null;

  constructor(private readonly headless?: boolean) {}

  async openSession(): Promise<Session> {
    const browser = await this.getBrowser();
    const context = await browser.newContext({ viewport: { ...BROWSER_CONSTANTS.VIEWPORT } });
    try {
      await optimizeContext(context);
      const page = await context.newPage();
      return new PlaywrightSession(context, page);
    } catch (error) {
      await context.close();
      throw error;
    }
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const pending = this.browser;
    this.browser = null;
    // a failed launch was already reported to the session that asked for it
    const browser = await pending.catch(() => null);
    if (!browser) return;
    await browser.close();
    Logger.debug("Browser closed");
  }

  private getBrowser(): Promise<Browser> {
    if (!this.browser) {
      const launching = launchBrowser(this.headless);
      // a failed launch is retried by the next session
      launching.catch(() => {
        if (this.browser === launching) this.browser = null;
      });
      this.browser = launching;
    }
    return this.browser;
  }
}
