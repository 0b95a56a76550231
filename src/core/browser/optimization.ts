/**
 * Browser optimization utilities
 */

import type { BrowserContext } from "playwright";
import { BROWSER_CONSTANTS } from "../constants";

const BLOCKED: ReadonlySet<string> = new Set(BROWSER_CONSTANTS.BLOCKED_RESOURCE_TYPES);

/**
 * Blocks heavy resources (images, fonts, stylesheets) for every page of the
 * context; the history table renders without them
 * @param context - Playwright browser context to optimize
 */
export async function optimizeContext(context: BrowserContext): Promise<void> {
  await context.route("**/*", (route) => {
    if (BLOCKED.has(route.request().resourceType())) return route.abort();
    return route.continue();
  });
}
