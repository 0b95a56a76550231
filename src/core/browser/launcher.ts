/**
 * Browser launching and configuration
 */

import { type Browser, chromium } from "playwright";
import { AppConfig } from "../config/app-config";
import { BROWSER_CONSTANTS } from "../constants";

/**
 * Launches a Chromium browser instance with optimized settings
 * @param headless - Run without a window; defaults to the HEADLESS env setting
 * @returns Promise resolving to the browser instance
 */
export async function launchBrowser(headless: boolean = AppConfig.HEADLESS): Promise<Browser> {
  return await chromium.launch({
    headless,
    args: [...BROWSER_CONSTANTS.LAUNCH_ARGS],
  });
}
