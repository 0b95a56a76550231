/**
 * Error types raised by the crawl engine
 */

export class CrawlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CrawlError";
  }
}

/** Invalid crawl configuration or operational parameters */
export class ConfigError extends CrawlError {
  constructor(
    message: string,
    public field?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** A wait-for-selector, network-idle or navigation call exceeded its bound */
export class NavigationTimeoutError extends CrawlError {
  constructor(
    message: string,
    public timeoutMs: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "NavigationTimeoutError";
  }
}

/** Clicking "next" did not move the confirmed page to the target */
export class DesyncError extends CrawlError {
  constructor(
    public workerId: number,
    public expectedPage: number,
    public confirmedPage: number,
  ) {
    super(
      `Worker ${workerId} expected page ${expectedPage} but is stuck on ${confirmedPage}`,
    );
    this.name = "DesyncError";
  }
}

/** One row could not be turned into a sale record */
export class ExtractionError extends CrawlError {
  constructor(
    message: string,
    public rowIndex: number,
    public field?: "name" | "price" | "timestamp",
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

/** Writing a checkpoint or snapshot failed */
export class PersistError extends CrawlError {
  constructor(
    message: string,
    public path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PersistError";
  }
}

/** A worker could not open its browsing session */
export class SessionAcquisitionError extends CrawlError {
  constructor(
    public workerId: number,
    options?: { cause?: unknown },
  ) {
    super(`Worker ${workerId} could not open a browser session`, options);
    this.name = "SessionAcquisitionError";
  }
}

export class ChannelClosedError extends CrawlError {
  constructor() {
    super("Result channel is closed");
    this.name = "ChannelClosedError";
  }
}

export class ChannelTimeoutError extends CrawlError {
  constructor(public timeoutMs: number) {
    super(`Result channel send timed out after ${timeoutMs}ms`);
    this.name = "ChannelTimeoutError";
  }
}

/**
 * Extracts a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
