import pino from "pino";

// Set log level via env LOG_LEVEL (default: info)
const pretty =
  process.env.NODE_ENV !== "production" &&
  process.env.NODE_ENV !== "test" &&
  !process.env.LOG_FILE;

const logger = process.env.LOG_FILE
  ? pino(
      { level: process.env.LOG_LEVEL || "info" },
      pino.multistream([
        { stream: process.stdout },
        { stream: pino.destination({ dest: process.env.LOG_FILE, mkdir: true }) },
      ]),
    )
  : pino({
      level: process.env.LOG_LEVEL || "info",
      transport: pretty
        ? {
            target: "pino-pretty",
            options: { colorize: true },
          }
        : undefined,
    });

export interface LogMeta {
  workerId?: number;
  page?: number;
  url?: string;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: unknown, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      error: error instanceof Error ? error.message : error != null ? String(error) : undefined,
      stack: error instanceof Error ? error.stack : undefined,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static pageExtracted(workerId: number, page: number, count: number, skipped: number): void {
    this.info(`Worker ${workerId} scraped page ${page} with ${count} items`, {
      workerId,
      page,
      count,
      skipped,
    });
  }
  static workerFinished(workerId: number, outcome: string, pages: number): void {
    this.info(`Worker ${workerId} finished: ${outcome}`, {
      workerId,
      outcome,
      pages,
    });
  }
  static checkpointWritten(path: string, items: number, records: number): void {
    this.info(`Database saved to ${path}`, { path, items, records });
  }
  static crawlProgress(processed: number, total: number, rate: number): void {
    this.info(`Progress: ${processed}/${total} pages`, {
      processed,
      total,
      rate: rate.toFixed(2),
    });
  }
}
