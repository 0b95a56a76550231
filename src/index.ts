/**
 * Main Entry Point
 * Starts the BullMQ worker and upserts recurring crawl and evaluation jobs
 * This is the primary way to run the application in queue mode
 */

import "dotenv/config";
import http from "http";
import { AppConfig } from "./core/config/app-config";
import {
  closeConnection,
  createCrawlQueue,
  createCrawlWorker,
  scheduleRecurringJob,
  stopActiveJobs,
} from "./core/services/queue";
import { Logger } from "./core/utils/logger";

// Covers the final checkpoint of a crawl stopped mid-run
const SHUTDOWN_GRACE_MS = 30000;

/**
 * Main application function
 */
async function main() {
  Logger.info("Starting auction history crawler");

  const queue = createCrawlQueue();

  Logger.info("Setting up recurring schedules");
  const schedules = [
    { data: { kind: "history" as const }, cron: AppConfig.CRAWL_CRON },
    { data: { kind: "evaluate" as const }, cron: AppConfig.EVALUATE_CRON },
  ];
  for (const { data, cron } of schedules) {
    try {
      await scheduleRecurringJob(queue, data, cron);
      Logger.info(`✅ Scheduled recurring ${data.kind} job`);
    } catch (error) {
      Logger.error(`Failed to schedule ${data.kind}`, error);
    }
  }

  const worker = createCrawlWorker();

  // Graceful shutdown
  const shutdown = async () => {
    Logger.info("Graceful shutdown initiated");
    setTimeout(() => {
      Logger.warn(`Forced exit after ${SHUTDOWN_GRACE_MS / 1000}s`);
      process.exit(1);
    }, SHUTDOWN_GRACE_MS).unref();

    const stopping = stopActiveJobs();
    if (stopping > 0) Logger.info(`Stopping ${stopping} running job(s)`);
    await worker.close();
    await queue.close();
    await closeConnection();
    server.close(() => {
      Logger.info("Health server closed");
      process.exit(0);
    });
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      Logger.error("Shutdown failed", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  Logger.info("🚀 Application is ready and listening for jobs");
}

// Health check server
const server = http.createServer((req, res) => {
  if (req.url === "/healthz") {
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end("ok");
  } else {
    res.writeHead(404);
    res.end();
  }
});

server.listen(AppConfig.HEALTH_PORT, () => {
  Logger.info("Health check endpoint listening on /healthz");
});

main().catch((e) => {
  Logger.error("Startup failed", e);
  process.exit(1);
});
