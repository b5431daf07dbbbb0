import "dotenv/config";
import { createApplicationWorker } from "./jobs/application-worker";
import { ApplicationService } from "./services/application.services";
import { LLMService } from "./services/llm.services";
import { GeminiModelClient } from "./services/model-client";
import logger from "./utils/logger";

/**
 * Starts the application package worker and handles graceful shutdown.
 */
async function startWorker() {
  logger.info("Starting application package worker");

  const applicationService = new ApplicationService(
    new LLMService(new GeminiModelClient()),
  );
  const worker = createApplicationWorker(applicationService);
  await worker.waitUntilReady();

  logger.info("Worker initialization complete");

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal} signal, shutting down worker`);
    await worker.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("Worker shutdown failed", {
        error: error instanceof Error ? error.message : error,
      });
      process.exit(1);
    });
  };

  // Graceful shutdown
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

startWorker().catch((error: unknown) => {
  logger.error("Failed to start worker", {
    error: error instanceof Error ? error.message : error,
  });
  process.exit(1);
});
