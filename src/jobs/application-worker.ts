import { Job, UnrecoverableError, Worker } from "bullmq";
import { ApplicationService } from "../services/application.services";
import { QUEUE_NAME, WORKER_CONCURRENCY } from "../utils/constants";
import {
  AtsScoreError,
  DocumentParseError,
  PipelineStepError,
  RequestValidationError,
} from "../utils/errors";
import logger from "../utils/logger";
import { createRedisConnection } from "../utils/redis";
import type {
  ApplicationJobData,
  ApplicationJobResult,
} from "./application-queue";

/* Input and routing failures fail the same way on every attempt */
function isUnrecoverable(error: unknown): boolean {
  const cause = error instanceof PipelineStepError ? error.cause : error;
  return (
    cause instanceof DocumentParseError ||
    cause instanceof AtsScoreError ||
    cause instanceof RequestValidationError
  );
}

/**
 * Runs one queued application job. Failures are rethrown with a message that
 * names the failed step; input and routing failures are marked unrecoverable
 * so BullMQ does not retry them.
 */
export async function processApplicationJob(
  job: Pick<Job<ApplicationJobData>, "id" | "data">,
  applicationService: ApplicationService,
): Promise<ApplicationJobResult> {
  const { resume, jobDescription } = job.data;

  // Validate required job data
  if (!resume || !jobDescription) {
    logger.error("Invalid job data: missing required fields", {
      jobId: job.id,
    });
    throw new UnrecoverableError("Invalid job data: missing required fields");
  }

  try {
    const { report } = await applicationService.generatePackage(job.data);

    logger.info("Job completed successfully", {
      jobId: job.id,
      atsScore: report.atsScore,
      improvementTier: report.improvementTier,
    });

    return { report };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error("Job processing failed", { jobId: job.id, error: message });

    if (isUnrecoverable(error)) {
      throw new UnrecoverableError(message);
    }
    throw new Error(message, { cause: error });
  }
}

/**
 * BullMQ Worker that builds application packages from the queue.
 * Jobs are independent, so several can run at once.
 */
export function createApplicationWorker(
  applicationService: ApplicationService,
): Worker<ApplicationJobData, ApplicationJobResult> {
  const worker = new Worker<ApplicationJobData, ApplicationJobResult>(
    QUEUE_NAME,
    (job) => processApplicationJob(job, applicationService),
    {
      connection: createRedisConnection(),
      concurrency: WORKER_CONCURRENCY,
    },
  );

  worker.on("ready", () => {
    logger.info("Worker is ready and listening for jobs");
  });

  worker.on("error", (error) => {
    logger.error("Worker error occurred", { error: error.message });
  });

  worker.on("completed", (job) => {
    logger.info("Worker completed job", { jobId: job.id });
  });

  worker.on("failed", (job, err) => {
    logger.error("Worker failed job", { jobId: job?.id, error: err.message });
  });

  worker.on("active", (job) => {
    logger.info("Worker started processing job", { jobId: job.id });
  });

  worker.on("stalled", (jobId) => {
    logger.warn("Job stalled", { jobId });
  });

  return worker;
}
