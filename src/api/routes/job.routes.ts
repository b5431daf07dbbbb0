import express, { NextFunction, Request, Response } from "express";
import { ApplicationJobQueue } from "../../jobs/application-queue";
import {
  ATTEMPTS_RETRY,
  EXPONENTIAL_BACKOFF_DELAY,
  QUEUE_NAME,
  REMOVE_ON_COMPLETE,
  REMOVE_ON_FAIL,
} from "../../utils/constants";
import logger from "../../utils/logger";
import {
  readApplicationInput,
  uploadDocuments,
} from "../middlewares/upload.middleware";

export function createJobRouter(queue: ApplicationJobQueue) {
  const router = express.Router();

  /**
   * POST /jobs
   * Queues an application package job. Takes the same input as POST /applications.
   */
  router.post(
    "/jobs",
    uploadDocuments,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const input = readApplicationInput(req);

        // Add the job to the queue with retry and cleanup options
        const job = await queue.add(QUEUE_NAME, input, {
          attempts: ATTEMPTS_RETRY,
          backoff: {
            type: "exponential",
            delay: EXPONENTIAL_BACKOFF_DELAY,
          },
          removeOnComplete: REMOVE_ON_COMPLETE,
          removeOnFail: REMOVE_ON_FAIL,
        });

        logger.info("Job queued successfully", { jobId: job.id });

        return res.status(202).json({ id: job.id, status: "queued" });
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * GET /jobs/:jobId
   * Returns the job status, and the report once it has completed.
   */
  router.get(
    "/jobs/:jobId",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { jobId } = req.params;
        const job = await queue.getJob(jobId);

        if (!job) {
          return res.status(404).json({ error: "Job not found" });
        }

        const status = await job.getState();

        return res.json({
          id: job.id ?? jobId,
          status,
          report: job.returnvalue?.report ?? null,
          error: status === "failed" ? job.failedReason : null,
        });
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
