import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { AppError, PipelineStepError } from "../../utils/errors";
import logger from "../../utils/logger";

/**
 * Final error handler: maps application, upload and body-parsing errors to
 * JSON responses. A failed pipeline step also returns the partial report.
 */
export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  if (res.headersSent) return next(error);

  if (error instanceof multer.MulterError) {
    switch (error.code) {
      case "LIMIT_FILE_SIZE":
        return res.status(400).json({
          error: "File size too large. Maximum allowed size is 10MB.",
        });
      case "LIMIT_UNEXPECTED_FILE":
        return res.status(400).json({
          error:
            "Unexpected file field. Only 'resume' and 'job_description' are allowed.",
        });
      default:
        return res.status(400).json({ error: error.message });
    }
  }

  if (error instanceof PipelineStepError) {
    logger.warn("Request failed in pipeline", {
      path: req.path,
      step: error.step,
      error: error.message,
    });
    return res.status(error.statusCode).json({
      error: error.message,
      step: error.step,
      partial_report: error.partialReport,
    });
  }

  if (error instanceof AppError) {
    logger.warn("Request rejected", { path: req.path, error: error.message });
    return res.status(error.statusCode).json({ error: error.message });
  }

  // Raised by express.json() for unparseable bodies
  if (error instanceof SyntaxError) {
    return res.status(400).json({ error: "Malformed JSON body." });
  }

  logger.error("Unhandled request error", {
    path: req.path,
    error: error instanceof Error ? error.message : error,
  });
  return res.status(500).json({ error: "Internal server error." });
};
