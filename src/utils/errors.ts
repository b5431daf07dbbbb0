import type { ApplicationReport } from "../pipeline/report";

/**
 * Base class for errors that reach the HTTP layer or a worker.
 * `statusCode` is the HTTP status the error middleware responds with.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/* Malformed or incomplete request input */
export class RequestValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export type DocumentName = "resume" | "job_description";

/* A document could not be read or held too little text */
export class DocumentParseError extends AppError {
  readonly document: DocumentName;

  constructor(document: DocumentName, message: string, options?: ErrorOptions) {
    super(message, 422, options);
    this.document = document;
  }
}

/* The ATS score is missing, non-numeric or outside 0-100 */
export class AtsScoreError extends AppError {
  readonly received: unknown;

  constructor(received: unknown) {
    super(
      `Unable to route on ATS score: expected a number between 0 and 100, received ${typeof received === "string" ? `"${received}"` : String(received)}`,
      422,
    );
    this.received = received;
  }
}

/* All attempts of a model call failed */
export class ModelCallError extends AppError {
  readonly step: string;
  readonly attempts: number;

  constructor(step: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Model call for step "${step}" failed after ${attempts} attempt(s): ${reason}`,
      502,
      { cause },
    );
    this.step = step;
    this.attempts = attempts;
  }
}

/* The model answered, but not with something usable. Retried by the LLM service. */
export class ModelResponseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ModelResponseError";
  }
}

export class ModelTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Model call timed out after ${timeoutMs}ms`);
    this.name = "ModelTimeoutError";
  }
}

/**
 * Raised by the sequencer when a step fails. Carries the report built from the
 * steps that completed before the failure.
 */
export class PipelineStepError extends AppError {
  /* Step id, or the branch id when a branch could not choose a step */
  readonly step: string;
  readonly partialReport: ApplicationReport;

  constructor(step: string, cause: unknown, partialReport: ApplicationReport) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Pipeline step "${step}" failed: ${reason}`,
      cause instanceof AppError ? cause.statusCode : 500,
      { cause },
    );
    this.step = step;
    this.partialReport = partialReport;
  }
}
