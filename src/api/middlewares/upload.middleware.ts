import { Request } from "express";
import { z } from "zod";
import type {
  ApplicationInput,
  DocumentSource,
} from "../../pipeline/application-state";
import { upload } from "../../utils/multer";
import { RequestValidationError } from "../../utils/errors";

/**
 * Multer middleware for the two optional document uploads.
 * Requests without a multipart body pass through untouched.
 */
export const uploadDocuments = upload.fields([
  { name: "resume", maxCount: 1 },
  { name: "job_description", maxCount: 1 },
]);

const applicationBody = z.object({
  resume_text: z.string().optional(),
  job_description_text: z.string().optional(),
  company_name: z.string().nullish(),
});

function documentFrom(
  file: Express.Multer.File | undefined,
  text: string | undefined,
): DocumentSource | null {
  if (file) {
    return {
      kind: "pdf",
      filename: file.originalname,
      base64: file.buffer.toString("base64"),
    };
  }
  if (text !== undefined) return { kind: "text", text };
  return null;
}

/**
 * Reads the resume and job description of an application request, each one
 * either an uploaded PDF or a text field. Ensures both are present.
 */
export function readApplicationInput(req: Request): ApplicationInput {
  const body = applicationBody.safeParse(req.body ?? {});
  if (!body.success) {
    throw new RequestValidationError(
      "resume_text, job_description_text and company_name must be strings.",
    );
  }

  const files = req.files && !Array.isArray(req.files) ? req.files : {};
  const resume = documentFrom(files["resume"]?.[0], body.data.resume_text);
  const jobDescription = documentFrom(
    files["job_description"]?.[0],
    body.data.job_description_text,
  );

  if (!resume || !jobDescription) {
    throw new RequestValidationError(
      "Both a resume and a job description are required, as PDF files (resume, job_description) or text (resume_text, job_description_text).",
    );
  }

  return {
    resume,
    jobDescription,
    companyName: body.data.company_name ?? null,
  };
}
