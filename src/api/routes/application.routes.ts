import express, { NextFunction, Request, Response } from "express";
import { z } from "zod";
import {
  isRefinementFocusId,
  REFINEMENT_FOCUS_IDS,
  REFINEMENT_FOCUSES,
} from "../../pipeline/refinement";
import { ApplicationReport, SECTION_IDS } from "../../pipeline/report";
import { ApplicationService } from "../../services/application.services";
import { RequestValidationError } from "../../utils/errors";
import logger from "../../utils/logger";
import {
  readApplicationInput,
  uploadDocuments,
} from "../middlewares/upload.middleware";

const DOWNLOAD_FILENAME = "job-application-package.txt";

const reportSchema = z.object({
  companyName: z.string().nullable(),
  atsScore: z.number().nullable(),
  improvementTier: z.enum(["skip", "standard", "deep"]).nullable(),
  sections: z.array(
    z.object({
      id: z.enum(SECTION_IDS),
      title: z.string(),
      content: z.string(),
    }),
  ),
  text: z.string(),
});

const refineBody = z.object({
  report: reportSchema,
  focus: z.string(),
  instructions: z.string().max(2000).optional(),
});

/* JSON by default, the plain-text package as a download with ?format=txt */
function sendReport(
  req: Request,
  res: Response,
  report: ApplicationReport,
  extra: Record<string, unknown> = {},
) {
  if (req.query.format === "txt") {
    res.attachment(DOWNLOAD_FILENAME);
    res.type("text/plain; charset=utf-8");
    return res.send(report.text);
  }
  return res.json({ report, ...extra });
}

export function createApplicationRouter(
  applicationService: ApplicationService,
) {
  const router = express.Router();

  /**
   * GET /refinement-focuses
   * Lists the refinement focus options for the front end's dropdown.
   */
  router.get("/refinement-focuses", (req: Request, res: Response) => {
    res.json(
      REFINEMENT_FOCUS_IDS.map((id) => ({
        id,
        label: REFINEMENT_FOCUSES[id].label,
        targets: REFINEMENT_FOCUSES[id].targets,
      })),
    );
  });

  /**
   * POST /applications
   * Runs the full workflow for a resume and job description and returns the report.
   * Accepts multipart uploads ('resume', 'job_description') or JSON text fields.
   */
  router.post(
    "/applications",
    uploadDocuments,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const input = readApplicationInput(req);

        logger.info("Received application request", {
          resume: input.resume.kind,
          jobDescription: input.jobDescription.kind,
          companyName: input.companyName,
        });

        const { report, trace } =
          await applicationService.generatePackage(input);
        sendReport(req, res, report, { trace });
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * POST /applications/refine
   * Rewrites the sections targeted by the chosen focus in a previously generated report.
   */
  router.post(
    "/applications/refine",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = refineBody.safeParse(req.body);
        if (!body.success) {
          throw new RequestValidationError(
            "report, focus and optional instructions are required; report must be a generated application report.",
          );
        }

        const { report, focus, instructions } = body.data;
        if (!isRefinementFocusId(focus)) {
          throw new RequestValidationError(
            `Unknown refinement focus "${focus}". Expected one of: ${REFINEMENT_FOCUS_IDS.join(", ")}.`,
          );
        }

        const refined = await applicationService.refine(
          report,
          focus,
          instructions,
        );
        sendReport(req, res, refined);
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
