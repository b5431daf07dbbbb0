import { randomUUID } from "crypto";
import {
  ApplicationInput,
  createInitialState,
} from "../pipeline/application-state";
import {
  refineReport,
  RefinementFocusId,
} from "../pipeline/refinement";
import { ApplicationReport, buildReport } from "../pipeline/report";
import { runPipeline, StepTrace } from "../pipeline/sequencer";
import { APPLICATION_PIPELINE } from "../pipeline/steps";
import logger from "../utils/logger";
import { LLMService } from "./llm.services";

export interface ApplicationPackage {
  report: ApplicationReport;
  trace: StepTrace[];
}

// Service to run the application workflow end to end
export class ApplicationService {
  constructor(private readonly llmService: LLMService) {}

  /**
   * Turns a resume and job description into a job-application package.
   * Each call works on its own state; concurrent calls share nothing.
   *
   * @throws PipelineStepError naming the failed step, with the partial report.
   */
  async generatePackage(input: ApplicationInput): Promise<ApplicationPackage> {
    const runId = randomUUID();
    logger.info("Starting application package generation", {
      runId,
      companyName: input.companyName ?? null,
    });

    const { state, trace } = await runPipeline(
      APPLICATION_PIPELINE,
      createInitialState(input),
      { llm: this.llmService, runId },
    );

    const report = buildReport(state);
    logger.info("Application package generated", {
      runId,
      atsScore: report.atsScore,
      improvementTier: report.improvementTier,
      sections: report.sections.length,
    });

    return { report, trace };
  }

  /* Rewrites the sections targeted by the focus, leaving the others as they are */
  async refine(
    report: ApplicationReport,
    focus: RefinementFocusId,
    instructions?: string,
  ): Promise<ApplicationReport> {
    return refineReport(report, focus, this.llmService, instructions);
  }
}
