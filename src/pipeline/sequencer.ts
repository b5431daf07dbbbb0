import { PipelineStepError } from "../utils/errors";
import logger from "../utils/logger";
import type { LLMService } from "../services/llm.services";
import {
  ApplicationState,
  markCompleted,
  StepId,
} from "./application-state";
import { buildReport } from "./report";

export interface StepContext {
  llm: LLMService;
  /* Correlates log lines of one run */
  runId: string;
}

export interface PipelineStep {
  id: StepId;
  description: string;
  run(state: ApplicationState, context: StepContext): Promise<ApplicationState>;
}

/**
 * A pipeline position filled by exactly one of several steps, chosen from the
 * state reached so far.
 */
export interface PipelineBranch {
  id: string;
  select(state: ApplicationState): PipelineStep;
}

export type PipelineNode =
  | { kind: "step"; step: PipelineStep }
  | { kind: "branch"; branch: PipelineBranch };

export interface StepTrace {
  step: StepId;
  durationMs: number;
}

export interface PipelineResult {
  state: ApplicationState;
  trace: StepTrace[];
}

function resolveStep(node: PipelineNode, state: ApplicationState): PipelineStep {
  return node.kind === "step" ? node.step : node.branch.select(state);
}

/**
 * Runs the nodes strictly in order. Each step receives the state returned by
 * the previous one. The first failure stops the run with a PipelineStepError
 * naming the step and holding the report of every completed step.
 */
export async function runPipeline(
  nodes: readonly PipelineNode[],
  initialState: ApplicationState,
  context: StepContext,
): Promise<PipelineResult> {
  let state = initialState;
  const trace: StepTrace[] = [];

  for (const node of nodes) {
    // Until a branch has chosen, failures are reported against the branch
    let position: string = node.kind === "step" ? node.step.id : node.branch.id;
    const startedAt = Date.now();

    try {
      const step = resolveStep(node, state);
      position = step.id;
      logger.info(`Running step: ${step.description}`, {
        runId: context.runId,
        step: step.id,
      });

      const next = await step.run(state, context);
      state = markCompleted(next, step.id);

      const durationMs = Date.now() - startedAt;
      trace.push({ step: step.id, durationMs });
      logger.info("Step completed", {
        runId: context.runId,
        step: step.id,
        durationMs,
      });
    } catch (error) {
      logger.error("Pipeline step failed", {
        runId: context.runId,
        step: position,
        error: error instanceof Error ? error.message : error,
      });
      throw new PipelineStepError(position, error, buildReport(state));
    }
  }

  return { state, trace };
}
