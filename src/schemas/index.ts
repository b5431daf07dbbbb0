export { atsAnalysisResponse, atsAnalysisSchema } from "./ats-schemas";
export {
  improvementResponse,
  improvementSchema,
  type ImprovementSuggestion,
} from "./improvement-schemas";
export { revisionResponse, revisionSchema } from "./review-schemas";
export {
  buildRefinementResponse,
  buildRefinementSchema,
} from "./refinement-schemas";
