export { PERMISSIVE_SEED, isAtLeastAsStrict, isUnconstrained, tighten } from "./clauses.js";
export { unionExposureClasses } from "./classes.js";
export type { DrawingContribution } from "./combine.js";
export { combine, foldClauseVectors } from "./combine.js";
export type { CompositionTotals } from "./metrics.js";
export { deriveMetrics, sumComposition } from "./metrics.js";
export { NOTHING_TO_CHECK, evaluateCompliance } from "./evaluate.js";
export type { StrengthClass } from "./records.js";
export {
  drawingClauses,
  parseDrawingRecord,
  parseProductDeclaration,
  parseStrengthClass,
  parseUserConstraints,
  userClauses,
} from "./records.js";
export type {
  ExtractionJob,
  ProductDocument,
  ProductScreening,
  ProductScreeningFailure,
  ProductScreeningOk,
  RequirementBuild,
  ScenarioSource,
  ScreeningReport,
  ScreeningScenario,
  ScreeningSummary,
  SourceFailure,
} from "./screen.js";
export {
  buildRequirement,
  collectExtractions,
  runScreening,
  screenProduct,
  screenProducts,
  summarize,
} from "./screen.js";
