export type {
  ClauseDirection,
  ClauseFinding,
  ClauseName,
  ClauseVector,
  ComplianceVerdict,
  DerivedMetrics,
  DrawingElementRequirements,
  DrawingRecord,
  ExposureClass,
  FindingOutcome,
  MaterialFraction,
  NestedClasses,
  ProductDeclaration,
  RegulationTable,
  RequirementRecord,
  UserConstraints,
} from "./types.js";
export { CLAUSE_DIRECTIONS, CLAUSE_NAMES, EMPTY_CLAUSES } from "./types.js";

export type { ErrorCode, Failure, Ok, Result, ScreenError } from "./result.js";
export { ERROR_CODES, error, failure, formatFailure, mapValue, ok } from "./result.js";

export type { PointerSegment } from "./canonical.js";
export { canonicalJson, canonicalize, isPlainObject, pointerFromSegments, prettyCanonicalJson } from "./canonical.js";

export type { LineWriter, LogLevel, LogRecord, LogSink, Logger } from "./log.js";
export {
  createLogger,
  fileSink,
  memorySink,
  noopLogger,
  openLogSink,
  silentSink,
  streamSink,
} from "./log.js";

export type { ScreenEnv } from "./env.js";
export { parseLogLevel, readEnv, resetScreenEnvForTests, screenEnv } from "./env.js";

export { deepFreeze } from "./freeze.js";
