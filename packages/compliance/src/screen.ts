import {
  ERROR_CODES,
  error,
  mapValue,
  noopLogger,
  ok,
  type ClauseVector,
  type ComplianceVerdict,
  type DerivedMetrics,
  type Logger,
  type ProductDeclaration,
  type RequirementRecord,
  type Result,
  type ScreenError,
} from "@concrete-screen/core";
import { lookup, type RegulationProvider } from "@concrete-screen/regulations";

import { unionExposureClasses } from "./classes.js";
import { combine, type DrawingContribution } from "./combine.js";
import { evaluateCompliance } from "./evaluate.js";
import { deriveMetrics } from "./metrics.js";
import {
  drawingClauses,
  parseDrawingRecord,
  parseProductDeclaration,
  parseUserConstraints,
  userClauses,
} from "./records.js";

/** Output of the extraction provider for one product declaration. */
export interface ProductDocument {
  readonly id: string;
  readonly record?: unknown;
  readonly error?: string;
}

export interface ProductScreeningOk {
  readonly id: string;
  readonly ok: true;
  readonly declaration: ProductDeclaration;
  readonly metrics: DerivedMetrics;
  readonly verdict: ComplianceVerdict;
  readonly warnings: readonly string[];
}

export interface ProductScreeningFailure {
  readonly id: string;
  readonly ok: false;
  readonly error: ScreenError;
}

export type ProductScreening = ProductScreeningOk | ProductScreeningFailure;

export interface ScreeningScenario {
  readonly jurisdiction: string;
  readonly exposureClasses?: unknown;
  /** Raw user-constraint record from the extraction provider. */
  readonly user?: unknown;
  /** Raw drawing record from the extraction provider. */
  readonly drawing?: unknown;
}

export type ScenarioSource = "user" | "drawing";

export interface SourceFailure {
  readonly source: ScenarioSource;
  readonly error: ScreenError;
}

export interface RequirementBuild {
  readonly jurisdiction: string;
  readonly requirement: RequirementRecord;
  readonly unknownClasses: readonly string[];
  readonly sourceFailures: readonly SourceFailure[];
  readonly warnings: readonly string[];
}

export interface ScreeningSummary {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly errored: number;
}

export interface ScreeningReport extends RequirementBuild {
  readonly products: readonly ProductScreening[];
  readonly summary: ScreeningSummary;
}

export interface ExtractionJob {
  readonly id: string;
  readonly extract: () => Promise<unknown>;
}

function isAbsent(value: unknown): boolean {
  return value === null || value === undefined;
}

/**
 * Resolves the scenario against the jurisdiction and folds every source into
 * one requirement record. User and drawing records that fail to parse are
 * left out of the fold and reported in `sourceFailures`.
 */
export function buildRequirement(
  provider: RegulationProvider,
  scenario: ScreeningScenario,
  logger: Logger = noopLogger,
): Result<RequirementBuild> {
  const warnings: string[] = [];
  const sourceFailures: SourceFailure[] = [];

  let drawing: DrawingContribution | null = null;
  if (!isAbsent(scenario.drawing)) {
    const parsed = parseDrawingRecord(scenario.drawing);
    if (parsed.ok) {
      drawing = { clauses: drawingClauses(parsed.value), exposureClasses: parsed.value.drawing_exposure_classes };
      warnings.push(...(parsed.warnings ?? []));
    } else {
      logger.warn("drawing record rejected", { code: parsed.error.code, explain: parsed.error.explain });
      sourceFailures.push({ source: "drawing", error: parsed.error });
    }
  }

  let user: ClauseVector | null = null;
  if (!isAbsent(scenario.user)) {
    const parsed = parseUserConstraints(scenario.user);
    if (parsed.ok) {
      user = userClauses(parsed.value);
      warnings.push(...(parsed.warnings ?? []));
    } else {
      logger.warn("user constraints rejected", { code: parsed.error.code, explain: parsed.error.explain });
      sourceFailures.push({ source: "user", error: parsed.error });
    }
  }

  const classes = unionExposureClasses(scenario.exposureClasses, drawing?.exposureClasses);
  const resolved = lookup(provider, scenario.jurisdiction, classes);
  if (!resolved.ok) {
    logger.error("regulation lookup failed", {
      jurisdiction: scenario.jurisdiction,
      code: resolved.error.code,
      explain: resolved.error.explain,
    });
    return resolved;
  }
  warnings.push(...(resolved.warnings ?? []));

  const requirement = combine(classes, resolved.value.table, drawing, user);
  logger.info("requirements combined", {
    jurisdiction: scenario.jurisdiction,
    classes: requirement.source_exposure_classes,
  });

  return ok({
    jurisdiction: scenario.jurisdiction,
    requirement,
    unknownClasses: resolved.value.unknownClasses,
    sourceFailures,
    warnings,
  });
}

export function screenProduct(requirement: RequirementRecord, document: ProductDocument): ProductScreening {
  if (document.error !== undefined) {
    return {
      id: document.id,
      ok: false,
      error: error(ERROR_CODES.providerFailure, `${document.id}: ${document.error}`, { document: document.id }),
    };
  }
  const parsed = parseProductDeclaration(document.record, document.id);
  if (!parsed.ok) {
    return { id: document.id, ok: false, error: parsed.error };
  }
  const metrics = deriveMetrics(parsed.value);
  return {
    id: document.id,
    ok: true,
    declaration: parsed.value,
    metrics,
    verdict: evaluateCompliance(metrics, requirement),
    warnings: parsed.warnings ?? [],
  };
}

/** Screens every document independently; input order is preserved. */
export function screenProducts(
  requirement: RequirementRecord,
  documents: readonly ProductDocument[],
  logger: Logger = noopLogger,
): ProductScreening[] {
  return documents.map((document) => {
    const screening = screenProduct(requirement, document);
    if (screening.ok) {
      logger.info("product screened", { document: document.id, pass: screening.verdict.pass });
    } else {
      logger.warn("product not screened", { document: document.id, code: screening.error.code });
    }
    return screening;
  });
}

export function summarize(products: readonly ProductScreening[]): ScreeningSummary {
  let passed = 0;
  let failed = 0;
  let errored = 0;
  for (const product of products) {
    if (!product.ok) errored += 1;
    else if (product.verdict.pass) passed += 1;
    else failed += 1;
  }
  return { total: products.length, passed, failed, errored };
}

export function runScreening(
  provider: RegulationProvider,
  scenario: ScreeningScenario,
  documents: readonly ProductDocument[],
  logger: Logger = noopLogger,
): Result<ScreeningReport> {
  return mapValue(buildRequirement(provider, scenario, logger), (built) => {
    const products = screenProducts(built.requirement, documents, logger);
    return { ...built, products, summary: summarize(products) };
  });
}

/**
 * Runs extraction jobs concurrently. A rejected job becomes a document
 * carrying its error message, so one failure never drops its siblings.
 */
export async function collectExtractions(jobs: readonly ExtractionJob[]): Promise<ProductDocument[]> {
  const settled = await Promise.allSettled(jobs.map(async (job) => job.extract()));
  return settled.map((outcome, index) => {
    const id = jobs[index].id;
    if (outcome.status === "fulfilled") {
      return { id, record: outcome.value };
    }
    const reason: unknown = outcome.reason;
    return { id, error: reason instanceof Error ? reason.message : String(reason) };
  });
}
