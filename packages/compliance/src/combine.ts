import {
  CLAUSE_NAMES,
  deepFreeze,
  type ClauseName,
  type ClauseVector,
  type RegulationTable,
  type RequirementRecord,
} from "@concrete-screen/core";

import { unionExposureClasses } from "./classes.js";
import { PERMISSIVE_SEED, tighten } from "./clauses.js";

export interface DrawingContribution {
  readonly clauses?: ClauseVector | null;
  /** May be nested; flattened before the union. */
  readonly exposureClasses?: unknown;
}

type RunningVector = Record<ClauseName, number>;

function seed(): RunningVector {
  return { ...PERMISSIVE_SEED };
}

function fold(running: RunningVector, source: ClauseVector | null | undefined): void {
  if (!source) return;
  for (const clause of CLAUSE_NAMES) {
    running[clause] = tighten(clause, running[clause], source[clause]);
  }
}

function finish(running: RunningVector): ClauseVector {
  const settle = (clause: ClauseName): number | null =>
    running[clause] === PERMISSIVE_SEED[clause] ? null : running[clause];
  return {
    max_water_cement_ratio: settle("max_water_cement_ratio"),
    min_cement_content: settle("min_cement_content"),
    min_strength_cylinder: settle("min_strength_cylinder"),
    min_strength_cube: settle("min_strength_cube"),
    max_aggregate_size: settle("max_aggregate_size"),
  };
}

/** Most stringent value per clause across the given vectors, without provenance. */
export function foldClauseVectors(sources: ReadonlyArray<ClauseVector | null | undefined>): ClauseVector {
  const running = seed();
  for (const source of sources) {
    fold(running, source);
  }
  return finish(running);
}

/**
 * Builds the requirement record for a scenario. Regulation clauses of every
 * contributing class are folded first, then drawing clauses, then user
 * clauses; each stage can only tighten what the previous ones produced.
 */
export function combine(
  exposureClasses: unknown,
  regulationTable: RegulationTable,
  drawing?: DrawingContribution | null,
  userClauses?: ClauseVector | null,
): RequirementRecord {
  const classes = unionExposureClasses(exposureClasses, drawing?.exposureClasses);
  const running = seed();

  for (const code of classes) {
    if (Object.prototype.hasOwnProperty.call(regulationTable, code)) {
      fold(running, regulationTable[code]);
    }
  }
  fold(running, drawing?.clauses);
  fold(running, userClauses);

  return deepFreeze({
    ...finish(running),
    source_exposure_classes: classes,
  });
}
