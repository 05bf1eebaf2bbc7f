import { CLAUSE_DIRECTIONS, CLAUSE_NAMES, type ClauseName, type ClauseVector } from "@concrete-screen/core";

/**
 * Starting point of the fold. A combined clause still holding its seed was
 * never tightened by any source and is reported as unconstrained.
 */
export const PERMISSIVE_SEED: Readonly<Record<ClauseName, number>> = Object.freeze({
  max_water_cement_ratio: 1.0,
  min_cement_content: 0,
  min_strength_cylinder: 0,
  min_strength_cube: 0,
  max_aggregate_size: Number.POSITIVE_INFINITY,
});

export function tighten(clause: ClauseName, current: number, candidate: number | null): number {
  if (candidate === null || !Number.isFinite(candidate)) {
    return current;
  }
  return CLAUSE_DIRECTIONS[clause] === "ceiling" ? Math.min(current, candidate) : Math.max(current, candidate);
}

export function isUnconstrained(clause: ClauseName, value: number | null): boolean {
  if (value === null) return true;
  const seed = PERMISSIVE_SEED[clause];
  return CLAUSE_DIRECTIONS[clause] === "ceiling" ? value >= seed : value <= seed;
}

/** True when every clause of `candidate` is at least as strict as in `baseline`. */
export function isAtLeastAsStrict(candidate: ClauseVector, baseline: ClauseVector): boolean {
  return CLAUSE_NAMES.every((clause) => {
    const base = baseline[clause];
    if (base === null || isUnconstrained(clause, base)) return true;
    const next = candidate[clause];
    if (next === null) return false;
    return CLAUSE_DIRECTIONS[clause] === "ceiling" ? next <= base : next >= base;
  });
}
