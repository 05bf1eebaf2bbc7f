import { describe, expect, it } from "vitest";
import * as fc from "fast-check";

import { EMPTY_CLAUSES, type ClauseVector } from "@concrete-screen/core";

import { combine, foldClauseVectors, isAtLeastAsStrict } from "../src/index.js";

const FOLD_SEED = 424242;
const COMBINE_SEED = 20240611;

const floor = fc.option(fc.integer({ min: 1, max: 500 }), { nil: null });
const ratio = fc.option(
  fc.integer({ min: 20, max: 95 }).map((hundredths) => hundredths / 100),
  { nil: null },
);

const clauseVector: fc.Arbitrary<ClauseVector> = fc.record({
  max_water_cement_ratio: ratio,
  min_cement_content: floor,
  min_strength_cylinder: floor,
  min_strength_cube: floor,
  max_aggregate_size: floor,
});

const vectors = fc.array(clauseVector, { maxLength: 6 });

describe("combination properties", () => {
  it("never loosens when a source is added", () => {
    fc.assert(
      fc.property(vectors, clauseVector, (sources, extra) => {
        expect(isAtLeastAsStrict(foldClauseVectors([...sources, extra]), foldClauseVectors(sources))).toBe(true);
      }),
      { seed: FOLD_SEED, numRuns: 200 },
    );
  });

  it("treats an all-null vector as the identity", () => {
    fc.assert(
      fc.property(vectors, (sources) => {
        expect(foldClauseVectors([...sources, EMPTY_CLAUSES])).toEqual(foldClauseVectors(sources));
      }),
      { seed: FOLD_SEED, numRuns: 200 },
    );
  });

  it("is idempotent and order independent", () => {
    fc.assert(
      fc.property(vectors, (sources) => {
        const folded = foldClauseVectors(sources);
        expect(foldClauseVectors([...sources, ...sources])).toEqual(folded);
        expect(foldClauseVectors([...sources].reverse())).toEqual(folded);
      }),
      { seed: FOLD_SEED, numRuns: 200 },
    );
  });

  it("makes user constraints at least as strict as the regulation alone", () => {
    const table = { A: { ...EMPTY_CLAUSES, max_water_cement_ratio: 0.5, min_cement_content: 300 } };
    fc.assert(
      fc.property(clauseVector, (user) => {
        expect(isAtLeastAsStrict(combine(["A"], table, null, user), combine(["A"], table))).toBe(true);
      }),
      { seed: COMBINE_SEED, numRuns: 200 },
    );
  });
});
