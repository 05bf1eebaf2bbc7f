import { describe, expect, it } from "vitest";

import { EMPTY_CLAUSES, type RegulationTable } from "@concrete-screen/core";
import { createFileRegulationProvider } from "@concrete-screen/regulations";

import { combine, foldClauseVectors, unionExposureClasses } from "../src/index.js";

function en206(): RegulationTable {
  const loaded = createFileRegulationProvider().loadTable("EN206");
  if (!loaded.ok) throw new Error(loaded.error.explain);
  return loaded.value;
}

describe("unionExposureClasses", () => {
  it("flattens nested lists, trims codes and drops blanks", () => {
    expect(unionExposureClasses(["XC4", [" XD1 ", ["XC4"]]], undefined, ["", 7, "XA1"])).toEqual([
      "XA1",
      "XC4",
      "XD1",
    ]);
  });

  it("accepts a single code", () => {
    expect(unionExposureClasses("XF2")).toEqual(["XF2"]);
  });
});

describe("combine", () => {
  const table = en206();

  it("takes a single class's clauses verbatim", () => {
    expect(combine(["XC4"], table)).toEqual({
      max_water_cement_ratio: 0.5,
      min_cement_content: 300,
      min_strength_cylinder: 30,
      min_strength_cube: 37,
      max_aggregate_size: null,
      source_exposure_classes: ["XC4"],
    });
  });

  it("keeps the most stringent value per clause across classes", () => {
    expect(combine(["XC4", "XD3"], table)).toEqual({
      max_water_cement_ratio: 0.45,
      min_cement_content: 320,
      min_strength_cylinder: 35,
      min_strength_cube: 45,
      max_aggregate_size: null,
      source_exposure_classes: ["XC4", "XD3"],
    });
  });

  it("lets user constraints tighten but never loosen", () => {
    const tighter = combine(["XC4"], table, null, { ...EMPTY_CLAUSES, max_water_cement_ratio: 0.45 });
    expect(tighter.max_water_cement_ratio).toBe(0.45);

    const looser = combine(["XC4"], table, null, { ...EMPTY_CLAUSES, max_water_cement_ratio: 0.7, min_cement_content: 250 });
    expect(looser.max_water_cement_ratio).toBe(0.5);
    expect(looser.min_cement_content).toBe(300);
  });

  it("adds drawing classes and drawing clauses", () => {
    const record = combine(["XC1"], table, {
      exposureClasses: [["XS2"], "XC1 "],
      clauses: { ...EMPTY_CLAUSES, max_aggregate_size: 22, min_strength_cylinder: 40 },
    });
    expect(record).toEqual({
      max_water_cement_ratio: 0.45,
      min_cement_content: 320,
      min_strength_cylinder: 40,
      min_strength_cube: 45,
      max_aggregate_size: 22,
      source_exposure_classes: ["XC1", "XS2"],
    });
  });

  it("ignores classes the table does not define", () => {
    expect(combine(["XC4", "XZ9"], table)).toEqual({
      ...combine(["XC4"], table),
      source_exposure_classes: ["XC4", "XZ9"],
    });
  });

  it("reports clauses nobody constrained as null", () => {
    expect(combine([], table)).toEqual({ ...EMPTY_CLAUSES, source_exposure_classes: [] });
    expect(combine(["X0"], table)).toEqual({ ...EMPTY_CLAUSES, source_exposure_classes: ["X0"] });
  });

  it("treats a value equal to the permissive starting point as unconstrained", () => {
    const record = combine([], table, null, { ...EMPTY_CLAUSES, max_water_cement_ratio: 1, min_cement_content: 0 });
    expect(record.max_water_cement_ratio).toBeNull();
    expect(record.min_cement_content).toBeNull();
  });

  it("returns a frozen record", () => {
    const record = combine(["XC4"], table);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.source_exposure_classes)).toBe(true);
  });
});

describe("foldClauseVectors", () => {
  it("skips null and non-finite values", () => {
    expect(
      foldClauseVectors([
        { ...EMPTY_CLAUSES, min_cement_content: Number.NaN, max_aggregate_size: 16 },
        null,
        { ...EMPTY_CLAUSES, min_cement_content: 280, max_aggregate_size: Number.POSITIVE_INFINITY },
      ]),
    ).toEqual({ ...EMPTY_CLAUSES, min_cement_content: 280, max_aggregate_size: 16 });
  });
});
