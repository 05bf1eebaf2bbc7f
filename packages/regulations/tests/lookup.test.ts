import { describe, expect, it } from "vitest";

import { EMPTY_CLAUSES, failure, ok, type RegulationTable } from "@concrete-screen/core";

import { createFileRegulationProvider, lookup, type RegulationProvider } from "../src/index.js";

function tableProvider(tables: Record<string, RegulationTable>): RegulationProvider {
  return {
    listJurisdictions: () => ok(Object.keys(tables).sort()),
    loadTable: (jurisdiction) =>
      tables[jurisdiction]
        ? ok(tables[jurisdiction])
        : failure("E_REGULATION_NOT_FOUND", `regulation not found for jurisdiction '${jurisdiction}'`),
    loadExposureClassMapping: () => ok({}),
  };
}

describe("lookup", () => {
  it("keeps known classes and warns about the rest", () => {
    const result = lookup(createFileRegulationProvider(), "EN206", ["XC4", "XZ9", "XC1"]);
    if (!result.ok) throw new Error(result.error.explain);
    expect(Object.keys(result.value.table).sort()).toEqual(["XC1", "XC4"]);
    expect(result.value.table.XC1?.max_water_cement_ratio).toBe(0.65);
    expect(result.value.unknownClasses).toEqual(["XZ9"]);
    expect(result.warnings).toEqual(["unknown exposure class 'XZ9' for jurisdiction 'EN206'"]);
  });

  it("does not resolve inherited object keys as classes", () => {
    const provider = tableProvider({ LOCAL: { P1: { ...EMPTY_CLAUSES, min_cement_content: 250 } } });
    const result = lookup(provider, "LOCAL", ["toString", "P1"]);
    if (!result.ok) throw new Error(result.error.explain);
    expect(Object.keys(result.value.table)).toEqual(["P1"]);
    expect(result.value.unknownClasses).toEqual(["toString"]);
  });

  it("returns an empty table for an empty class list", () => {
    const result = lookup(createFileRegulationProvider(), "EN206", []);
    expect(result).toEqual({ ok: true, value: { jurisdiction: "EN206", table: {}, unknownClasses: [] } });
  });

  it("propagates provider failures", () => {
    const result = lookup(tableProvider({}), "EU", ["XC1"]);
    if (result.ok) throw new Error("expected failure");
    expect(result.error).toEqual({
      code: "E_REGULATION_NOT_FOUND",
      explain: "regulation not found for jurisdiction 'EU'",
    });
  });
});
