import { describe, expect, it } from "vitest";

import { EMPTY_CLAUSES, type DerivedMetrics, type RequirementRecord } from "@concrete-screen/core";

import { NOTHING_TO_CHECK, evaluateCompliance } from "../src/index.js";

const requirement = (overrides: Partial<RequirementRecord> = {}): RequirementRecord => ({
  ...EMPTY_CLAUSES,
  source_exposure_classes: ["XC4"],
  ...overrides,
});

const metrics = (overrides: Partial<DerivedMetrics> = {}): DerivedMetrics => ({
  calculated_wc: null,
  cement_content_kg_m3: null,
  strength_mpa: null,
  max_aggregate_size: null,
  ...overrides,
});

describe("evaluateCompliance", () => {
  it("fails when any checked clause fails", () => {
    const verdict = evaluateCompliance(
      metrics({ calculated_wc: 0.5, cement_content_kg_m3: 336, strength_mpa: 32 }),
      requirement({
        max_water_cement_ratio: 0.45,
        min_cement_content: 300,
        min_strength_cylinder: 30,
        min_strength_cube: 37,
      }),
    );
    expect(verdict.pass).toBe(false);
    expect(verdict.details).toEqual([
      "FAIL: EPD w/c ratio (0.50) exceeds required max (0.45).",
      "PASS: EPD cement content (336 kg/m3) meets required min (300 kg/m3).",
      "PASS: EPD strength (32 MPa) meets required min cylinder strength (30 MPa).",
    ]);
    expect(verdict.findings.map((finding) => [finding.clause, finding.outcome])).toEqual([
      ["max_water_cement_ratio", "fail"],
      ["min_cement_content", "pass"],
      ["min_strength_cylinder", "pass"],
    ]);
  });

  it("passes on equality", () => {
    const verdict = evaluateCompliance(metrics({ calculated_wc: 0.5 }), requirement({ max_water_cement_ratio: 0.5 }));
    expect(verdict).toEqual({
      pass: true,
      details: ["PASS: EPD w/c ratio (0.50) meets required max (0.5)."],
      findings: [
        {
          clause: "max_water_cement_ratio",
          outcome: "pass",
          actual: 0.5,
          required: 0.5,
          message: "PASS: EPD w/c ratio (0.50) meets required max (0.5).",
        },
      ],
    });
  });

  it("falls back to the cube strength when no cylinder strength applies", () => {
    const verdict = evaluateCompliance(metrics({ strength_mpa: 25 }), requirement({ min_strength_cube: 37 }));
    expect(verdict.pass).toBe(false);
    expect(verdict.findings[0]?.clause).toBe("min_strength_cube");
    expect(verdict.details).toEqual(["FAIL: EPD strength (25 MPa) is below required min cube strength (37 MPa)."]);
  });

  it("checks aggregate size as a ceiling", () => {
    const required = requirement({ max_aggregate_size: 22 });
    expect(evaluateCompliance(metrics({ max_aggregate_size: 16 }), required).details).toEqual([
      "PASS: EPD aggregate size (16 mm) meets required max (22 mm).",
    ]);
    expect(evaluateCompliance(metrics({ max_aggregate_size: 32 }), required).details).toEqual([
      "FAIL: EPD aggregate size (32 mm) exceeds required max (22 mm).",
    ]);
  });

  it("rounds cement content in the message only", () => {
    const verdict = evaluateCompliance(
      metrics({ cement_content_kg_m3: 299.6 }),
      requirement({ min_cement_content: 300 }),
    );
    expect(verdict.details).toEqual(["FAIL: EPD cement content (300 kg/m3) is below required min (300 kg/m3)."]);
  });

  it("skips clauses missing a value on either side", () => {
    const verdict = evaluateCompliance(
      metrics({ calculated_wc: Number.NaN, cement_content_kg_m3: 250, strength_mpa: 40 }),
      requirement({ max_water_cement_ratio: 0.45 }),
    );
    expect(verdict).toEqual({
      pass: true,
      details: [NOTHING_TO_CHECK],
      findings: [{ clause: null, outcome: "info", actual: null, required: null, message: NOTHING_TO_CHECK }],
    });
  });
});
