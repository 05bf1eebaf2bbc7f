import {
  CLAUSE_DIRECTIONS,
  type ClauseFinding,
  type ClauseName,
  type ComplianceVerdict,
  type DerivedMetrics,
  type RequirementRecord,
} from "@concrete-screen/core";

import { isUnconstrained } from "./clauses.js";

export const NOTHING_TO_CHECK = "No specific requirements found to check against.";

interface ClauseCheck {
  readonly clause: ClauseName;
  readonly actual: number | null;
  readonly required: number | null;
  readonly render: (actual: number, required: number, passed: boolean) => string;
}

const verdictWord = (passed: boolean): string => (passed ? "PASS" : "FAIL");

function strengthCheck(metrics: DerivedMetrics, requirement: RequirementRecord): ClauseCheck {
  const cylinder = requirement.min_strength_cylinder;
  const useCylinder = !isUnconstrained("min_strength_cylinder", cylinder);
  const clause: ClauseName = useCylinder ? "min_strength_cylinder" : "min_strength_cube";
  const basis = useCylinder ? "cylinder" : "cube";
  return {
    clause,
    actual: metrics.strength_mpa,
    required: useCylinder ? cylinder : requirement.min_strength_cube,
    render: (actual, required, passed) =>
      `${verdictWord(passed)}: EPD strength (${actual} MPa) ${passed ? "meets" : "is below"} required min ${basis} strength (${required} MPa).`,
  };
}

function clauseChecks(metrics: DerivedMetrics, requirement: RequirementRecord): ClauseCheck[] {
  return [
    {
      clause: "max_water_cement_ratio",
      actual: metrics.calculated_wc,
      required: requirement.max_water_cement_ratio,
      render: (actual, required, passed) =>
        `${verdictWord(passed)}: EPD w/c ratio (${actual.toFixed(2)}) ${passed ? "meets" : "exceeds"} required max (${required}).`,
    },
    {
      clause: "min_cement_content",
      actual: metrics.cement_content_kg_m3,
      required: requirement.min_cement_content,
      render: (actual, required, passed) =>
        `${verdictWord(passed)}: EPD cement content (${actual.toFixed(0)} kg/m3) ${passed ? "meets" : "is below"} required min (${required} kg/m3).`,
    },
    strengthCheck(metrics, requirement),
    {
      clause: "max_aggregate_size",
      actual: metrics.max_aggregate_size,
      required: requirement.max_aggregate_size,
      render: (actual, required, passed) =>
        `${verdictWord(passed)}: EPD aggregate size (${actual} mm) ${passed ? "meets" : "exceeds"} required max (${required} mm).`,
    },
  ];
}

/**
 * Compares derived metrics with the requirement record clause by clause.
 * Clauses lacking either value are skipped and do not affect the verdict; a
 * run with nothing to compare passes with a single informational finding.
 */
export function evaluateCompliance(metrics: DerivedMetrics, requirement: RequirementRecord): ComplianceVerdict {
  const findings: ClauseFinding[] = [];

  for (const check of clauseChecks(metrics, requirement)) {
    const { actual, required } = check;
    if (actual === null || !Number.isFinite(actual)) continue;
    if (required === null || isUnconstrained(check.clause, required)) continue;
    const passed = CLAUSE_DIRECTIONS[check.clause] === "ceiling" ? actual <= required : actual >= required;
    findings.push({
      clause: check.clause,
      outcome: passed ? "pass" : "fail",
      actual,
      required,
      message: check.render(actual, required, passed),
    });
  }

  if (findings.length === 0) {
    findings.push({ clause: null, outcome: "info", actual: null, required: null, message: NOTHING_TO_CHECK });
  }

  return {
    pass: findings.every((finding) => finding.outcome !== "fail"),
    details: findings.map((finding) => finding.message),
    findings,
  };
}
