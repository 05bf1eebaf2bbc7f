export type ClauseName =
  | "max_water_cement_ratio"
  | "min_cement_content"
  | "min_strength_cylinder"
  | "min_strength_cube"
  | "max_aggregate_size";

/** Ceilings tighten downwards, floors tighten upwards. */
export type ClauseDirection = "ceiling" | "floor";

export const CLAUSE_DIRECTIONS: Readonly<Record<ClauseName, ClauseDirection>> = Object.freeze({
  max_water_cement_ratio: "ceiling",
  min_cement_content: "floor",
  min_strength_cylinder: "floor",
  min_strength_cube: "floor",
  max_aggregate_size: "ceiling",
});

export const CLAUSE_NAMES: readonly ClauseName[] = Object.freeze([
  "max_water_cement_ratio",
  "min_cement_content",
  "min_strength_cylinder",
  "min_strength_cube",
  "max_aggregate_size",
]);

/**
 * One source's contribution, or a combined result. `null` means the source
 * does not constrain the clause.
 */
export interface ClauseVector {
  readonly max_water_cement_ratio: number | null;
  readonly min_cement_content: number | null;
  readonly min_strength_cylinder: number | null;
  readonly min_strength_cube: number | null;
  readonly max_aggregate_size: number | null;
}

export type ExposureClass = string;

/** Per-class clause table of a single jurisdiction. */
export type RegulationTable = Readonly<Record<ExposureClass, ClauseVector>>;

export interface RequirementRecord extends ClauseVector {
  readonly source_exposure_classes: readonly ExposureClass[];
}

export interface MaterialFraction {
  readonly name: string;
  readonly percentage: number;
}

export interface ProductDeclaration {
  readonly density: number | null;
  readonly MPa: number | null;
  readonly max_aggregate_size: number | null;
  readonly mat_comp: readonly MaterialFraction[];
}

export interface DerivedMetrics {
  readonly calculated_wc: number | null;
  readonly cement_content_kg_m3: number | null;
  readonly strength_mpa: number | null;
  readonly max_aggregate_size: number | null;
}

export type FindingOutcome = "pass" | "fail" | "info";

export interface ClauseFinding {
  readonly clause: ClauseName | null;
  readonly outcome: FindingOutcome;
  readonly actual: number | null;
  readonly required: number | null;
  readonly message: string;
}

export interface ComplianceVerdict {
  readonly pass: boolean;
  readonly details: readonly string[];
  readonly findings: readonly ClauseFinding[];
}

export interface DrawingElementRequirements {
  readonly strength_class_mpa: number | null;
  readonly strength_class: string | null;
  readonly min_cement_content: number | null;
  readonly max_w_c_ratio: number | null;
  readonly max_aggregate_size: number | null;
}

/** Exposure classes may arrive as lists of lists from heterogeneous sources. */
export type NestedClasses = ReadonlyArray<string | NestedClasses>;

export interface DrawingRecord {
  readonly element_specific_reqs: DrawingElementRequirements | null;
  readonly drawing_exposure_classes: NestedClasses | null;
}

export interface UserConstraints {
  readonly min_cement_content: number | null;
  readonly max_w_c_ratio: number | null;
  readonly min_mpa_strength: number | null;
  readonly max_aggregate_size: number | null;
}

export const EMPTY_CLAUSES: ClauseVector = Object.freeze({
  max_water_cement_ratio: null,
  min_cement_content: null,
  min_strength_cylinder: null,
  min_strength_cube: null,
  max_aggregate_size: null,
});
