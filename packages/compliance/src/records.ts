import { z } from "zod";
import {
  ERROR_CODES,
  EMPTY_CLAUSES,
  failure,
  isPlainObject,
  ok,
  pointerFromSegments,
  type ClauseVector,
  type DrawingRecord,
  type NestedClasses,
  type ProductDeclaration,
  type Result,
  type UserConstraints,
} from "@concrete-screen/core";

// Extraction output sometimes carries numbers as strings ("0.45").
const numericText = (value: unknown): unknown =>
  typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value)) ? Number(value) : value;

const measure = z.preprocess(numericText, z.number().finite().nonnegative());
// A ceiling of 0 would fail every product, so ceilings must be positive.
const ceiling = z.preprocess(numericText, z.number().finite().positive());

const optionalMeasure = measure.nullish().transform((value) => value ?? null);
const optionalCeiling = ceiling.nullish().transform((value) => value ?? null);

const elementRequirementsSchema = z.object({
  strength_class_mpa: optionalMeasure,
  strength_class: z
    .union([z.string(), z.number().finite().nonnegative()])
    .nullish()
    .transform((value) => value ?? null),
  min_cement_content: optionalMeasure,
  max_w_c_ratio: optionalCeiling,
  max_aggregate_size: optionalCeiling,
});

/** Keeps string leaves and the nesting around them; null and other leaves are dropped. */
function classLeaves(items: readonly unknown[]): NestedClasses {
  const kept: Array<string | NestedClasses> = [];
  for (const item of items) {
    if (typeof item === "string") kept.push(item);
    else if (Array.isArray(item)) kept.push(classLeaves(item));
  }
  return kept;
}

const drawingRecordSchema = z.object({
  element_specific_reqs: elementRequirementsSchema.nullish().transform((value) => value ?? null),
  drawing_exposure_classes: z
    .array(z.unknown())
    .nullish()
    .transform((value) => (value ? classLeaves(value) : null)),
});

const userConstraintsSchema = z.object({
  min_cement_content: optionalMeasure,
  max_w_c_ratio: optionalCeiling,
  min_mpa_strength: optionalMeasure,
  max_aggregate_size: optionalCeiling,
});

const materialFractionSchema = z.object({
  name: z
    .string()
    .nullish()
    .transform((value) => value ?? ""),
  percentage: optionalMeasure.transform((value) => value ?? 0),
});

const productDeclarationSchema = z.object({
  density: optionalMeasure,
  MPa: optionalMeasure,
  max_aggregate_size: optionalMeasure,
  mat_comp: z
    .array(materialFractionSchema)
    .nullish()
    .transform((value) => value ?? []),
});

export interface StrengthClass {
  readonly cylinder: number;
  readonly cube: number | null;
}

const STRENGTH_CLASS_PATTERN = /^\s*L?C\s*(\d+(?:\.\d+)?)\s*(?:\/\s*(\d+(?:\.\d+)?))?\s*$/i;

/** Reads "C30/37", "LC25/28", "C30" or a bare MPa value. */
export function parseStrengthClass(label: string | number): StrengthClass | null {
  if (typeof label === "number") {
    return Number.isFinite(label) && label >= 0 ? { cylinder: label, cube: null } : null;
  }
  const bare = Number(label.trim());
  if (label.trim() !== "" && Number.isFinite(bare) && bare >= 0) {
    return { cylinder: bare, cube: null };
  }
  const match = STRENGTH_CLASS_PATTERN.exec(label);
  if (!match) return null;
  return {
    cylinder: Number(match[1]),
    cube: match[2] === undefined ? null : Number(match[2]),
  };
}

function providerError(raw: unknown, source: string): Result<never> | null {
  if (isPlainObject(raw) && typeof raw.error === "string") {
    return failure(ERROR_CODES.providerFailure, `${source}: ${raw.error}`, { source });
  }
  return null;
}

function unknownKeyWarnings(raw: unknown, known: readonly string[], source: string, prefix = ""): string[] {
  if (!isPlainObject(raw)) return [];
  return Object.keys(raw)
    .filter((key) => !known.includes(key))
    .sort()
    .map((key) => `${source}: ignored unknown field '${prefix}${key}'`);
}

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  source: string,
): Result<z.output<S>> {
  const errored = providerError(raw, source);
  if (errored) return errored;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: pointerFromSegments(issue.path),
      message: issue.message,
    }));
    const first = issues[0];
    const summary = first ? `${first.path} ${first.message}` : "invalid record";
    return failure(ERROR_CODES.invalidRecord, `${source}: ${summary}`, { source, issues });
  }
  return ok(parsed.data);
}

export function parseDrawingRecord(raw: unknown, source = "drawing"): Result<DrawingRecord> {
  const parsed = parseWith(drawingRecordSchema, raw, source);
  if (!parsed.ok) return parsed;
  const warnings = unknownKeyWarnings(raw, Object.keys(drawingRecordSchema.shape), source);
  if (isPlainObject(raw)) {
    warnings.push(
      ...unknownKeyWarnings(
        raw.element_specific_reqs,
        Object.keys(elementRequirementsSchema.shape),
        source,
        "element_specific_reqs.",
      ),
    );
  }
  const label = parsed.value.element_specific_reqs?.strength_class;
  if (label !== null && label !== undefined && parseStrengthClass(label) === null) {
    warnings.push(`${source}: unrecognized strength class '${label}'`);
  }
  const reqs = parsed.value.element_specific_reqs;
  return ok(
    {
      element_specific_reqs: reqs
        ? { ...reqs, strength_class: reqs.strength_class === null ? null : String(reqs.strength_class) }
        : null,
      drawing_exposure_classes: parsed.value.drawing_exposure_classes,
    },
    warnings,
  );
}

export function parseUserConstraints(raw: unknown, source = "user constraints"): Result<UserConstraints> {
  const parsed = parseWith(userConstraintsSchema, raw, source);
  if (!parsed.ok) return parsed;
  return ok(parsed.value, unknownKeyWarnings(raw, Object.keys(userConstraintsSchema.shape), source));
}

export function parseProductDeclaration(raw: unknown, source = "product declaration"): Result<ProductDeclaration> {
  const parsed = parseWith(productDeclarationSchema, raw, source);
  if (!parsed.ok) return parsed;
  return ok(parsed.value, unknownKeyWarnings(raw, Object.keys(productDeclarationSchema.shape), source));
}

export function drawingClauses(record: DrawingRecord): ClauseVector {
  const reqs = record.element_specific_reqs;
  if (!reqs) return EMPTY_CLAUSES;
  const label = reqs.strength_class === null ? null : parseStrengthClass(reqs.strength_class);
  return {
    max_water_cement_ratio: reqs.max_w_c_ratio,
    min_cement_content: reqs.min_cement_content,
    min_strength_cylinder: reqs.strength_class_mpa ?? label?.cylinder ?? null,
    min_strength_cube: label?.cube ?? null,
    max_aggregate_size: reqs.max_aggregate_size,
  };
}

export function userClauses(record: UserConstraints): ClauseVector {
  return {
    ...EMPTY_CLAUSES,
    max_water_cement_ratio: record.max_w_c_ratio,
    min_cement_content: record.min_cement_content,
    min_strength_cylinder: record.min_mpa_strength,
    max_aggregate_size: record.max_aggregate_size,
  };
}
