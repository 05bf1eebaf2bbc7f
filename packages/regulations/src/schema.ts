import type { JSONSchema7 } from "json-schema";

const nullableNumber = (extra: JSONSchema7 = {}): JSONSchema7 => ({
  anyOf: [{ type: "number", ...extra }, { type: "null" }],
});

const nullableInteger: JSONSchema7 = {
  anyOf: [{ type: "integer", minimum: 0 }, { type: "null" }],
};

/** Clause record as stored in a regulation file. */
export const regulationClauseSchema: JSONSchema7 = {
  type: "object",
  additionalProperties: false,
  properties: {
    max_wc: nullableNumber({ exclusiveMinimum: 0 }),
    min_cement: nullableNumber({ minimum: 0 }),
    strength_min_cyl: nullableInteger,
    strength_min_cube: nullableInteger,
    max_aggregate_size: nullableNumber({ exclusiveMinimum: 0 }),
  },
};

export const regulationTableSchema: JSONSchema7 = {
  $id: "https://concrete-screen.dev/schema/regulation-table.schema.json",
  type: "object",
  propertyNames: { minLength: 1 },
  additionalProperties: regulationClauseSchema,
};

export const exposureClassMappingSchema: JSONSchema7 = {
  $id: "https://concrete-screen.dev/schema/exposure-class-mapping.schema.json",
  type: "object",
  propertyNames: { minLength: 1 },
  additionalProperties: { type: "string" },
};

export interface RawRegulationClause {
  readonly max_wc?: number | null;
  readonly min_cement?: number | null;
  readonly strength_min_cyl?: number | null;
  readonly strength_min_cube?: number | null;
  readonly max_aggregate_size?: number | null;
}

export type RawRegulationTable = Record<string, RawRegulationClause>;

export type ExposureClassMapping = Readonly<Record<string, string>>;
