export type { ExposureClassMapping, RawRegulationClause, RawRegulationTable } from "./schema.js";
export { exposureClassMappingSchema, regulationClauseSchema, regulationTableSchema } from "./schema.js";

export type { FileRegulationProviderOptions, RegulationProvider } from "./provider.js";
export {
  DEFAULT_MAPPINGS_DIR,
  DEFAULT_REGULATIONS_DIR,
  createFileRegulationProvider,
  mappingFileName,
  toClauseVector,
} from "./provider.js";

export type { RegulationLookup } from "./lookup.js";
export { lookup } from "./lookup.js";
