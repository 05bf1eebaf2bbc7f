import { readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { Ajv, type ValidateFunction } from "ajv";
import {
  ERROR_CODES,
  deepFreeze,
  failure,
  noopLogger,
  ok,
  screenEnv,
  type ClauseVector,
  type ErrorCode,
  type Logger,
  type RegulationTable,
  type Result,
  type ScreenEnv,
} from "@concrete-screen/core";

import {
  exposureClassMappingSchema,
  regulationTableSchema,
  type ExposureClassMapping,
  type RawRegulationClause,
  type RawRegulationTable,
} from "./schema.js";

export const DEFAULT_REGULATIONS_DIR = fileURLToPath(new URL("../data/regulations", import.meta.url));
export const DEFAULT_MAPPINGS_DIR = fileURLToPath(new URL("../data/mappings", import.meta.url));

const TABLE_EXTENSION = ".json";
const JURISDICTION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9 ._-]*$/;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateTable: ValidateFunction<RawRegulationTable> = ajv.compile<RawRegulationTable>(regulationTableSchema);
const validateMapping: ValidateFunction<Record<string, string>> =
  ajv.compile<Record<string, string>>(exposureClassMappingSchema);

/** Source of regulation tables, keyed by jurisdiction identifier. */
export interface RegulationProvider {
  listJurisdictions(): Result<string[]>;
  loadTable(jurisdiction: string): Result<RegulationTable>;
  loadExposureClassMapping(jurisdiction: string): Result<ExposureClassMapping>;
}

export interface FileRegulationProviderOptions {
  readonly regulationsDir?: string;
  readonly mappingsDir?: string;
  /** Configuration to fall back on; the process-wide `screenEnv()` when omitted. */
  readonly env?: ScreenEnv;
  readonly logger?: Logger;
}

export function mappingFileName(jurisdiction: string): string {
  return `${jurisdiction.toLowerCase().replace(/\s+/g, "")}_exposure_class_mapping.json`;
}

export function toClauseVector(raw: RawRegulationClause): ClauseVector {
  return {
    max_water_cement_ratio: raw.max_wc ?? null,
    min_cement_content: raw.min_cement ?? null,
    min_strength_cylinder: raw.strength_min_cyl ?? null,
    min_strength_cube: raw.strength_min_cube ?? null,
    max_aggregate_size: raw.max_aggregate_size ?? null,
  };
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

type JsonRead = { ok: true; value: unknown } | { ok: false; reason: "missing" | "unparseable"; message: string };

function readJson(filePath: string): JsonRead {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    return { ok: false, reason: "missing", message: errnoCode(err) ?? describeError(err) };
  }
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, reason: "unparseable", message: describeError(err) };
  }
}

export function createFileRegulationProvider(options: FileRegulationProviderOptions = {}): RegulationProvider {
  const env = options.env ?? screenEnv();
  const regulationsDir = path.resolve(options.regulationsDir ?? env.regulationsDir ?? DEFAULT_REGULATIONS_DIR);
  const mappingsDir = path.resolve(options.mappingsDir ?? env.mappingsDir ?? DEFAULT_MAPPINGS_DIR);
  const logger = options.logger ?? noopLogger;
  const tables = new Map<string, RegulationTable>();
  const mappings = new Map<string, ExposureClassMapping>();

  const loadValidated = <T>(
    kind: "regulation" | "mapping",
    jurisdiction: string,
    filePath: string,
    validate: ValidateFunction<T>,
  ): Result<T> => {
    const notFound: ErrorCode = kind === "regulation" ? ERROR_CODES.regulationNotFound : ERROR_CODES.mappingNotFound;
    const malformed: ErrorCode =
      kind === "regulation" ? ERROR_CODES.regulationMalformed : ERROR_CODES.mappingMalformed;
    if (!JURISDICTION_PATTERN.test(jurisdiction) || jurisdiction.includes("..")) {
      logger.warn("rejected jurisdiction identifier", { kind, jurisdiction });
      return failure(notFound, `${kind} not found for jurisdiction '${jurisdiction}'`, { jurisdiction });
    }
    const read = readJson(filePath);
    if (!read.ok) {
      if (read.reason === "missing") {
        logger.warn(`${kind} file not found`, { jurisdiction, path: filePath });
        return failure(notFound, `${kind} file not found for jurisdiction '${jurisdiction}': ${filePath}`, {
          jurisdiction,
          path: filePath,
          cause: read.message,
        });
      }
      logger.error(`${kind} file is not valid JSON`, { jurisdiction, path: filePath });
      return failure(malformed, `error decoding JSON from ${filePath}`, {
        jurisdiction,
        path: filePath,
        cause: read.message,
      });
    }
    if (!validate(read.value)) {
      const message = ajv.errorsText(validate.errors);
      logger.error(`${kind} file failed validation`, { jurisdiction, path: filePath, message });
      return failure(malformed, `${kind} file for jurisdiction '${jurisdiction}' is malformed: ${message}`, {
        jurisdiction,
        path: filePath,
      });
    }
    return ok(read.value);
  };

  return {
    listJurisdictions() {
      let entries: string[];
      try {
        entries = readdirSync(regulationsDir);
      } catch (err) {
        logger.error("regulations directory unreadable", { path: regulationsDir });
        return failure(ERROR_CODES.regulationNotFound, `regulations directory not found: ${regulationsDir}`, {
          path: regulationsDir,
          cause: errnoCode(err) ?? describeError(err),
        });
      }
      const ids = entries
        .filter((entry) => entry.endsWith(TABLE_EXTENSION))
        .map((entry) => entry.slice(0, -TABLE_EXTENSION.length))
        .sort();
      return ok(ids);
    },

    loadTable(jurisdiction) {
      const cached = tables.get(jurisdiction);
      if (cached) return ok(cached);
      const filePath = path.join(regulationsDir, `${jurisdiction}${TABLE_EXTENSION}`);
      const loaded = loadValidated("regulation", jurisdiction, filePath, validateTable);
      if (!loaded.ok) return loaded;
      const table: Record<string, ClauseVector> = {};
      for (const [code, raw] of Object.entries(loaded.value)) {
        table[code] = toClauseVector(raw);
      }
      const frozen = deepFreeze(table);
      tables.set(jurisdiction, frozen);
      logger.debug("regulation table loaded", { jurisdiction, classes: Object.keys(frozen).length });
      return ok(frozen);
    },

    loadExposureClassMapping(jurisdiction) {
      const cached = mappings.get(jurisdiction);
      if (cached) return ok(cached);
      const filePath = path.join(mappingsDir, mappingFileName(jurisdiction));
      const loaded = loadValidated("mapping", jurisdiction, filePath, validateMapping);
      if (!loaded.ok) return loaded;
      const frozen = deepFreeze({ ...loaded.value });
      mappings.set(jurisdiction, frozen);
      return ok(frozen);
    },
  };
}
