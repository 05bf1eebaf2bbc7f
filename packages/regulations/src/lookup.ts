import {
  deepFreeze,
  ok,
  type ClauseVector,
  type ExposureClass,
  type RegulationTable,
  type Result,
} from "@concrete-screen/core";

import type { RegulationProvider } from "./provider.js";

export interface RegulationLookup {
  readonly jurisdiction: string;
  /** Clause records of the requested classes that the jurisdiction defines. */
  readonly table: RegulationTable;
  readonly unknownClasses: readonly ExposureClass[];
}

/**
 * Resolves exposure classes against a jurisdiction's table. Classes the table
 * does not define contribute nothing and are reported as warnings.
 */
export function lookup(
  provider: RegulationProvider,
  jurisdiction: string,
  classes: Iterable<ExposureClass>,
): Result<RegulationLookup> {
  const loaded = provider.loadTable(jurisdiction);
  if (!loaded.ok) return loaded;

  const table: Record<ExposureClass, ClauseVector> = {};
  const unknown = new Set<ExposureClass>();
  for (const code of classes) {
    const clauses = Object.prototype.hasOwnProperty.call(loaded.value, code) ? loaded.value[code] : undefined;
    if (clauses) {
      table[code] = clauses;
    } else {
      unknown.add(code);
    }
  }
  const unknownClasses = [...unknown].sort();
  return ok(
    deepFreeze({ jurisdiction, table, unknownClasses }),
    unknownClasses.map((code) => `unknown exposure class '${code}' for jurisdiction '${jurisdiction}'`),
  );
}
