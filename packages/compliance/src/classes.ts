import type { ExposureClass } from "@concrete-screen/core";

/**
 * Flattens arbitrarily nested class lists into `into`. Non-string leaves and
 * blank codes are ignored; codes are trimmed.
 */
function collect(items: unknown, into: Set<ExposureClass>): void {
  if (typeof items === "string") {
    const code = items.trim();
    if (code.length > 0) into.add(code);
    return;
  }
  if (!Array.isArray(items)) return;
  for (const item of items) {
    collect(item, into);
  }
}

/** Union of every source's classes, deduplicated by value and sorted. */
export function unionExposureClasses(...sources: unknown[]): ExposureClass[] {
  const combined = new Set<ExposureClass>();
  for (const source of sources) {
    collect(source, combined);
  }
  return [...combined].sort();
}
