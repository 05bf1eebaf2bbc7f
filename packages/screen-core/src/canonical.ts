export type PointerSegment = string | number;

// Twelve decimals absorbs float noise such as 0.1 + 0.2 without touching clause values.
const NUMBER_DIGITS = 12;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

const byCodeUnit = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

function canonicalNumber(value: number): number | string {
  if (!Number.isFinite(value)) return String(value);
  const rounded = Number.parseFloat(value.toFixed(NUMBER_DIGITS));
  return rounded === 0 ? 0 : rounded;
}

/**
 * Converts a value into its canonical JSON-ready form: object keys sorted,
 * `undefined` members dropped, sets sorted, numbers rounded and non-finite
 * numbers spelled out as strings.
 */
export function canonicalize(value: unknown): unknown {
  switch (typeof value) {
    case "undefined":
      throw new TypeError("cannot canonicalize undefined");
    case "number":
      return canonicalNumber(value);
    case "string":
    case "boolean":
      return value;
    case "object":
      break;
    default:
      throw new TypeError(`cannot canonicalize value of type ${typeof value}`);
  }

  if (value === null) return null;
  if (Array.isArray(value)) return value.map((entry: unknown) => canonicalize(entry));
  if (value instanceof Set) {
    return [...value]
      .map((entry: unknown) => canonicalize(entry))
      .sort((a, b) => byCodeUnit(JSON.stringify(a), JSON.stringify(b)));
  }
  if (!isPlainObject(value)) {
    throw new TypeError("cannot canonicalize value of type object");
  }

  const out: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort(byCodeUnit)) {
    const member = value[key];
    if (member !== undefined) out[key] = canonicalize(member);
  }
  return out;
}

export function canonicalJson(value: unknown): string {
  return `${JSON.stringify(canonicalize(value))}\n`;
}

export function prettyCanonicalJson(value: unknown): string {
  return `${JSON.stringify(canonicalize(value), null, 2)}\n`;
}

/** RFC 6901 pointer; the empty path is `/`. */
export function pointerFromSegments(segments: readonly PointerSegment[]): string {
  const escaped = segments.map((segment) => String(segment).replace(/~/g, "~0").replace(/\//g, "~1"));
  return `/${escaped.join("/")}`;
}
