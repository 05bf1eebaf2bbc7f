import { canonicalize } from "./canonical.js";

export const ERROR_CODES = Object.freeze({
  regulationNotFound: "E_REGULATION_NOT_FOUND",
  regulationMalformed: "E_REGULATION_MALFORMED",
  mappingNotFound: "E_MAPPING_NOT_FOUND",
  mappingMalformed: "E_MAPPING_MALFORMED",
  providerFailure: "E_PROVIDER_FAILURE",
  invalidRecord: "E_INVALID_RECORD",
} as const);

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface ScreenError {
  readonly code: ErrorCode;
  readonly explain: string;
  readonly details?: unknown;
}

export interface Failure {
  readonly ok: false;
  readonly error: ScreenError;
}

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly warnings?: readonly string[];
}

export type Result<T> = Ok<T> | Failure;

const collator = new Intl.Collator("en", { sensitivity: "variant" });

const uniqueSorted = (items: Iterable<string>): string[] => {
  const seen = new Set<string>();
  for (const item of items) {
    const trimmed = item.trim();
    if (trimmed.length === 0) continue;
    seen.add(trimmed);
  }
  return [...seen].sort((a, b) => collator.compare(a, b));
};

export const ok = <T>(value: T, warnings: Iterable<string> = []): Ok<T> => {
  const normalized = uniqueSorted(warnings);
  if (normalized.length === 0) {
    return { ok: true, value };
  }
  return { ok: true, value, warnings: normalized };
};

export const error = (code: ErrorCode, explain: string, details?: unknown): ScreenError => ({
  code,
  explain,
  ...(typeof details === "undefined" ? {} : { details: canonicalize(details) }),
});

export const failure = (code: ErrorCode, explain: string, details?: unknown): Failure => ({
  ok: false,
  error: error(code, explain, details),
});

export const formatFailure = (result: Result<unknown>): string => {
  if (result.ok) return "ok";
  const base = `${result.error.code}: ${result.error.explain}`;
  if (typeof result.error.details === "undefined") return base;
  return `${base} | details=${JSON.stringify(result.error.details)}`;
};

export const mapValue = <A, B>(result: Result<A>, mapper: (value: A) => B): Result<B> =>
  result.ok ? ok(mapper(result.value), result.warnings) : result;
