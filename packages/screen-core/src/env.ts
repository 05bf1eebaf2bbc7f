// Centralized, cached environment configuration.
import type { LogLevel } from "./log.js";

export interface ScreenEnv {
  readonly regulationsDir: string | undefined;
  readonly mappingsDir: string | undefined;
  readonly logTarget: string | undefined;
  readonly logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

let cached: ScreenEnv | undefined;

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = (raw ?? "").trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? "info";
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): ScreenEnv {
  return Object.freeze({
    regulationsDir: nonEmpty(source.SCREEN_REGULATIONS_DIR),
    mappingsDir: nonEmpty(source.SCREEN_MAPPINGS_DIR),
    logTarget: nonEmpty(source.SCREEN_LOG),
    logLevel: parseLogLevel(source.SCREEN_LOG_LEVEL),
  });
}

export function screenEnv(): ScreenEnv {
  if (cached === undefined) {
    cached = readEnv();
  }
  return cached;
}

// For tests only.
export function resetScreenEnvForTests(): void {
  cached = undefined;
}
