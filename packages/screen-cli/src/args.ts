export type ParsedFlags = {
  values: Partial<Record<string, string[]>>;
  toggles: Set<string>;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Value flags may repeat; `--flag=value` and `--flag value` are both accepted. */
export function parseFlagArgs(args: readonly string[], valueFlags: string[], toggleFlags: string[] = []): ParsedFlags {
  const valueSet = new Set(valueFlags);
  const toggleSet = new Set(toggleFlags);
  const values: Partial<Record<string, string[]>> = {};
  const toggles = new Set<string>();
  const push = (flag: string, value: string) => {
    const existing = values[flag];
    if (existing) existing.push(value);
    else values[flag] = [value];
  };

  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (toggleSet.has(token)) {
      toggles.add(token);
      index += 1;
      continue;
    }
    if (!token.startsWith("--")) {
      throw new UsageError(`unknown flag: ${token}`);
    }
    const [flag, inline] = token.split("=", 2);
    if (toggleSet.has(flag)) {
      if (inline !== undefined) {
        throw new UsageError(`flag ${flag} does not take a value`);
      }
      toggles.add(flag);
      index += 1;
      continue;
    }
    if (!valueSet.has(flag)) {
      throw new UsageError(`unknown flag: ${flag}`);
    }
    if (inline !== undefined) {
      push(flag, inline);
      index += 1;
      continue;
    }
    const next = args[index + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new UsageError(`missing value for ${flag}`);
    }
    push(flag, next);
    index += 2;
  }
  return { values, toggles };
}

export function single(parsed: ParsedFlags, flag: string): string | undefined {
  const found = parsed.values[flag];
  if (!found) return undefined;
  if (found.length > 1) {
    throw new UsageError(`${flag} may only be given once`);
  }
  return found[0];
}

export function required(parsed: ParsedFlags, flag: string): string {
  const value = single(parsed, flag);
  if (value === undefined || value.trim() === "") {
    throw new UsageError(`missing required flag ${flag}`);
  }
  return value;
}

/** `--classes XC4,XD1 --classes XF2` → ["XC4", "XD1", "XF2"] */
export function listValue(parsed: ParsedFlags, flag: string): string[] {
  return (parsed.values[flag] ?? [])
    .flatMap((entry) => entry.split(","))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
