export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (Array.isArray(value)) {
    value.forEach((item: unknown) => deepFreeze(item));
  } else {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return Object.freeze(value);
}
