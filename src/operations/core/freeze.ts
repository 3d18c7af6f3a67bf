/**
 * Recursively freeze a plain data structure and return it
 *
 * Results handed out by the accumulator and the reducer are shared between
 * workers and callers, so they are made immutable once built.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }
  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }
  return Object.freeze(value);
}
