/**
 * Freezes a value and everything reachable from it. Stage payloads and
 * enriched results are shared between the cache and every caller.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
