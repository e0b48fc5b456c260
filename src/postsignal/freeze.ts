/**
 * postsignal - Deep Freeze
 *
 * Freezes a value and everything reachable from it. Used for the analysis
 * config and the PatternContext, which are shared read-only across a run.
 */

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
