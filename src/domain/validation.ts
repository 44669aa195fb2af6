import type { Invokable, MethodReference, ParameterMap } from './types.js';

/**
 * Provides fuzzy name matching for not-found diagnostics.
 *
 * @example
 * ```typescript
 * const validator = new Validator();
 * validator.suggestName('userRepo', ['userRepository', 'logger', 'db']);
 * // 'userRepository'
 * ```
 */
export class Validator {
  /**
   * Finds the closest registered name to a missing name using Levenshtein distance.
   * Returns `undefined` if no close match is found.
   */
  suggestName(name: string, registered: string[]): string | undefined {
    let bestMatch: string | undefined;
    let bestDistance = Infinity;

    for (const candidate of registered) {
      const distance = levenshtein(name, candidate);
      if (distance < bestDistance) {
        bestDistance = distance;
        bestMatch = candidate;
      }
    }

    if (!bestMatch) return undefined;
    const maxLen = Math.max(name.length, bestMatch.length);
    const similarity = 1 - bestDistance / maxLen;
    // Require at least 50% similarity
    return similarity >= 0.5 ? bestMatch : undefined;
  }
}

/** Arrays and plain objects are parameter maps; functions and class instances are not. */
export function isParameterMap(value: unknown): value is ParameterMap {
  if (Array.isArray(value)) return true;
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Duck-type check for `[instance, 'method']` pairs. */
export function isMethodReference(value: unknown): value is MethodReference {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value[0] !== null &&
    typeof value[0] === 'object' &&
    typeof value[1] === 'string'
  );
}

/** Duck-type check: does the value have an `invoke` method? */
export function isInvokable(value: unknown): value is Invokable {
  return (
    value !== null &&
    typeof value === 'object' &&
    'invoke' in value &&
    typeof value.invoke === 'function'
  );
}

/**
 * Levenshtein distance between two strings.
 * Used for fuzzy name suggestion in error messages.
 */
function levenshtein(a: string, b: string): number {
  const la = a.length;
  const lb = b.length;

  if (la === 0) return lb;
  if (lb === 0) return la;

  let prev = new Array<number>(lb + 1);
  let curr = new Array<number>(lb + 1);

  for (let j = 0; j <= lb; j++) prev[j] = j;

  for (let i = 1; i <= la; i++) {
    curr[0] = i;
    for (let j = 1; j <= lb; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        prev[j] + 1, // deletion
        curr[j - 1] + 1, // insertion
        prev[j - 1] + cost, // substitution
      );
    }
    [prev, curr] = [curr, prev];
  }

  return prev[lb];
}
