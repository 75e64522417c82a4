/**
 * Eq Typeclass
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true (NaN excepted, as with ===)
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 */

// ============================================================================
// Eq
// ============================================================================

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

/**
 * Build an Eq from a comparison function.
 */
export function makeEq<A>(eqv: (x: A, y: A) => boolean): Eq<A> {
  return { eqv };
}

// ============================================================================
// Common Instances
// ============================================================================

/**
 * Reference / primitive equality (`===`).
 */
export const eqStrict: Eq<unknown> = makeEq((x, y) => x === y);

/**
 * Structural equality, the default for Maybe payloads.
 *
 * - primitives compare with `===`
 * - values with an `equals` method delegate to it, when both share a prototype
 * - arrays element-wise, Maps entry-wise, Sets by membership
 * - Dates by timestamp
 * - plain objects key-wise, ignoring key order
 * - any other object by identity
 */
export const eqStructural: Eq<unknown> = makeEq(structurallyEqual);

// ============================================================================
// Structural comparison
// ============================================================================

export function isPlainObject(value: unknown): value is Record<PropertyKey, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function hasMethod<K extends string>(
  value: unknown,
  key: K
): value is Record<K, (...args: unknown[]) => unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    key in value &&
    typeof Reflect.get(value, key) === "function"
  );
}

function samePrototype(x: object, y: object): boolean {
  return Object.getPrototypeOf(x) === Object.getPrototypeOf(y);
}

function structurallyEqual(x: unknown, y: unknown): boolean {
  if (x === y) return true;
  if (typeof x !== "object" || typeof y !== "object" || x === null || y === null) {
    return false;
  }

  if (hasMethod(x, "equals") || hasMethod(y, "equals")) {
    return samePrototype(x, y) && hasMethod(x, "equals") && x.equals(y) === true;
  }

  if (Array.isArray(x) || Array.isArray(y)) {
    return (
      Array.isArray(x) &&
      Array.isArray(y) &&
      x.length === y.length &&
      x.every((item, i) => structurallyEqual(item, y[i]))
    );
  }

  if (x instanceof Date || y instanceof Date) {
    return x instanceof Date && y instanceof Date && x.getTime() === y.getTime();
  }

  if (x instanceof Map || y instanceof Map) {
    if (!(x instanceof Map && y instanceof Map) || x.size !== y.size) return false;
    for (const [key, value] of x) {
      if (!y.has(key) || !structurallyEqual(value, y.get(key))) return false;
    }
    return true;
  }

  if (x instanceof Set || y instanceof Set) {
    if (!(x instanceof Set && y instanceof Set) || x.size !== y.size) return false;
    for (const item of x) {
      if (!y.has(item)) return false;
    }
    return true;
  }

  if (isPlainObject(x) && isPlainObject(y)) {
    const xKeys = Object.keys(x);
    const yKeys = Object.keys(y);
    return (
      xKeys.length === yKeys.length &&
      xKeys.every((key) => Object.hasOwn(y, key) && structurallyEqual(x[key], y[key]))
    );
  }

  return false;
}
