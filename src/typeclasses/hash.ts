/**
 * Hash Typeclass
 *
 * Law (consistency with Eq): eqv(x, y) => hash(x) === hash(y)
 *
 * Hashes are unsigned 32-bit integers built with djb2 mixing.
 */

import { hasMethod, isPlainObject } from "./eq.js";

// ============================================================================
// Hash
// ============================================================================

export interface Hash<A> {
  readonly hash: (a: A) => number;
}

// ============================================================================
// djb2 helpers
// ============================================================================

const SEED = 5381;

/** Mix one 32-bit value into a running hash. */
export function combineHash(hash: number, value: number): number {
  return (((hash << 5) + hash) ^ value) >>> 0;
}

export function hashString(s: string, seed = SEED): number {
  let hash = seed;
  for (let i = 0; i < s.length; i++) {
    hash = combineHash(hash, s.charCodeAt(i));
  }
  return hash;
}

// Distinct seeds so e.g. 1, "1" and true do not collide trivially
const TYPE_SEED = {
  undefined: 1,
  null: 2,
  boolean: 3,
  number: 4,
  string: 5,
  bigint: 6,
  symbol: 7,
  function: 8,
  array: 9,
  map: 10,
  set: 11,
  date: 12,
  record: 13,
  object: 14,
} as const;

// ============================================================================
// Identity hashes
// ============================================================================

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

function identityHash(value: object): number {
  let id = identities.get(value);
  if (id === undefined) {
    id = nextIdentity++;
    identities.set(value, id);
  }
  return combineHash(TYPE_SEED.object, id);
}

// ============================================================================
// Common Instances
// ============================================================================

/**
 * Structural hash, consistent with `eqStructural`.
 *
 * Order-insensitive for plain objects, Maps and Sets; identity-based for
 * objects that only compare by identity. Values with `equals` but no
 * `hashCode` hash by prototype alone.
 */
export const hashStructural: Hash<unknown> = { hash: structuralHash };

function structuralHash(value: unknown): number {
  switch (typeof value) {
    case "undefined":
      return TYPE_SEED.undefined;
    case "boolean":
      return combineHash(TYPE_SEED.boolean, value ? 1 : 0);
    case "number":
      // String(-0) === "0", so 0 and -0 agree as they do under ===
      return hashString(String(value), TYPE_SEED.number);
    case "string":
      return hashString(value, TYPE_SEED.string);
    case "bigint":
      return hashString(value.toString(), TYPE_SEED.bigint);
    case "symbol":
      return hashString(value.description ?? "", TYPE_SEED.symbol);
    case "function":
      return identityHash(value);
  }

  if (typeof value !== "object" || value === null) return TYPE_SEED.null;

  if (hasMethod(value, "hashCode")) {
    const code = value.hashCode();
    return typeof code === "number" ? code >>> 0 : identityHash(value);
  }

  // equals() without hashCode(): hash the prototype, the one thing equal values share
  if (hasMethod(value, "equals")) {
    const proto: unknown = Object.getPrototypeOf(value);
    return typeof proto === "object" && proto !== null
      ? identityHash(proto)
      : TYPE_SEED.record;
  }

  if (Array.isArray(value)) {
    let hash: number = TYPE_SEED.array;
    for (const item of value) {
      hash = combineHash(hash, structuralHash(item));
    }
    return hash;
  }

  if (value instanceof Date) {
    return hashString(String(value.getTime()), TYPE_SEED.date);
  }

  if (value instanceof Map) {
    let sum = 0;
    for (const [key, item] of value) {
      sum = (sum + combineHash(structuralHash(key), structuralHash(item))) >>> 0;
    }
    return combineHash(TYPE_SEED.map, sum);
  }

  if (value instanceof Set) {
    let sum = 0;
    for (const item of value) {
      sum = (sum + structuralHash(item)) >>> 0;
    }
    return combineHash(TYPE_SEED.set, sum);
  }

  if (isPlainObject(value)) {
    let sum = 0;
    for (const key of Object.keys(value)) {
      sum = (sum + combineHash(hashString(key), structuralHash(value[key]))) >>> 0;
    }
    return combineHash(TYPE_SEED.record, sum);
  }

  return identityHash(value);
}
