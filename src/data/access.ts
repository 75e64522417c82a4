/**
 * Attribute and item lookup behind `Maybe.attr`, `Maybe.attrOr` and `Maybe.get`.
 *
 * Lookups report what they found instead of throwing, so each combinator
 * decides which failures it suppresses.
 */

import { IndexOrKeyError } from "../core/errors.js";
import { isPlainObject } from "../typeclasses/eq.js";

// ============================================================================
// Result Types
// ============================================================================

export type AttributeLookup =
  | { readonly found: true; readonly value: unknown }
  | { readonly found: false };

export type ItemLookup =
  | { readonly kind: "found"; readonly value: unknown }
  | { readonly kind: "missing"; readonly error: IndexOrKeyError }
  | { readonly kind: "unsupported" };

// ============================================================================
// Type-level helpers
// ============================================================================

/**
 * Type of `attr(name)`: the property type when `name` is a known key of T.
 */
export type AttrValue<T, K extends PropertyKey> = K extends keyof T ? NonNullable<T[K]> : unknown;

/**
 * Accessor accepted by `get` for a payload of type T.
 */
export type ItemKey<T> = T extends string | ReadonlyArray<unknown>
  ? number
  : T extends ReadonlyMap<infer K, unknown>
    ? K
    : PropertyKey;

/**
 * Type of `get(accessor)` on a payload of type T.
 */
export type ItemValue<T, K> = T extends string
  ? string
  : T extends ReadonlyArray<infer E>
    ? E
    : T extends ReadonlyMap<unknown, infer V>
      ? V
      : K extends keyof T
        ? T[K]
        : unknown;

// ============================================================================
// Descriptions
// ============================================================================

/**
 * Short type name used in error messages: the constructor name for objects,
 * `typeof` for primitives.
 */
export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object" && typeof value !== "function") return typeof value;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null) return "Object";
  const ctor: unknown = Reflect.get(Object(value), "constructor");
  return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "Object";
}

function describeAccessor(accessor: unknown): string {
  return typeof accessor === "string" ? JSON.stringify(accessor) : String(accessor);
}

// ============================================================================
// Attributes
// ============================================================================

/**
 * Look up `name` on `target`, including inherited members. Primitives are
 * boxed first, so `"abc"` has a `length`.
 */
export function lookupAttribute(target: unknown, name: PropertyKey): AttributeLookup {
  if (target === null || target === undefined) return { found: false };
  const boxed: object = Object(target);
  if (!(name in boxed)) return { found: false };
  return { found: true, value: Reflect.get(boxed, name) };
}

// ============================================================================
// Items
// ============================================================================

function isSequence(value: unknown): value is ArrayLike<unknown> {
  return Array.isArray(value) || (ArrayBuffer.isView(value) && !(value instanceof DataView));
}

function lookupIndex(
  sequence: ArrayLike<unknown>,
  accessor: unknown,
  typeName = describeType(sequence)
): ItemLookup {
  if (typeof accessor !== "number" || !Number.isInteger(accessor)) {
    throw new TypeError(`${typeName} indices must be integers, not ${describeType(accessor)}`);
  }

  const { length } = sequence;
  const index = accessor < 0 ? length + accessor : accessor;
  if (index < 0 || index >= length) {
    return {
      kind: "missing",
      error: new IndexOrKeyError(
        accessor,
        "index",
        `index ${accessor} out of range for ${typeName} of length ${length}`
      ),
    };
  }
  return { kind: "found", value: sequence[index] };
}

function missingKey(container: unknown, accessor: unknown): ItemLookup {
  return {
    kind: "missing",
    error: new IndexOrKeyError(
      accessor,
      "key",
      `key ${describeAccessor(accessor)} not found in ${describeType(container)}`
    ),
  };
}

/**
 * Look up `accessor` on an indexable `container`:
 *
 * - strings (by code point), arrays and typed arrays by integer index, where a
 *   negative index counts from the end
 * - Maps by key
 * - plain objects by own property
 *
 * Anything else is `unsupported`. A malformed accessor (a non-integer index, or
 * an object key that is not a string, number or symbol) throws a TypeError.
 */
export function lookupItem(container: unknown, accessor: unknown): ItemLookup {
  if (typeof container === "string") {
    return lookupIndex(Array.from(container), accessor, "string");
  }

  if (isSequence(container)) {
    return lookupIndex(container, accessor);
  }

  if (container instanceof Map) {
    return container.has(accessor)
      ? { kind: "found", value: container.get(accessor) }
      : missingKey(container, accessor);
  }

  if (isPlainObject(container)) {
    if (
      typeof accessor !== "string" &&
      typeof accessor !== "number" &&
      typeof accessor !== "symbol"
    ) {
      throw new TypeError(`Object keys must be strings, numbers or symbols, not ${describeType(accessor)}`);
    }
    return Object.hasOwn(container, accessor)
      ? { kind: "found", value: container[accessor] }
      : missingKey(container, accessor);
  }

  return { kind: "unsupported" };
}
