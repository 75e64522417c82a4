/**
 * Maybe Data Type
 *
 * Maybe<T> is either Some<T>, holding a present value, or Nothing. It replaces
 * repeated null/undefined checks with chainable combinators:
 *
 * ```typescript
 * const port = maybe(process.env.PORT)
 *   .andThen((raw) => raw.trim())
 *   .test((raw) => raw !== "")
 *   .then(Number);                    // number | undefined
 *
 * const city = maybe(user).attr("address").attr("city").unwrapOr("unknown");
 * ```
 *
 * ## Runtime Representation
 *
 * ```typescript
 * maybe(42)     // Some { _tag: "Some", value: 42 }
 * maybe(null)   // Nothing { _tag: "Nothing" }, one shared instance
 * ```
 *
 * Both variants are frozen; every combinator returns a new Maybe or a plain value.
 */

import { inspect } from "node:util";
import { EmptyUnwrapError, MissingAttributeError } from "../core/errors.js";
import { eqStructural, makeEq, type Eq } from "../typeclasses/eq.js";
import { hashString, hashStructural, type Hash } from "../typeclasses/hash.js";
import { showInspect, type Show } from "../typeclasses/show.js";
import {
  describeType,
  lookupAttribute,
  lookupItem,
  type AttrValue,
  type ItemKey,
  type ItemValue,
} from "./access.js";

// ============================================================================
// Options
// ============================================================================

export interface AttrOptions {
  /** Throw MissingAttributeError instead of returning Nothing */
  readonly err?: boolean;
}

export interface GetOptions<D> {
  /** Let IndexOrKeyError propagate instead of falling back to `default` */
  readonly err?: boolean;
  /** Wrapped with maybe() and returned when the item cannot be read */
  readonly default?: D | null;
}

/**
 * Handlers for `match`, one per variant.
 */
export interface MaybePatterns<T, B> {
  readonly Some: (value: T) => B;
  readonly Nothing: () => B;
}

const NOTHING_HASH = hashString("Nothing");

// ============================================================================
// Maybe Type Definition
// ============================================================================

/**
 * Maybe data type - either Some (present) or Nothing (absent)
 */
export type Maybe<T> = Some<T> | Nothing<T>;

/**
 * Combinators shared by both variants. Each one branches on `_tag`, so the
 * variants themselves only carry data.
 */
abstract class MaybeBase<T> {
  abstract readonly _tag: "Some" | "Nothing";

  // --------------------------------------------------------------------------
  // Type guards
  // --------------------------------------------------------------------------

  isSome(): this is Some<T> {
    return this._tag === "Some";
  }

  isNothing(): this is Nothing<T> {
    return this._tag === "Nothing";
  }

  /**
   * True iff this is Some.
   */
  isPresent(): boolean {
    return this.isSome();
  }

  // --------------------------------------------------------------------------
  // Transformations
  // --------------------------------------------------------------------------

  /**
   * Apply `func` to the value and return its result as-is, or `undefined`
   * for Nothing. This is the way out of a Maybe chain.
   */
  then<R>(func: (value: T) => R): R | undefined {
    return this.isSome() ? func(this.value) : undefined;
  }

  /**
   * Apply `func` to the value and wrap the result. A nested Maybe is not
   * flattened; use `flatMap` for functions that already return a Maybe.
   * An absent result becomes Nothing.
   */
  andThen<R>(func: (value: T) => R): Maybe<NonNullable<R>> {
    return this.isSome() ? maybe(func(this.value)) : nothing();
  }

  flatMap<R>(func: (value: T) => Maybe<R>): Maybe<R> {
    return this.isSome() ? func(this.value) : nothing();
  }

  /**
   * Keep the value only if `predicate` holds for it.
   */
  test(predicate: (value: T) => boolean): Maybe<T> {
    return this.isSome() && predicate(this.value) ? this : nothing();
  }

  /**
   * This Maybe if present, otherwise `Some(other)`. `other` is wrapped as-is;
   * its type rules out `null` and `undefined`.
   */
  thisOr(other: NonNullable<T>): Maybe<T> {
    return this.isSome() ? this : new Some<T>(other);
  }

  // --------------------------------------------------------------------------
  // Attribute and item access
  // --------------------------------------------------------------------------

  /**
   * Read the property `name` of the value, inherited members included.
   *
   * Nothing stays Nothing without a lookup. A missing property gives Nothing,
   * or throws MissingAttributeError when `err` is set.
   *
   * @example
   * ```typescript
   * maybe({ x: 1 }).attr("x")                   // Some(1)
   * maybe({ x: 1 }).attr("y")                   // Nothing
   * maybe({ x: 1 }).attr("y", { err: true })    // throws MissingAttributeError
   * ```
   */
  attr<K extends PropertyKey>(name: K, options?: AttrOptions): Maybe<AttrValue<T, K>>;
  attr(name: PropertyKey, options: AttrOptions = {}): Maybe<unknown> {
    if (!this.isSome()) return nothing();
    const lookup = lookupAttribute(this.value, name);
    if (lookup.found) return maybe(lookup.value);
    if (options.err) throw new MissingAttributeError(name, describeType(this.value));
    return nothing();
  }

  /**
   * The property `name` of the value if it is present, otherwise `fallback`.
   * Only a missing property is absorbed; a throwing getter propagates.
   */
  attrOr<K extends PropertyKey, D>(name: K, fallback: D): AttrValue<T, K> | D;
  attrOr(name: PropertyKey, fallback: unknown): unknown {
    if (!this.isSome()) return fallback;
    const lookup = lookupAttribute(this.value, name);
    return lookup.found && lookup.value !== null && lookup.value !== undefined
      ? lookup.value
      : fallback;
  }

  /**
   * Read an item of the value by index (strings, arrays, typed arrays) or
   * key (Maps, plain objects). Strings are indexed by code point, so
   * `maybe("😀a").get(1)` is `Some("a")`.
   *
   * Returns `maybe(default)` when this is Nothing, when the value cannot be
   * indexed, or when the index/key is missing. With `err` set, a missing
   * index/key throws IndexOrKeyError instead. A malformed accessor always
   * throws a TypeError.
   *
   * @example
   * ```typescript
   * maybe([1, 2, 3]).get(1)              // Some(2)
   * maybe([1, 2, 3]).get(-1)             // Some(3)
   * maybe([1, 2, 3]).get(5)              // Nothing
   * maybe({ a: 1 }).get("b", { default: 0 })  // Some(0)
   * ```
   */
  get<K extends ItemKey<T>, D = never>(
    accessor: K,
    options?: GetOptions<D>
  ): Maybe<NonNullable<ItemValue<T, K>> | NonNullable<D>>;
  get(accessor: unknown, options: GetOptions<unknown> = {}): Maybe<unknown> {
    if (this.isSome()) {
      const lookup = lookupItem(this.value, accessor);
      if (lookup.kind === "found") return maybe(lookup.value);
      if (lookup.kind === "missing" && options.err) throw lookup.error;
    }
    return maybe(options.default);
  }

  // --------------------------------------------------------------------------
  // Unwrapping
  // --------------------------------------------------------------------------

  /**
   * The value, or a failure for Nothing:
   *
   * - an Error instance is thrown as-is
   * - a function is called with `args` and must not return
   * - otherwise EmptyUnwrapError is thrown
   *
   * @example
   * ```typescript
   * maybe(5).unwrap()                                  // 5
   * nothing().unwrap(new RangeError("no port"))        // throws the RangeError
   * nothing().unwrap(process.exit, 1)                  // exits with code 1
   * ```
   */
  unwrap<A extends unknown[] = []>(failure?: Error | ((...args: A) => never), ...args: A): T {
    if (this.isSome()) return this.value;
    if (failure instanceof Error) throw failure;
    if (typeof failure === "function") {
      failure(...args);
    }
    throw new EmptyUnwrapError();
  }

  /**
   * The value, or `other` for Nothing. Never throws.
   */
  unwrapOr<D>(other: D): T | D {
    return this.isSome() ? this.value : other;
  }

  // --------------------------------------------------------------------------
  // Pattern matching
  // --------------------------------------------------------------------------

  /**
   * Branch on the variant without unwrapping.
   *
   * @example
   * ```typescript
   * maybe(user).match({
   *   Some: (u) => `hello ${u.name}`,
   *   Nothing: () => "hello stranger",
   * });
   * ```
   */
  match<B>(patterns: MaybePatterns<T, B>): B {
    return this.isSome() ? patterns.Some(this.value) : patterns.Nothing();
  }

  /**
   * `[value]` for Some, `[]` for Nothing, for destructuring and spreading.
   */
  toArray(): T[] {
    return this.isSome() ? [this.value] : [];
  }

  // --------------------------------------------------------------------------
  // Equality, hashing, display
  // --------------------------------------------------------------------------

  /**
   * True if both are Nothing, or both are Some with equal values.
   * Values compare structurally unless an Eq is given.
   */
  equals(other: Maybe<T>, eq: Eq<T> = eqStructural): boolean {
    if (!isMaybe(other)) return false;
    if (this.isSome()) return other.isSome() && eq.eqv(this.value, other.value);
    return other.isNothing();
  }

  /**
   * A hash consistent with `equals`: a fixed value for Nothing, the value's
   * hash for Some.
   */
  hashCode(hash: Hash<T> = hashStructural): number {
    return this.isSome() ? hash.hash(this.value) : NOTHING_HASH;
  }

  toString(): string {
    return this.isSome() ? `Some(${showInspect.show(this.value)})` : "Nothing";
  }

  [inspect.custom](): string {
    return this.toString();
  }
}

/**
 * Some variant - a present value
 */
export class Some<T> extends MaybeBase<T> {
  readonly _tag = "Some" as const;

  constructor(readonly value: NonNullable<T>) {
    super();
    Object.freeze(this);
  }
}

/**
 * Nothing variant - no value. Use `nothing()` or `Nothing.instance`.
 */
export class Nothing<T = never> extends MaybeBase<T> {
  readonly _tag = "Nothing" as const;

  static readonly instance: Nothing<never> = new Nothing<never>();

  private constructor() {
    super();
    Object.freeze(this);
  }
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Wrap a possibly-absent value.
 *
 * Returns Nothing for `null`/`undefined`. Otherwise `predicate` (if given) is
 * called once with the value, and Nothing is returned if it is false.
 *
 * @example
 * ```typescript
 * maybe(5)                      // Some(5)
 * maybe(null)                   // Nothing
 * maybe(0, (n) => n > 0)        // Nothing
 * maybe([], (a) => a.length > 0) // Nothing
 * ```
 */
export function maybe<T>(
  value: T,
  predicate?: (value: NonNullable<T>) => boolean
): Maybe<NonNullable<T>> {
  if (value === null || value === undefined) return nothing();
  if (predicate !== undefined && !predicate(value)) return nothing();
  return new Some<NonNullable<T>>(value);
}

/**
 * Create Some directly. Throws a TypeError for `null`/`undefined`.
 */
export function some<T>(value: T): Maybe<NonNullable<T>> {
  if (value === null || value === undefined) {
    throw new TypeError("some() requires a present value; use maybe() for nullable input");
  }
  return new Some<NonNullable<T>>(value);
}

/**
 * The shared Nothing.
 */
export function nothing<T = never>(): Maybe<T> {
  return Nothing.instance;
}

/**
 * Check whether a value is a Maybe of either variant.
 */
export function isMaybe(value: unknown): value is Maybe<unknown> {
  return value instanceof Some || value instanceof Nothing;
}

// ============================================================================
// Collection utilities
// ============================================================================

/**
 * The values of the Some entries, in order.
 *
 * @example
 * ```typescript
 * cat([maybe(5), nothing(), maybe(10)])  // [5, 10]
 * ```
 */
export function cat<T>(maybes: Iterable<Maybe<T>>): T[] {
  const values: T[] = [];
  for (const m of maybes) {
    if (m.isSome()) values.push(m.value);
  }
  return values;
}

/**
 * Map `fn` over `values`, keeping the values of the Some results in order.
 *
 * @example
 * ```typescript
 * mapMaybe(parseInteger, "a1b2c3")  // [1, 2, 3]
 * ```
 */
export function mapMaybe<A, B>(fn: (value: A) => Maybe<B>, values: Iterable<A>): B[] {
  const results: B[] = [];
  for (const value of values) {
    const m = fn(value);
    if (m.isSome()) results.push(m.value);
  }
  return results;
}

// Optional sign, ASCII digits, single underscores between digits
const INTEGER_PATTERN = /^[+-]?[0-9]+(?:_[0-9]+)*$/;

const MIN_SAFE_BIGINT = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE_BIGINT = BigInt(Number.MAX_SAFE_INTEGER);

function safeInteger(n: number): Maybe<number> {
  // Normalize -0 so that "-0" and 0 give the same Some(0)
  return Number.isSafeInteger(n) ? new Some(n === 0 ? 0 : n) : nothing();
}

/**
 * Parse an integer without ever throwing.
 *
 * - numbers: truncated toward zero; NaN and infinities give Nothing
 * - booleans: 1 or 0
 * - bigints: converted when within the safe integer range
 * - strings: trimmed, then an optional sign and ASCII digits, with `_`
 *   allowed between digits
 *
 * Everything else, and any result outside the safe integer range, is Nothing.
 *
 * @example
 * ```typescript
 * parseInteger("42")      // Some(42)
 * parseInteger(" -1_000") // Some(-1000)
 * parseInteger("4.2")     // Nothing
 * parseInteger(4.7)       // Some(4)
 * ```
 */
export function parseInteger(value: unknown): Maybe<number> {
  switch (typeof value) {
    case "number":
      return Number.isFinite(value) ? safeInteger(Math.trunc(value)) : nothing();
    case "boolean":
      return new Some(value ? 1 : 0);
    case "bigint":
      return value >= MIN_SAFE_BIGINT && value <= MAX_SAFE_BIGINT
        ? new Some(Number(value))
        : nothing();
    case "string": {
      const text = value.trim();
      return INTEGER_PATTERN.test(text) ? safeInteger(Number(text.replace(/_/g, ""))) : nothing();
    }
    default:
      return nothing();
  }
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Eq instance for Maybe, comparing payloads with `E`.
 */
export function getEq<A>(E: Eq<A> = eqStructural): Eq<Maybe<A>> {
  return makeEq((x, y) => x.equals(y, E));
}

/**
 * Hash instance for Maybe, consistent with `getEq` for a consistent `H`.
 */
export function getHash<A>(H: Hash<A> = hashStructural): Hash<Maybe<A>> {
  return { hash: (m) => m.hashCode(H) };
}

/**
 * Show instance for Maybe
 */
export function getShow<A>(S: Show<A> = showInspect): Show<Maybe<A>> {
  return {
    show: (m) => m.match({ Some: (value) => `Some(${S.show(value)})`, Nothing: () => "Nothing" }),
  };
}

// ============================================================================
// Companion object
// ============================================================================

/**
 * Static helpers grouped under the type's name.
 *
 * @example
 * ```typescript
 * Maybe.cat([maybe(1), nothing()])     // [1]
 * Maybe.map(Maybe.int, ["1", "x"])     // [1]
 * ```
 */
export const Maybe = {
  of: maybe,
  some,
  nothing,
  isMaybe,
  cat,
  map: mapMaybe,
  int: parseInteger,
} as const;
