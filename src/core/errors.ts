/**
 * Maybe Error Types
 *
 * The only failures this library raises itself. Everything thrown by a
 * caller-supplied function passes through untouched.
 */

/** Which combinator raised the failure. */
export type MaybeErrorKind = "empty-unwrap" | "missing-attribute" | "index-or-key";

/**
 * Base class for all Maybe failures.
 */
export class MaybeError extends Error {
  constructor(
    message: string,
    public readonly kind: MaybeErrorKind
  ) {
    super(message);
    this.name = "MaybeError";
  }
}

/**
 * Thrown by `unwrap()` on Nothing when no custom failure was given.
 */
export class EmptyUnwrapError extends MaybeError {
  constructor(message = "Maybe unwrapped into Nothing") {
    super(message, "empty-unwrap");
    this.name = "EmptyUnwrapError";
  }
}

/**
 * Thrown by `attr(name, { err: true })` when the payload has no such attribute.
 */
export class MissingAttributeError extends MaybeError {
  constructor(
    readonly attribute: PropertyKey,
    readonly target: string
  ) {
    super(`'${target}' has no attribute '${String(attribute)}'`, "missing-attribute");
    this.name = "MissingAttributeError";
  }
}

/** Whether a sequence index was out of range or a mapping key was absent. */
export type IndexOrKeyReason = "index" | "key";

/**
 * Thrown by `get(accessor, { err: true })` on an out-of-range index or a missing key.
 */
export class IndexOrKeyError extends MaybeError {
  constructor(
    readonly accessor: unknown,
    readonly reason: IndexOrKeyReason,
    message: string
  ) {
    super(message, "index-or-key");
    this.name = "IndexOrKeyError";
  }
}
