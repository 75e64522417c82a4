/**
 * Legacy constructor kept for code written against the single-class Maybe.
 */

import { emitDeprecation } from "../core/deprecation.js";
import { maybe, type Maybe } from "./maybe.js";

/**
 * Wrap a possibly-absent value, with no predicate.
 *
 * @deprecated Use `maybe(value)` instead. Every call reports a deprecation
 * notice at the configured `deprecations.level`.
 */
export function wrap<T>(value: T): Maybe<NonNullable<T>> {
  emitDeprecation("wrap", "maybe");
  return maybe(value);
}
