/**
 * maybetype: an optional-value container with chainable combinators
 *
 * @example
 * ```typescript
 * import { maybe, nothing, Maybe } from "maybetype";
 *
 * maybe(user).attr("email").test((e) => e.includes("@")).unwrapOr("n/a");
 * maybe(row).get("id").andThen(String);
 * Maybe.map(Maybe.int, ["1", "two", "3"]);   // [1, 3]
 *
 * const m = maybe(lookup(key));
 * switch (m._tag) {
 *   case "Some":
 *     use(m.value);
 *     break;
 *   case "Nothing":
 *     fallback();
 * }
 * ```
 */

// ============================================================================
// Data Types
// ============================================================================

export {
  Maybe,
  Some,
  Nothing,
  maybe,
  some,
  nothing,
  isMaybe,
  cat,
  mapMaybe,
  parseInteger,
  getEq,
  getHash,
  getShow,
  type AttrOptions,
  type GetOptions,
  type MaybePatterns,
} from "./data/maybe.js";

export { wrap } from "./data/legacy.js";

export {
  describeType,
  type AttrValue,
  type ItemKey,
  type ItemValue,
} from "./data/access.js";

// ============================================================================
// Errors
// ============================================================================

export {
  MaybeError,
  EmptyUnwrapError,
  MissingAttributeError,
  IndexOrKeyError,
  type MaybeErrorKind,
  type IndexOrKeyReason,
} from "./core/errors.js";

// ============================================================================
// Typeclasses
// ============================================================================

export { makeEq, eqStrict, eqStructural, type Eq } from "./typeclasses/eq.js";
export { combineHash, hashString, hashStructural, type Hash } from "./typeclasses/hash.js";
export { showInspect, type Show } from "./typeclasses/show.js";

// ============================================================================
// Configuration System
// ============================================================================

export {
  config,
  defineConfig,
  type MaybetypeConfig,
  type DeprecationsConfig,
  type DeprecationLevel,
  type ResolvedConfig,
} from "./core/config.js";
