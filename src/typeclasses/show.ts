/**
 * Show Typeclass
 *
 * A programmer-facing string representation, as opposed to toString().
 */

import { inspect } from "node:util";

export interface Show<A> {
  readonly show: (a: A) => string;
}

/**
 * Show for anything, via Node's inspector.
 */
export const showInspect: Show<unknown> = {
  show: (a) => inspect(a, { depth: 4, breakLength: Infinity }),
};
