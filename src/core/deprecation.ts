/**
 * Deprecation notices for legacy entry points, routed through the logger at
 * the configured `deprecations.level`.
 */

import { config } from "./config.js";
import { log } from "./logger.js";

const reported = new Set<string>();

/**
 * Report a call to a deprecated entry point.
 *
 * @param name - The deprecated function
 * @param replacement - What to call instead
 */
export function emitDeprecation(name: string, replacement: string): void {
  const { level, once } = config.resolve().deprecations;
  if (level === "off") return;
  if (once && reported.has(name)) return;

  reported.add(name);
  log(level, `${name}() is deprecated, use ${replacement}() instead`);
}

/**
 * Forget which entry points were already reported (mainly for testing).
 */
export function resetDeprecations(): void {
  reported.clear();
}
