/**
 * Console output with a fixed "[maybetype]" prefix.
 */

export type LogLevel = "error" | "warn" | "info";

const PREFIX = "[maybetype]";

export function log(level: LogLevel, message: string): void {
  switch (level) {
    case "error":
      console.error(`${PREFIX} ERROR: ${message}`);
      break;
    case "warn":
      console.warn(`${PREFIX} WARN: ${message}`);
      break;
    case "info":
      if (process.env.NODE_ENV === "development") {
        console.info(`${PREFIX} INFO: ${message}`);
      }
      break;
  }
}
