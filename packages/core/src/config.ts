/**
 * Central configuration for backstub.
 *
 * Values come from environment variables, with defaults suited to test runs.
 * Per-instance options (see `StubBackendOptions`) take precedence.
 */

/**
 * Log levels understood by the logger, from most to least verbose.
 */
export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVEL_NAMES: readonly LogLevelName[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

function parseLogLevel(value: string | undefined): LogLevelName {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVEL_NAMES.find((name) => name === normalized) ?? "warn";
}

export const config = {
  logging: {
    // Stubs run inside test suites; keep them quiet unless asked.
    level: parseLogLevel(process.env.BACKSTUB_LOG_LEVEL),
    colorize: process.env.BACKSTUB_LOG_COLORS === "true",
  },

  body: {
    /** Charset used by `asString()` when none is given */
    defaultCharset: "utf-8",
  },

  stub: {
    /** Status of the response produced when no rule and no fallback answer */
    defaultStatus: 404,
  },
};

export { parseLogLevel };
