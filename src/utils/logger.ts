/**
 * Logger interface for library code
 *
 * Library modules accept a Logger through their options instead of printing.
 * The CLI passes its CommandContext (which satisfies Logger), tests pass
 * silentLogger or a vi.fn() based mock.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log an informational message */
  info?: (message: string) => void;
  /** Log a debug message (only shown with --verbose in the CLI) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  info: (message: string) => console.log(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  info: () => {},
  debug: () => {},
};

/**
 * Prefix every message, e.g. `[search] brave failed: ...`.
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  const prefix = `[${scope}] `;
  return {
    warn: (message) => logger.warn(prefix + message),
    info: logger.info ? (message) => logger.info?.(prefix + message) : undefined,
    debug: logger.debug ? (message) => logger.debug?.(prefix + message) : undefined,
  };
}
