/**
 * Logger contract shared by every component.
 *
 * Components take any object with this shape, so callers can hand in their
 * own sink (a UI log pane, a batch job logger) or use the console default.
 */

// =============================================================================
// Logger Type
// =============================================================================

export type Logger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  debug?: (msg: string) => void;
};

export const LOG_PREFIX = "[statement-redactor]";

// =============================================================================
// Implementations
// =============================================================================

export const consoleLogger: Logger = {
  info: (msg: string) => console.log(msg),
  warn: (msg: string) => console.warn(msg),
  error: (msg: string) => console.error(msg),
  debug: (msg: string) => console.debug(msg),
};

/**
 * Wrap a base logger so every line carries the project prefix, and the
 * component scope when one is given: `[statement-redactor] [store] ...`
 */
export function createLogger(baseLogger: Logger = consoleLogger, scope?: string): Logger {
  const prefix = scope ? `${LOG_PREFIX} [${scope}]` : LOG_PREFIX;
  return {
    info: (msg: string) => baseLogger.info(`${prefix} ${msg}`),
    warn: (msg: string) => baseLogger.warn(`${prefix} ${msg}`),
    error: (msg: string) => baseLogger.error(`${prefix} ${msg}`),
    debug: (msg: string) => baseLogger.debug?.(`${prefix} ${msg}`),
  };
}
