/**
 * Sink for the library's diagnostics.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

/**
 * Writes warnings to the console and drops debug output unless
 * `SHAPECAST_DEBUG` is set in the environment.
 */
export const consoleLogger: Logger = {
  debug(message, ...details) {
    if (process.env.SHAPECAST_DEBUG) {
      console.debug(`[shapecast] ${message}`, ...details);
    }
  },
  warn(message, ...details) {
    console.warn(`[shapecast] ${message}`, ...details);
  },
};

let current: Logger = consoleLogger;

/**
 * Returns the process-wide logger. Routines look it up on every call, so a
 * replacement takes effect for routines compiled earlier.
 */
export function getLogger(): Logger {
  return current;
}

/**
 * Replaces the process-wide logger; pass nothing to restore the default.
 */
export function setLogger(logger?: Logger): void {
  current = logger ?? consoleLogger;
}
