/**
 * Logging
 *
 * The planner logs through whatever the caller injects; `console` fits the
 * interface as-is and is the default.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export const consoleLogger: Logger = console;

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
};
