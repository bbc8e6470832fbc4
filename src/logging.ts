/**
 * Console-backed logging with a fixed prefix.
 *
 * @packageDocumentation
 */

import { LOG_PREFIX } from "./constants";

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
}

/** Default logger: writes to the console with the library prefix */
export const consoleLogger: Logger = {
  debug: (message, ...meta) => console.debug(`${LOG_PREFIX} ${message}`, ...meta),
  warn: (message, ...meta) => console.warn(`${LOG_PREFIX} ${message}`, ...meta),
};

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
