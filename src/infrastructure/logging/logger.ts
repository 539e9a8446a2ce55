/**
 * @fileoverview Logger used by the container
 *
 * The container logs registrations, alias changes and build summaries at
 * debug level. It is silent unless a logger is supplied through
 * `ContainerOptions.logger`.
 */

/**
 * Logger interface for the container
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger writing to the console with a level prefix
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

/** No-op logger, the default */
export const noopLogger: ILogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
