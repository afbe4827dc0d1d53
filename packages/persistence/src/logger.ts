/**
 * Logger interface for persistence package
 *
 * The consuming application injects its logger with setLogger().
 * Until then every call is a no-op.
 */

export interface PersistenceLogger {
  info(_message: string, _meta?: Record<string, unknown>): void;
  warn(_message: string, _meta?: Record<string, unknown>): void;
  error(_message: string, _meta?: Record<string, unknown>): void;
  debug(_message: string, _meta?: Record<string, unknown>): void;
}

const noop = (): void => undefined;

const silentLogger: PersistenceLogger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};

let loggerInstance: PersistenceLogger = silentLogger;

export function setLogger(logger: PersistenceLogger): void {
  loggerInstance = logger;
}

export function getLogger(): PersistenceLogger {
  return loggerInstance;
}

/**
 * Restore the silent default (tests)
 */
export function resetLogger(): void {
  loggerInstance = silentLogger;
}

/**
 * Delegates to whichever logger is current at call time
 */
export const logger: PersistenceLogger = {
  info: (message, meta) => loggerInstance.info(message, meta),
  warn: (message, meta) => loggerInstance.warn(message, meta),
  error: (message, meta) => loggerInstance.error(message, meta),
  debug: (message, meta) => loggerInstance.debug(message, meta),
};
