/**
 * Minimal logging for the ORM. `logging: true` prints to the console with a
 * `[Scope]` prefix, `false` is silent, and a Logger object is used as given
 * so applications can route output into their own logger.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export type LoggingOption = boolean | Logger;

const silent: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function createLogger(scope: string, logging: LoggingOption = false): Logger {
  if (typeof logging === "object") {
    return logging;
  }
  if (!logging) {
    return silent;
  }

  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => console.debug(prefix, message, ...details),
    info: (message, ...details) => console.log(prefix, message, ...details),
    warn: (message, ...details) => console.warn(prefix, message, ...details),
    error: (message, ...details) => console.error(prefix, message, ...details),
  };
}
