import type { Logger } from '@streamnorm/stream-core';

export type { Logger };

/**
 * Console-backed logger. Debug output is dropped unless enabled.
 */
export function createConsoleLogger(options: { debug?: boolean } = {}): Logger {
  const logger: Logger = {
    info: (message) => console.info(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
  };
  if (options.debug) {
    logger.debug = (message) => console.debug(message);
  }
  return logger;
}
