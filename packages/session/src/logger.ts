/**
 * Evolve Session Logging
 * @evolve/session
 */

/**
 * Minimal logger the SDK writes to. Pass your own to route SDK output
 * into the host application's logging.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Console logger. debug/info are only written when `debug` is on.
 */
export function createConsoleLogger(prefix: string = '[Evolve]', debug: boolean = false): Logger {
  return {
    debug(message, ...args) {
      if (debug) {
        console.debug(prefix, message, ...args);
      }
    },
    info(message, ...args) {
      if (debug) {
        console.log(prefix, message, ...args);
      }
    },
    warn(message, ...args) {
      console.warn(prefix, message, ...args);
    },
    error(message, ...args) {
      console.error(prefix, message, ...args);
    },
  };
}

/**
 * Derive a logger that tags every line with a component name
 */
export function childLogger(parent: Logger, component: string): Logger {
  const tag = `[${component}]`;
  return {
    debug: (message, ...args) => parent.debug(`${tag} ${message}`, ...args),
    info: (message, ...args) => parent.info(`${tag} ${message}`, ...args),
    warn: (message, ...args) => parent.warn(`${tag} ${message}`, ...args),
    error: (message, ...args) => parent.error(`${tag} ${message}`, ...args),
  };
}
