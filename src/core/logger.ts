export interface Logger {
  debug(tag: string, msg: string, ...args: unknown[]): void;
  info(tag: string, msg: string, ...args: unknown[]): void;
  warn(tag: string, msg: string, ...args: unknown[]): void;
  error(tag: string, msg: string, ...args: unknown[]): void;
}

const consoleLogger: Logger = {
  debug(tag, msg, ...args) {
    console.debug(`[${tag}]`, msg, ...args);
  },
  info(tag, msg, ...args) {
    console.info(`[${tag}]`, msg, ...args);
  },
  warn(tag, msg, ...args) {
    console.warn(`[${tag}]`, msg, ...args);
  },
  error(tag, msg, ...args) {
    console.error(`[${tag}]`, msg, ...args);
  },
};

let current: Logger = consoleLogger;

/**
 * Process-wide logger. Calls are forwarded to whichever backend was last
 * installed with {@link setLogger}, so modules can import `log` once at load.
 */
export const log: Logger = {
  debug(tag, msg, ...args) { current.debug(tag, msg, ...args); },
  info(tag, msg, ...args) { current.info(tag, msg, ...args); },
  warn(tag, msg, ...args) { current.warn(tag, msg, ...args); },
  error(tag, msg, ...args) { current.error(tag, msg, ...args); },
};

export function setLogger(logger: Logger): void {
  current = logger;
}
