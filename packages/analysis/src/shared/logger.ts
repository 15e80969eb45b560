export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const NOOP_LOGGER: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Logger that prefixes every line, for hosts that share a console. */
export function createConsoleLogger(prefix = "[pyscope]"): Logger {
  return {
    log: (message) => console.log(`${prefix} ${message}`),
    info: (message) => console.info(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
  };
}
