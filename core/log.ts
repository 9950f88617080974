/**
 * Minimal logging seam. Documents log load and save events through an
 * injected logger; the default is silent.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

/** Writes to the console with a fixed prefix. */
export function createConsoleLogger(prefix: string = 'scanline'): Logger {
  return {
    debug: (message, ...details) => console.debug(`[${prefix}] ${message}`, ...details),
    info: (message, ...details) => console.info(`[${prefix}] ${message}`, ...details),
    warn: (message, ...details) => console.warn(`[${prefix}] ${message}`, ...details),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};
