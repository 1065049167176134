/**
 * Logging for the snippet library.
 *
 * Components write through this interface with a bracketed prefix
 * (`[SnippetStore] ...`). The global console satisfies it, so hosts
 * that don't care can leave it out.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const consoleLogger: Logger = console;

/**
 * Logger that drops everything. Handy for tests and headless hosts.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
