/**
 * Logger interface for graph construction.
 * Decouples the engine from terminal output so the CLI can decide
 * what is shown and how it is coloured.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Logger that discards everything. Default for library calls.
 */
export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};
