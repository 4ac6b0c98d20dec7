/**
 * Parser-specific type definitions.
 * The core never writes to the console itself; callers hand in a logger.
 */

/**
 * Logger interface for optional logging.
 * The CLI passes the console-backed `log`; tests and library users can
 * leave it out and get the no-op logger.
 */
export interface ParserLogger {
  info(msg: string): void;
  warn(msg: string): void;
  debug(msg: string): void;
  error(msg: string): void;
}

/**
 * No-op logger for when logging is not needed.
 */
export const nullLogger: ParserLogger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
  error: () => {}
};

/**
 * Options for loading a GraphML document.
 */
export interface LoadOptions {
  logger?: ParserLogger;
}

/**
 * Options for building the topology model.
 */
export interface BuildOptions {
  logger?: ParserLogger;
}

/** GraphML namespace URI */
export const GRAPHML_NS = "http://graphml.graphdrawing.org/xmlns";
