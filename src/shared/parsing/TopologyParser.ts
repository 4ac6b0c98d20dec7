/**
 * Main topology parser - GraphML text in, topology model out.
 * Pure functions - no file system access.
 */

import { loadTopology } from "./GraphmlLoader";
import { buildModelFromRaw, type TopologyModel } from "./TopologyModel";
import type { ParserLogger } from "./types";
import { nullLogger } from "./types";

export interface ParseOptions {
  logger?: ParserLogger;
  /** Label used in log lines, usually the file path */
  source?: string;
}

/**
 * Loads a GraphML document and builds its topology model.
 *
 * @example
 * ```typescript
 * const model = parseTopology(graphmlText, { logger: log, source: 'topology.graphml' });
 * ```
 *
 * @throws MalformedDocumentError, InvalidNodeIdError, DanglingEdgeReferenceError
 */
export function parseTopology(document: string | Uint8Array, options: ParseOptions = {}): TopologyModel {
  const log = options.logger ?? nullLogger;
  const source = options.source ?? "GraphML document";

  log.debug(`Parsing ${source}`);
  return buildModelFromRaw(loadTopology(document, { logger: log }), { logger: log });
}
