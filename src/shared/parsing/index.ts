/**
 * GraphML parsing and the topology model.
 *
 * @example
 * ```typescript
 * import { parseTopology } from './shared/parsing';
 * const model = parseTopology(graphmlText);
 * model.orderedNodes().forEach((n) => console.log(n.index, n.id));
 * ```
 */

export { loadTopology, collectKeySchema } from "./GraphmlLoader";
export { TopologyModel, buildModel, buildModelFromRaw, parseNodeOrdinal } from "./TopologyModel";
export { parseTopology } from "./TopologyParser";
export type { ParseOptions } from "./TopologyParser";
export { nullLogger, GRAPHML_NS } from "./types";
export type { ParserLogger, LoadOptions, BuildOptions } from "./types";
