/**
 * netgen library entry point.
 *
 * @example
 * ```typescript
 * import { parseTopology, generateNs3Program } from 'netgen';
 * const model = parseTopology(graphmlText);
 * const program = generateNs3Program(model);
 * ```
 */

export * from "./shared/errors";
export * from "./shared/types/topology";
export * from "./shared/parsing";
export * from "./shared/derivation";
export * from "./generators";
export { defaultConfig, parseConfig, loadConfig } from "./helpers/config";
export type { NetgenConfig, SimulationConfig, MeshConfigSettings, RenderConfig } from "./helpers/config";
export { NodeFsAdapter, nodeFsAdapter } from "./shared/io/NodeFsAdapter";
export { TransactionalFileSystemAdapter } from "./shared/io/TransactionalFileSystemAdapter";
export type { FileSystemAdapter, IOLogger } from "./shared/io/types";
export { runCli } from "./cli";
