/**
 * Commands barrel file - exports all commands with named exports
 */

// Single-topology commands
export {
  InputNotFoundError,
  readTopology,
  writeOutputs,
  experimentName,
  runNs3,
  runMesh,
  runDot,
  runRender
} from "./generate";
export type { CommandContext, RenderCommandOptions } from "./generate";

// Batch generation over a topology directory
export { generateAll } from "./batch";
export type { BatchOptions, BatchSummary, BatchFailure } from "./batch";

// Graphviz
export { renderGraph, checkGraphviz, spawnProcess } from "./render";
export type { ProcessRunner, ProcessResult, RenderOptions } from "./render";
