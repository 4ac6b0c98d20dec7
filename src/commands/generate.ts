/**
 * Single-topology commands: read one GraphML file, run one generator and
 * write its output through a transaction.
 */

import { generateDot } from "../generators/dot/DotGenerator";
import { generateMeshConfig } from "../generators/mesh/MeshConfigGenerator";
import { generateNs3Program } from "../generators/ns3/Ns3ProgramGenerator";
import type { NetgenConfig } from "../helpers/config";
import type { FileSystemAdapter, IOLogger } from "../shared/io/types";
import { noopLogger } from "../shared/io/types";
import { TransactionalFileSystemAdapter } from "../shared/io/TransactionalFileSystemAdapter";
import type { TopologyModel } from "../shared/parsing/TopologyModel";
import { parseTopology } from "../shared/parsing/TopologyParser";
import { MESH_CONFIG_OUTPUT_FILE, type ImageFormat, type LayoutEngine } from "../utils/consts";
import { renderGraph, type ProcessRunner } from "./render";

export interface CommandContext {
  fs: FileSystemAdapter;
  config: NetgenConfig;
  logger?: IOLogger;
  /** Graphviz process runner; tests pass a fake */
  runner?: ProcessRunner;
}

export class InputNotFoundError extends Error {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`GraphML file '${filePath}' not found`);
    this.name = "InputNotFoundError";
    this.filePath = filePath;
  }
}

export async function readTopology(ctx: CommandContext, graphmlPath: string): Promise<TopologyModel> {
  if (!(await ctx.fs.exists(graphmlPath))) {
    throw new InputNotFoundError(graphmlPath);
  }
  const log = ctx.logger ?? noopLogger;
  log.info(`Parsing GraphML file: ${graphmlPath}`);
  return parseTopology(await ctx.fs.readFile(graphmlPath), { logger: log, source: graphmlPath });
}

/**
 * Writes every output or none of them.
 */
export async function writeOutputs(ctx: CommandContext, outputs: Array<[string, string]>): Promise<string[]> {
  const tx = new TransactionalFileSystemAdapter(ctx.fs, ctx.logger);
  tx.beginTransaction();
  try {
    for (const [filePath, content] of outputs) {
      await tx.writeFile(filePath, content);
    }
  } catch (err) {
    tx.rollbackTransaction();
    throw err;
  }
  return tx.commitTransaction();
}

/** Experiment name: configured value, else the GraphML file's directory name. */
export function experimentName(ctx: CommandContext, graphmlPath: string): string {
  return ctx.config.mesh.experiment ?? ctx.fs.basename(ctx.fs.dirname(graphmlPath));
}

export function ns3Program(ctx: CommandContext, model: TopologyModel): string {
  return generateNs3Program(model, ctx.config.simulation);
}

export function meshConfigText(ctx: CommandContext, model: TopologyModel, experiment: string): string {
  const { dockerTag, cleanFirst, volume, role } = ctx.config.mesh;
  return generateMeshConfig(model, { experiment, dockerTag, cleanFirst, volume, role });
}

export function dotText(ctx: CommandContext, model: TopologyModel, dpi = ctx.config.render.dpi): string {
  return generateDot(model, { layout: ctx.config.render.layout, dpi });
}

export async function runNs3(ctx: CommandContext, graphmlPath: string, outputPath: string): Promise<void> {
  const log = ctx.logger ?? noopLogger;
  const model = await readTopology(ctx, graphmlPath);
  await writeOutputs(ctx, [[outputPath, ns3Program(ctx, model)]]);
  log.info(`Generated ${outputPath} (${model.nodeCount} nodes, ${model.edgeCount} links)`);
}

export async function runMesh(
  ctx: CommandContext,
  graphmlPath: string,
  outputPath: string = ctx.fs.join(ctx.fs.dirname(graphmlPath), MESH_CONFIG_OUTPUT_FILE)
): Promise<void> {
  const log = ctx.logger ?? noopLogger;
  const model = await readTopology(ctx, graphmlPath);
  const experiment = experimentName(ctx, graphmlPath);
  log.info(`Generating mesh configuration for experiment: ${experiment}`);
  await writeOutputs(ctx, [[outputPath, meshConfigText(ctx, model, experiment)]]);
  log.info(`Generated ${outputPath} (${model.nodeCount} nodes, ${model.edgeCount} links)`);
}

export async function runDot(ctx: CommandContext, graphmlPath: string, outputPath: string): Promise<void> {
  const log = ctx.logger ?? noopLogger;
  const model = await readTopology(ctx, graphmlPath);
  await writeOutputs(ctx, [[outputPath, dotText(ctx, model)]]);
  log.info(`Generated ${outputPath}`);
}

export interface RenderCommandOptions {
  outputPath: string;
  layout?: LayoutEngine;
  format?: ImageFormat;
  dpi?: number;
}

export async function runRender(ctx: CommandContext, graphmlPath: string, options: RenderCommandOptions): Promise<void> {
  const model = await readTopology(ctx, graphmlPath);
  const layout = options.layout ?? ctx.config.render.layout;
  const dpi = options.dpi ?? ctx.config.render.dpi;
  await renderGraph(generateDot(model, { layout, dpi }), {
    layout,
    format: options.format ?? ctx.config.render.format,
    dpi,
    outputPath: options.outputPath,
    runner: ctx.runner,
    logger: ctx.logger
  });
}
