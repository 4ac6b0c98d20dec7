import type { IOLogger } from "../shared/io/types";
import { noopLogger } from "../shared/io/types";
import { formatMessage } from "../shared/utilities/loggerUtils";
import {
  BATCH_DPI,
  DOT_OUTPUT_FILE,
  MESH_CONFIG_OUTPUT_FILE,
  NS3_OUTPUT_FILE,
  TOPOLOGY_GRAPHML_FILE
} from "../utils/consts";
import { dotText, meshConfigText, ns3Program, readTopology, writeOutputs, type CommandContext } from "./generate";
import { renderGraph } from "./render";

export interface BatchOptions {
  render?: boolean;
}

export interface BatchFailure {
  topology: string;
  message: string;
}

export interface BatchSummary {
  found: number;
  processed: number;
  skipped: string[];
  failures: BatchFailure[];
}

async function processTopology(
  ctx: CommandContext,
  topologyDir: string,
  name: string,
  options: BatchOptions,
  log: IOLogger
): Promise<void> {
  const graphmlPath = ctx.fs.join(topologyDir, TOPOLOGY_GRAPHML_FILE);
  const model = await readTopology(ctx, graphmlPath);
  const dot = dotText(ctx, model, BATCH_DPI);

  const written = await writeOutputs(ctx, [
    [ctx.fs.join(topologyDir, NS3_OUTPUT_FILE), ns3Program(ctx, model)],
    [ctx.fs.join(topologyDir, MESH_CONFIG_OUTPUT_FILE), meshConfigText(ctx, model, name)],
    [ctx.fs.join(topologyDir, DOT_OUTPUT_FILE), dot]
  ]);
  for (const filePath of written) {
    log.info(`  Generated ${ctx.fs.basename(filePath)}`);
  }

  if (options.render) {
    const { layout, format } = ctx.config.render;
    const imagePath = ctx.fs.join(topologyDir, `topology.${format}`);
    await renderGraph(dot, { layout, format, dpi: BATCH_DPI, outputPath: imagePath, runner: ctx.runner, logger: log });
  }
}

/**
 * Generates every output for each `<dir>/<name>/topology.graphml`.
 * A failing topology is recorded and the walk continues.
 */
export async function generateAll(
  ctx: CommandContext,
  topologyRoot: string,
  options: BatchOptions = {}
): Promise<BatchSummary> {
  const log = ctx.logger ?? noopLogger;
  const summary: BatchSummary = { found: 0, processed: 0, skipped: [], failures: [] };

  if (!(await ctx.fs.exists(topologyRoot))) {
    log.info(`No topology directory found at ${topologyRoot}`);
    return summary;
  }

  for (const name of await ctx.fs.listDirectories(topologyRoot)) {
    const topologyDir = ctx.fs.join(topologyRoot, name);
    if (!(await ctx.fs.exists(ctx.fs.join(topologyDir, TOPOLOGY_GRAPHML_FILE)))) {
      log.info(`SKIP: ${name} (no ${TOPOLOGY_GRAPHML_FILE} found)`);
      summary.skipped.push(name);
      continue;
    }

    summary.found++;
    log.info(`Processing topology: ${name}`);
    try {
      await processTopology(ctx, topologyDir, name, options, log);
      summary.processed++;
    } catch (err) {
      const message = formatMessage(err);
      log.error(`  Failed: ${message}`);
      summary.failures.push({ topology: name, message });
    }
  }

  log.info("Summary:");
  log.info(`  Topologies found: ${summary.found}`);
  log.info(`  Successfully processed: ${summary.processed}`);
  log.info(`  Errors: ${summary.failures.length}`);
  return summary;
}
