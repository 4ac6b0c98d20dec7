#!/usr/bin/env node
import * as path from "path";
import { parseArgs } from "util";

import {
  generateAll,
  runDot,
  runMesh,
  runNs3,
  runRender,
  type CommandContext,
  type ProcessRunner
} from "./commands";
import { loadConfig, type NetgenConfig } from "./helpers/config";
import { LOG_LEVEL_ENV, log, setLogLevel } from "./logging/logger";
import type { FileSystemAdapter, IOLogger } from "./shared/io/types";
import { nodeFsAdapter } from "./shared/io/NodeFsAdapter";
import { formatMessage } from "./shared/utilities/loggerUtils";
import {
  DOT_OUTPUT_FILE,
  IMAGE_FORMATS,
  LAYOUT_ENGINES,
  NS3_OUTPUT_FILE,
  isImageFormat,
  isLayoutEngine
} from "./utils/consts";

export const USAGE = `Usage:
  netgen ns3    <graphml> [-o topology.cc]
  netgen mesh   <graphml> [-o NETWORK_CONFIG.json5] [-n name] [-z zenoh-path]
  netgen dot    <graphml> [-o topology.dot] [-l layout] [-d dpi]
  netgen render <graphml> [-o <stem>.<format>] [-l layout] [-f format] [-d dpi]
  netgen all    <topology-dir> [--render]

Options:
  -c, --config <file>   configuration file (default: ./netgen.yaml)
  -h, --help            show this help`;

const COMMANDS = ["ns3", "mesh", "dot", "render", "all"] as const;
type CommandName = (typeof COMMANDS)[number];

function isCommandName(value: string | undefined): value is CommandName {
  return COMMANDS.some((c) => c === value);
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliDeps {
  fs?: FileSystemAdapter;
  cwd?: string;
  logger?: IOLogger;
  runner?: ProcessRunner;
}

interface CliArgs {
  command: CommandName;
  input: string;
  output?: string;
  name?: string;
  zenohPath?: string;
  layout?: string;
  format?: string;
  dpi?: string;
  render: boolean;
  config?: string;
}

function readArgv(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      name: { type: "string", short: "n" },
      "zenoh-path": { type: "string", short: "z" },
      layout: { type: "string", short: "l" },
      format: { type: "string", short: "f" },
      dpi: { type: "string", short: "d" },
      render: { type: "boolean", default: false },
      config: { type: "string", short: "c" },
      help: { type: "boolean", short: "h", default: false }
    }
  });
}

function parseCliArgs(argv: string[]): CliArgs | "help" {
  let parsed: ReturnType<typeof readArgv>;
  try {
    parsed = readArgv(argv);
  } catch (err) {
    throw new UsageError(formatMessage(err));
  }

  const { values, positionals } = parsed;
  if (values.help) return "help";

  const [command, input, ...extra] = positionals;
  if (!isCommandName(command)) {
    throw new UsageError(command === undefined ? "missing command" : `unknown command '${command}'`);
  }
  if (input === undefined) {
    throw new UsageError(`${command}: missing input path`);
  }
  if (extra.length > 0) {
    throw new UsageError(`unexpected argument '${extra[0]}'`);
  }

  return {
    command,
    input,
    output: values.output,
    name: values.name,
    zenohPath: values["zenoh-path"],
    layout: values.layout,
    format: values.format,
    dpi: values.dpi,
    render: values.render ?? false,
    config: values.config
  };
}

/** Applies command-line flags on top of the loaded configuration. */
export function applyFlags(config: NetgenConfig, args: Omit<CliArgs, "command" | "input" | "render">): NetgenConfig {
  const render = { ...config.render };
  if (args.layout !== undefined) {
    if (!isLayoutEngine(args.layout)) {
      throw new UsageError(`invalid layout '${args.layout}' (choose from ${LAYOUT_ENGINES.join(", ")})`);
    }
    render.layout = args.layout;
  }
  if (args.format !== undefined) {
    if (!isImageFormat(args.format)) {
      throw new UsageError(`invalid format '${args.format}' (choose from ${IMAGE_FORMATS.join(", ")})`);
    }
    render.format = args.format;
  }
  if (args.dpi !== undefined) {
    const dpi = Number(args.dpi);
    if (!Number.isInteger(dpi) || dpi <= 0) {
      throw new UsageError(`invalid dpi '${args.dpi}'`);
    }
    render.dpi = dpi;
  }

  const mesh = { ...config.mesh };
  if (args.name !== undefined) mesh.experiment = args.name;
  if (args.zenohPath !== undefined) mesh.volume = args.zenohPath;

  return { ...config, mesh, render };
}

async function dispatch(ctx: CommandContext, args: CliArgs, cwd: string): Promise<number> {
  const input = path.resolve(cwd, args.input);
  const output = args.output === undefined ? undefined : path.resolve(cwd, args.output);

  switch (args.command) {
    case "ns3":
      await runNs3(ctx, input, output ?? path.resolve(cwd, NS3_OUTPUT_FILE));
      return 0;
    case "mesh":
      await runMesh(ctx, input, output);
      return 0;
    case "dot":
      await runDot(ctx, input, output ?? path.resolve(cwd, DOT_OUTPUT_FILE));
      return 0;
    case "render": {
      const stem = path.basename(input, path.extname(input));
      const outputPath = output ?? path.resolve(cwd, `${stem}.${ctx.config.render.format}`);
      await runRender(ctx, input, { outputPath });
      return 0;
    }
    case "all": {
      const summary = await generateAll(ctx, input, { render: args.render });
      return summary.failures.length > 0 ? 1 : 0;
    }
  }
}

/**
 * Runs one netgen invocation and returns the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const fs = deps.fs ?? nodeFsAdapter;
  const cwd = deps.cwd ?? process.cwd();
  const logger = deps.logger ?? log;

  try {
    const args = parseCliArgs(argv);
    if (args === "help") {
      console.log(USAGE);
      return 0;
    }

    const fileConfig = await loadConfig(fs, {
      path: args.config === undefined ? undefined : path.resolve(cwd, args.config),
      cwd,
      logger
    });
    // NETGEN_LOG_LEVEL wins over the file
    if (deps.logger === undefined && process.env[LOG_LEVEL_ENV] === undefined) {
      setLogLevel(fileConfig.logLevel);
    }

    const config = applyFlags(fileConfig, args);
    return await dispatch({ fs, config, logger, runner: deps.runner }, args, cwd);
  } catch (err) {
    logger.error(`Error: ${formatMessage(err)}`);
    if (err instanceof UsageError) {
      logger.error(USAGE);
    }
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
