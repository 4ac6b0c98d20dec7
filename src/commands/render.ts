import { spawn } from "child_process";

import { RenderError } from "../shared/errors";
import type { IOLogger } from "../shared/io/types";
import { noopLogger } from "../shared/io/types";
import type { ImageFormat, LayoutEngine } from "../utils/consts";

export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs an external program, optionally feeding it text on stdin.
 * Resolves with the exit code; rejects only if the program cannot be started.
 */
export type ProcessRunner = (cmd: string, args: string[], stdin?: string) => Promise<ProcessResult>;

export const spawnProcess: ProcessRunner = (cmd, args, stdin) =>
  new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(cmd, args, { stdio: ["pipe", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });
    child.on("error", reject);
    child.on("close", (code) => resolve({ code, stdout, stderr }));

    child.stdin.on("error", (err) => {
      stderr += String(err);
    });
    child.stdin.end(stdin ?? "");
  });

export interface RenderOptions {
  layout: LayoutEngine;
  format: ImageFormat;
  dpi: number;
  outputPath: string;
  runner?: ProcessRunner;
  logger?: IOLogger;
}

/**
 * Checks that Graphviz is installed. `dot -V` prints its version on stderr.
 */
export async function checkGraphviz(runner: ProcessRunner = spawnProcess): Promise<string> {
  let result: ProcessResult;
  try {
    result = await runner("dot", ["-V"]);
  } catch (err) {
    throw new RenderError(`Graphviz is not installed or not on PATH: ${String(err)}`);
  }
  if (result.code !== 0) {
    throw new RenderError("Graphviz is not installed or not on PATH", result.stderr);
  }
  return (result.stderr || result.stdout).trim();
}

/**
 * Lays out a DOT document with a Graphviz engine and writes the image.
 */
export async function renderGraph(dot: string, options: RenderOptions): Promise<void> {
  const runner = options.runner ?? spawnProcess;
  const log = options.logger ?? noopLogger;

  const version = await checkGraphviz(runner);
  log.debug(`Using ${version}`);

  const args = [`-T${options.format}`, `-Gdpi=${options.dpi}`, "-o", options.outputPath];
  log.debug(`Running ${options.layout} ${args.join(" ")}`);

  let result: ProcessResult;
  try {
    result = await runner(options.layout, args, dot);
  } catch (err) {
    throw new RenderError(`Failed to start ${options.layout}: ${String(err)}`);
  }
  if (result.code !== 0) {
    throw new RenderError(`${options.layout} exited with code ${result.code}`, result.stderr);
  }
  log.info(`Rendered ${options.outputPath}`);
}
