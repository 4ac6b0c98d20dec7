/**
 * netgen configuration: built-in defaults, overridden by an optional YAML
 * file, overridden in turn by CLI flags.
 */

import * as YAML from "yaml";

import { ConfigError } from "../shared/errors";
import type { FileSystemAdapter, IOLogger } from "../shared/io/types";
import { noopLogger } from "../shared/io/types";
import { isLogLevel, type LogLevel } from "../shared/utilities/loggerUtils";
import { getBoolean, getNumber, getRecordUnknown, getString } from "../shared/utilities/typeHelpers";
import {
  DEFAULT_CONFIG_FILE,
  DEFAULT_DPI,
  DEFAULT_IMAGE_FORMAT,
  DEFAULT_LAYOUT_ENGINE,
  DEFAULT_MESH_ROLE,
  DEFAULT_NS3_LOG_COMPONENT,
  DEFAULT_SIMULATION_STOP_SECONDS,
  DEFAULT_ZENOH_DOCKER_TAG,
  DEFAULT_ZENOH_VOLUME,
  IMAGE_FORMATS,
  LAYOUT_ENGINES,
  isImageFormat,
  isLayoutEngine,
  type ImageFormat,
  type LayoutEngine
} from "../utils/consts";

export interface SimulationConfig {
  stopSeconds: number;
  logComponent: string;
}

export interface MeshConfigSettings {
  /** Experiment name; the CLI falls back to the GraphML file's directory name */
  experiment?: string;
  dockerTag: string;
  cleanFirst: boolean;
  volume: string;
  role: string;
}

export interface RenderConfig {
  layout: LayoutEngine;
  format: ImageFormat;
  dpi: number;
}

export interface NetgenConfig {
  logLevel: LogLevel;
  simulation: SimulationConfig;
  mesh: MeshConfigSettings;
  render: RenderConfig;
}

export function defaultConfig(): NetgenConfig {
  return {
    logLevel: "info",
    simulation: {
      stopSeconds: DEFAULT_SIMULATION_STOP_SECONDS,
      logComponent: DEFAULT_NS3_LOG_COMPONENT
    },
    mesh: {
      dockerTag: DEFAULT_ZENOH_DOCKER_TAG,
      cleanFirst: false,
      volume: DEFAULT_ZENOH_VOLUME,
      role: DEFAULT_MESH_ROLE
    },
    render: {
      layout: DEFAULT_LAYOUT_ENGINE,
      format: DEFAULT_IMAGE_FORMAT,
      dpi: DEFAULT_DPI
    }
  };
}

// ============================================================================
// Field readers
// ============================================================================

type Section = Record<string, unknown>;

function section(root: Section, key: string): Section {
  const value = root[key];
  if (value === undefined || value === null) return {};
  const record = getRecordUnknown(value);
  if (!record) throw new ConfigError(key, "expected a mapping");
  return record;
}

function readString(sec: Section, key: string, path: string, fallback: string): string {
  const value = sec[key];
  if (value === undefined || value === null) return fallback;
  const str = getString(value);
  if (str === undefined) throw new ConfigError(path, "expected a string");
  return str;
}

function readPositiveNumber(sec: Section, key: string, path: string, fallback: number): number {
  const value = sec[key];
  if (value === undefined || value === null) return fallback;
  const num = getNumber(value);
  if (num === undefined || num <= 0) throw new ConfigError(path, "expected a positive number");
  return num;
}

function readBoolean(sec: Section, key: string, path: string, fallback: boolean): boolean {
  const value = sec[key];
  if (value === undefined || value === null) return fallback;
  const bool = getBoolean(value);
  if (bool === undefined) throw new ConfigError(path, "expected true or false");
  return bool;
}

function warnUnknownKeys(sec: Section, known: readonly string[], prefix: string, log: IOLogger): void {
  for (const key of Object.keys(sec)) {
    if (!known.includes(key)) log.warn(`Ignoring unknown config key '${prefix}${key}'`);
  }
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parses configuration YAML on top of the defaults.
 *
 * @throws ConfigError on invalid YAML or a field of the wrong type
 */
export function parseConfig(yamlText: string, log: IOLogger = noopLogger): NetgenConfig {
  const defaults = defaultConfig();

  let parsed: unknown;
  try {
    parsed = YAML.parse(yamlText);
  } catch (err) {
    throw new ConfigError("(document)", err instanceof Error ? err.message : String(err));
  }
  if (parsed === undefined || parsed === null) return defaults;

  const root = getRecordUnknown(parsed);
  if (!root) throw new ConfigError("(document)", "expected a mapping at the top level");
  warnUnknownKeys(root, ["logLevel", "simulation", "mesh", "render"], "", log);

  const logLevel = root.logLevel ?? defaults.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new ConfigError("logLevel", "expected one of debug, info, warn, error");
  }

  const sim = section(root, "simulation");
  warnUnknownKeys(sim, ["stopSeconds", "logComponent"], "simulation.", log);
  const mesh = section(root, "mesh");
  warnUnknownKeys(mesh, ["experiment", "dockerTag", "cleanFirst", "volume", "role"], "mesh.", log);
  const render = section(root, "render");
  warnUnknownKeys(render, ["layout", "format", "dpi"], "render.", log);

  const layout = render.layout ?? defaults.render.layout;
  if (!isLayoutEngine(layout)) {
    throw new ConfigError("render.layout", `expected one of ${LAYOUT_ENGINES.join(", ")}`);
  }
  const format = render.format ?? defaults.render.format;
  if (!isImageFormat(format)) {
    throw new ConfigError("render.format", `expected one of ${IMAGE_FORMATS.join(", ")}`);
  }

  const experiment = mesh.experiment === undefined || mesh.experiment === null
    ? undefined
    : readString(mesh, "experiment", "mesh.experiment", "");

  return {
    logLevel,
    simulation: {
      stopSeconds: readPositiveNumber(sim, "stopSeconds", "simulation.stopSeconds", defaults.simulation.stopSeconds),
      logComponent: readString(sim, "logComponent", "simulation.logComponent", defaults.simulation.logComponent)
    },
    mesh: {
      experiment,
      dockerTag: readString(mesh, "dockerTag", "mesh.dockerTag", defaults.mesh.dockerTag),
      cleanFirst: readBoolean(mesh, "cleanFirst", "mesh.cleanFirst", defaults.mesh.cleanFirst),
      volume: readString(mesh, "volume", "mesh.volume", defaults.mesh.volume),
      role: readString(mesh, "role", "mesh.role", defaults.mesh.role)
    },
    render: {
      layout,
      format,
      dpi: readPositiveNumber(render, "dpi", "render.dpi", defaults.render.dpi)
    }
  };
}

/**
 * Loads the configuration file. Without an explicit path, `netgen.yaml` in
 * `cwd` is used when present and the defaults otherwise.
 *
 * @throws ConfigError if an explicit path does not exist or the file is invalid
 */
export async function loadConfig(
  fs: FileSystemAdapter,
  options: { path?: string; cwd: string; logger?: IOLogger }
): Promise<NetgenConfig> {
  const log = options.logger ?? noopLogger;
  const configPath = options.path ?? fs.join(options.cwd, DEFAULT_CONFIG_FILE);

  if (!(await fs.exists(configPath))) {
    if (options.path !== undefined) {
      throw new ConfigError(configPath, "configuration file not found");
    }
    return defaultConfig();
  }

  log.debug(`Reading configuration from ${configPath}`);
  try {
    return parseConfig(await fs.readFile(configPath), log);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(`${configPath}: ${err.path}`, err.detail);
    }
    throw err;
  }
}
