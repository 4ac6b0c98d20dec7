export const DEFAULT_CONFIG_FILE = "netgen.yaml";

export const TOPOLOGY_GRAPHML_FILE = "topology.graphml";
export const NS3_OUTPUT_FILE = "topology.cc";
export const MESH_CONFIG_OUTPUT_FILE = "NETWORK_CONFIG.json5";
export const DOT_OUTPUT_FILE = "topology.dot";

export const DEFAULT_SIMULATION_STOP_SECONDS = 600;
export const DEFAULT_NS3_LOG_COMPONENT = "GeneratedTopologyExample";

export const DEFAULT_ZENOH_DOCKER_TAG = "eclipse/zenoh:1.4.0";
export const DEFAULT_ZENOH_VOLUME = "./zenoh";
export const DEFAULT_MESH_ROLE = "router";

export const LAYOUT_ENGINES = ["dot", "neato", "circo", "fdp", "sfdp", "twopi"] as const;
export type LayoutEngine = (typeof LAYOUT_ENGINES)[number];

export const IMAGE_FORMATS = ["png", "svg", "pdf", "jpg", "gif"] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

export const DEFAULT_LAYOUT_ENGINE: LayoutEngine = "neato";
export const DEFAULT_IMAGE_FORMAT: ImageFormat = "png";
export const DEFAULT_DPI = 150;
export const BATCH_DPI = 200;

export function isLayoutEngine(value: unknown): value is LayoutEngine {
  return LAYOUT_ENGINES.some((engine) => engine === value);
}

export function isImageFormat(value: unknown): value is ImageFormat {
  return IMAGE_FORMATS.some((format) => format === value);
}
