/**
 * Zenoh mesh configuration generator (NETWORK_CONFIG.json5).
 *
 * Every router listens on the address/port the ns-3 program gives it on each
 * of its links, so both documents must come from the same derivations.
 */

import { deriveNodeEndpoints, nodeIdentity, type DerivedEndpoint } from "../../shared/derivation";
import type { TopologyModel } from "../../shared/parsing/TopologyModel";
import { DEFAULT_MESH_ROLE, DEFAULT_ZENOH_DOCKER_TAG, DEFAULT_ZENOH_VOLUME } from "../../utils/consts";

export interface MeshConfigOptions {
  experiment: string;
  dockerTag?: string;
  cleanFirst?: boolean;
  /** Directory holding the Zenoh binaries, mounted into each container */
  volume?: string;
  role?: string;
}

export interface MeshNodeConfig {
  id: string;
  zid: { set: boolean; value: string };
  listen_endpoints: string[];
  role: string;
}

export interface MeshLinkConfig {
  a: string;
  /** Position of this link's endpoint in the `a` node's listen_endpoints */
  a_idx: number;
  b: string;
  b_idx: number;
}

export interface MeshConfig {
  experiment: string;
  docker_image: { tag: string; clean_first: boolean };
  volume: string;
  /** In node order */
  nodes: MeshNodeConfig[];
  links: MeshLinkConfig[];
}

function endpointIndex(endpoints: readonly DerivedEndpoint[], edgePosition: number): number {
  return endpoints.findIndex((ep) => ep.edgePosition === edgePosition);
}

/**
 * Builds the mesh configuration for a topology.
 */
export function buildMeshConfig(model: TopologyModel, options: MeshConfigOptions): MeshConfig {
  const role = options.role ?? DEFAULT_MESH_ROLE;
  const endpointsByNode = new Map<string, DerivedEndpoint[]>();

  const nodes = model.orderedNodes().map((node) => {
    const endpoints = deriveNodeEndpoints(model, node.id);
    endpointsByNode.set(node.id, endpoints);
    return {
      id: node.id,
      zid: { set: true, value: nodeIdentity(node.id) },
      listen_endpoints: endpoints.map((ep) => ep.listenEndpoint),
      role
    };
  });

  const links = model.edges().map((edge) => ({
    a: edge.source,
    a_idx: endpointIndex(endpointsByNode.get(edge.source) ?? [], edge.position),
    b: edge.target,
    b_idx: endpointIndex(endpointsByNode.get(edge.target) ?? [], edge.position)
  }));

  return {
    experiment: options.experiment,
    docker_image: {
      tag: options.dockerTag ?? DEFAULT_ZENOH_DOCKER_TAG,
      clean_first: options.cleanFirst ?? false
    },
    volume: options.volume ?? DEFAULT_ZENOH_VOLUME,
    nodes,
    links
  };
}

// ============================================================================
// JSON5 rendering
// ============================================================================

const str = (value: string): string => JSON.stringify(value);

function indent(level: number): string {
  return "    ".repeat(level);
}

function renderNode(node: MeshNodeConfig): string {
  const endpoints =
    node.listen_endpoints.length === 0
      ? "[]"
      : `[\n${node.listen_endpoints.map((ep) => `${indent(4)}${str(ep)}`).join(",\n")}\n${indent(3)}]`;
  return [
    `${indent(2)}${str(node.id)}: {`,
    `${indent(3)}zid: {set: ${node.zid.set}, value: ${str(node.zid.value)}},`,
    `${indent(3)}listen_endpoints: ${endpoints},`,
    `${indent(3)}role: ${str(node.role)}`,
    `${indent(2)}}`
  ].join("\n");
}

function renderLink(link: MeshLinkConfig): string {
  return `${indent(2)}{ a: ${str(link.a)}, a_idx: ${link.a_idx}, b: ${str(link.b)}, b_idx: ${link.b_idx} }`;
}

function renderBlock(open: string, close: string, items: string[]): string {
  if (items.length === 0) return `${open}${close}`;
  return `${open}\n${items.join(",\n")}\n${indent(1)}${close}`;
}

/**
 * Renders the configuration as JSON5 text.
 */
export function renderMeshConfig(config: MeshConfig): string {
  return [
    "{",
    `${indent(1)}experiment: ${str(config.experiment)},`,
    "",
    `${indent(1)}docker_image: {`,
    `${indent(2)}tag: ${str(config.docker_image.tag)},`,
    `${indent(2)}clean_first: ${config.docker_image.clean_first}`,
    `${indent(1)}},`,
    "",
    `${indent(1)}volume: ${str(config.volume)},`,
    "",
    `${indent(1)}nodes: ${renderBlock("{", "}", config.nodes.map(renderNode))},`,
    "",
    `${indent(1)}links: ${renderBlock("[", "]", config.links.map(renderLink))}`,
    "}",
    ""
  ].join("\n");
}

export function generateMeshConfig(model: TopologyModel, options: MeshConfigOptions): string {
  return renderMeshConfig(buildMeshConfig(model, options));
}
