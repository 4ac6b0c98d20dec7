/**
 * Defaults for optional topology attributes.
 *
 * Every generator resolves optional attributes through these helpers so a
 * missing value turns into the same default everywhere.
 */

import type { AttributeMap, TopologyEdge } from "../types/topology";
import {
  EDGE_ATTR_DATARATE,
  EDGE_ATTR_DELAY,
  EDGE_ATTR_NETWORK,
  NODE_ATTR_NAME
} from "../types/topology";

export const DEFAULT_DATARATE = "100Mbps";
export const DEFAULT_DELAY = "1ms";

export const TOPOLOGY_DEFAULTS = {
  datarate: DEFAULT_DATARATE,
  delay: DEFAULT_DELAY,
  network: (edgePosition: number): string => `10.0.${edgePosition + 1}.*`,
  nodeName: (nodeId: string): string => nodeId,
  tapDevice: (nodeIndex: number, edgePosition: number): string => `tap_${nodeIndex}_${edgePosition}`
} as const;

/**
 * Returns the trimmed attribute value, or undefined when it is absent or blank.
 */
export function readAttribute(attributes: Readonly<AttributeMap>, name: string): string | undefined {
  const value = attributes[name];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function edgeDatarate(edge: TopologyEdge): string {
  return readAttribute(edge.attributes, EDGE_ATTR_DATARATE) ?? TOPOLOGY_DEFAULTS.datarate;
}

export function edgeDelay(edge: TopologyEdge): string {
  return readAttribute(edge.attributes, EDGE_ATTR_DELAY) ?? TOPOLOGY_DEFAULTS.delay;
}

export function edgeNetwork(edge: TopologyEdge): string {
  return readAttribute(edge.attributes, EDGE_ATTR_NETWORK) ?? TOPOLOGY_DEFAULTS.network(edge.position);
}

export function nodeDisplayName(nodeId: string, attributes: Readonly<AttributeMap>): string {
  return readAttribute(attributes, NODE_ATTR_NAME) ?? TOPOLOGY_DEFAULTS.nodeName(nodeId);
}
