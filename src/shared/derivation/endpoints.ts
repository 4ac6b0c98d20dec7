/**
 * Endpoint role derivation: which side of a link a node sits on, and the
 * tap device, address and port it gets there.
 */

import { UnknownNodeError } from "../errors";
import type { TopologyModel } from "../parsing/TopologyModel";
import type { TopologyEdge } from "../types/topology";
import { EDGE_ATTR_TAP_A, EDGE_ATTR_TAP_B } from "../types/topology";

import { formatListenEndpoint, synthesizeAddress, synthesizePort, type TransportProtocol } from "./address";
import { TOPOLOGY_DEFAULTS, edgeNetwork, readAttribute } from "./defaults";

/** `a` is the edge source, `b` the edge target. */
export type EndpointRole = "a" | "b";

export interface DerivedEndpoint {
  edgeId: string;
  edgePosition: number;
  nodeId: string;
  role: EndpointRole;
  nodeIndex: number;
  tapDevice: string;
  network: string;
  address: string;
  port: number;
  listenEndpoint: string;
}

/**
 * Role of the node on the edge. A self-loop resolves to the source side.
 *
 * @throws UnknownNodeError if the node is neither source nor target
 */
export function endpointRole(edge: TopologyEdge, nodeId: string): EndpointRole {
  if (edge.source === nodeId) return "a";
  if (edge.target === nodeId) return "b";
  throw new UnknownNodeError(nodeId, `Node '${nodeId}' is not an endpoint of edge '${edge.id}'`);
}

export function tapDeviceFor(edge: TopologyEdge, role: EndpointRole, nodeIndex: number): string {
  const attrName = role === "a" ? EDGE_ATTR_TAP_A : EDGE_ATTR_TAP_B;
  return readAttribute(edge.attributes, attrName) ?? TOPOLOGY_DEFAULTS.tapDevice(nodeIndex, edge.position);
}

function endpointFor(
  model: TopologyModel,
  edge: TopologyEdge,
  nodeId: string,
  role: EndpointRole,
  protocol: TransportProtocol
): DerivedEndpoint {
  const nodeIndex = model.nodeIndex(nodeId);
  const network = edgeNetwork(edge);
  const address = synthesizeAddress(nodeIndex, network);
  const port = synthesizePort(nodeIndex);
  return {
    edgeId: edge.id,
    edgePosition: edge.position,
    nodeId,
    role,
    nodeIndex,
    tapDevice: tapDeviceFor(edge, role, nodeIndex),
    network,
    address,
    port,
    listenEndpoint: formatListenEndpoint(address, port, protocol)
  };
}

/**
 * Derives the endpoint of a node on one edge.
 */
export function deriveEndpoint(
  model: TopologyModel,
  edge: TopologyEdge,
  nodeId: string,
  protocol: TransportProtocol = "tcp"
): DerivedEndpoint {
  return endpointFor(model, edge, nodeId, endpointRole(edge, nodeId), protocol);
}

/**
 * Both endpoints of an edge. On a self-loop the node appears on both sides.
 */
export function deriveEdgeEndpoints(
  model: TopologyModel,
  edge: TopologyEdge,
  protocol: TransportProtocol = "tcp"
): { a: DerivedEndpoint; b: DerivedEndpoint } {
  return {
    a: endpointFor(model, edge, edge.source, "a", protocol),
    b: endpointFor(model, edge, edge.target, "b", protocol)
  };
}

/**
 * Endpoints of a node across all its edges, in edge order.
 */
export function deriveNodeEndpoints(
  model: TopologyModel,
  nodeId: string,
  protocol: TransportProtocol = "tcp"
): DerivedEndpoint[] {
  return model.incidentEdges(nodeId).map((edge) => deriveEndpoint(model, edge, nodeId, protocol));
}
