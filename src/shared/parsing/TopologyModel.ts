/**
 * Topology model - the ordering-stable view every generator reads from.
 *
 * Nodes are ordered by their id parsed as an integer. The resulting index is
 * computed once here; generators look it up instead of sorting on their own.
 */

import { DanglingEdgeReferenceError, InvalidNodeIdError, UnknownNodeError } from "../errors";
import { nodeDisplayName } from "../derivation/defaults";
import type {
  OrderedNode,
  RawEdge,
  RawNodeAttributes,
  RawTopology,
  TopologyEdge
} from "../types/topology";

import type { BuildOptions } from "./types";
import { nullLogger } from "./types";

const INTEGER_ID_RE = /^[+-]?\d+$/;

/**
 * Parses a node id for ordering purposes.
 *
 * @throws InvalidNodeIdError when the id is not an integer
 */
export function parseNodeOrdinal(nodeId: string): bigint {
  const trimmed = nodeId.trim();
  if (!INTEGER_ID_RE.test(trimmed)) {
    throw new InvalidNodeIdError(nodeId);
  }
  return BigInt(trimmed);
}

function compareOrdinals(
  a: { id: string; ordinal: bigint },
  b: { id: string; ordinal: bigint }
): number {
  if (a.ordinal !== b.ordinal) return a.ordinal < b.ordinal ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export class TopologyModel {
  private readonly ordered: readonly OrderedNode[];
  private readonly indexById: ReadonlyMap<string, number>;
  private readonly edgeList: readonly TopologyEdge[];

  private constructor(ordered: OrderedNode[], edgeList: TopologyEdge[]) {
    this.ordered = Object.freeze(ordered.map((n) => Object.freeze(n)));
    this.indexById = new Map(ordered.map((n) => [n.id, n.index]));
    this.edgeList = Object.freeze(edgeList.map((e) => Object.freeze(e)));
  }

  /**
   * Validates raw loader output and builds the model.
   *
   * @throws InvalidNodeIdError if a node id is not an integer
   * @throws DanglingEdgeReferenceError if an edge names a node that does not exist
   */
  static build(
    nodes: ReadonlyMap<string, RawNodeAttributes>,
    edges: readonly RawEdge[],
    options: BuildOptions = {}
  ): TopologyModel {
    const log = options.logger ?? nullLogger;

    const keyed = Array.from(nodes.entries()).map(([id, attributes]) => ({
      id,
      attributes: Object.freeze({ ...attributes }),
      ordinal: parseNodeOrdinal(id)
    }));
    keyed.sort(compareOrdinals);
    const ordered: OrderedNode[] = keyed.map((n, index) => ({
      index,
      id: n.id,
      attributes: n.attributes
    }));

    const edgeList: TopologyEdge[] = edges.map((edge, position) => {
      if (!nodes.has(edge.source)) {
        throw new DanglingEdgeReferenceError(edge.id, edge.source, "source");
      }
      if (!nodes.has(edge.target)) {
        throw new DanglingEdgeReferenceError(edge.id, edge.target, "target");
      }
      return {
        id: edge.id,
        source: edge.source,
        target: edge.target,
        position,
        attributes: Object.freeze({ ...edge.attributes })
      };
    });

    log.info(`Built topology model: ${ordered.length} nodes, ${edgeList.length} edges`);
    return new TopologyModel(ordered, edgeList);
  }

  get nodeCount(): number {
    return this.ordered.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  /**
   * Nodes sorted by integer id, ascending. Same array on every call.
   */
  orderedNodes(): readonly OrderedNode[] {
    return this.ordered;
  }

  /**
   * Position of a node in {@link orderedNodes}.
   *
   * @throws UnknownNodeError if the node does not exist
   */
  nodeIndex(nodeId: string): number {
    const index = this.indexById.get(nodeId);
    if (index === undefined) {
      throw new UnknownNodeError(nodeId);
    }
    return index;
  }

  hasNode(nodeId: string): boolean {
    return this.indexById.has(nodeId);
  }

  node(nodeId: string): OrderedNode {
    return this.ordered[this.nodeIndex(nodeId)];
  }

  /** Human-readable node name, falling back to the raw id. */
  nodeName(nodeId: string): string {
    return nodeDisplayName(nodeId, this.node(nodeId).attributes);
  }

  /**
   * Edges in document order.
   */
  edges(): readonly TopologyEdge[] {
    return this.edgeList;
  }

  /** Edges that have the node as source or target, in document order. */
  incidentEdges(nodeId: string): TopologyEdge[] {
    this.nodeIndex(nodeId);
    return this.edgeList.filter((e) => e.source === nodeId || e.target === nodeId);
  }
}

/**
 * Builds a topology model from loader output.
 */
export function buildModel(
  nodes: ReadonlyMap<string, RawNodeAttributes>,
  edges: readonly RawEdge[],
  options?: BuildOptions
): TopologyModel {
  return TopologyModel.build(nodes, edges, options);
}

/**
 * Convenience wrapper for a whole {@link RawTopology}.
 */
export function buildModelFromRaw(raw: RawTopology, options?: BuildOptions): TopologyModel {
  return TopologyModel.build(raw.nodes, raw.edges, options);
}
