/**
 * Topology types shared by the loader, the model and the generators.
 */

// ============================================================================
// Raw loader output
// ============================================================================

/** Attribute values are kept as the document spelled them. */
export type AttributeMap = Record<string, string>;

/** Where a GraphML `<key>` applies (`for` attribute). */
export type KeyDomain = "node" | "edge" | "graph" | "all" | (string & {});

/**
 * One entry of the GraphML key schema.
 */
export interface KeyDefinition {
  id: string;
  for: KeyDomain;
  /** `attr.name`, or the key id when the document omits it */
  name: string;
  /** `attr.type` (string, int, double, ...) */
  type?: string;
}

/**
 * Raw node attributes, always including `id`.
 */
export type RawNodeAttributes = AttributeMap & { id: string };

export interface RawEdge {
  id: string;
  source: string;
  target: string;
  attributes: AttributeMap;
}

export interface RawTopology {
  /** node id -> attributes, in document order */
  nodes: Map<string, RawNodeAttributes>;
  /** edges in document order */
  edges: RawEdge[];
  /** key id -> definition */
  keys: Map<string, KeyDefinition>;
}

// ============================================================================
// Model views
// ============================================================================

export interface OrderedNode {
  /** 0-based position in the integer-sorted node sequence */
  index: number;
  id: string;
  attributes: Readonly<RawNodeAttributes>;
}

export interface TopologyEdge {
  id: string;
  source: string;
  target: string;
  /** 0-based position in document order */
  position: number;
  attributes: Readonly<AttributeMap>;
}

// ============================================================================
// Well-known attribute names
// ============================================================================

export const NODE_ATTR_NAME = "name";

export const EDGE_ATTR_DATARATE = "datarate";
export const EDGE_ATTR_DELAY = "delay";
export const EDGE_ATTR_NETWORK = "network";
export const EDGE_ATTR_TAP_A = "tap_device_a";
export const EDGE_ATTR_TAP_B = "tap_device_b";
