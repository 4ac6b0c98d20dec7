/**
 * Graphviz DOT generator: one undirected graph, nodes in integer order,
 * edges labelled with their declared link attributes.
 */

import { readAttribute } from "../../shared/derivation";
import type { TopologyModel } from "../../shared/parsing/TopologyModel";
import type { TopologyEdge } from "../../shared/types/topology";
import { EDGE_ATTR_DATARATE, EDGE_ATTR_DELAY, EDGE_ATTR_NETWORK } from "../../shared/types/topology";
import { DEFAULT_DPI, DEFAULT_LAYOUT_ENGINE, type LayoutEngine } from "../../utils/consts";

export interface DotOptions {
  layout?: LayoutEngine;
  dpi?: number;
}

const EDGE_LABEL_FIELDS: ReadonlyArray<[string, string]> = [
  [EDGE_ATTR_DATARATE, "Rate"],
  [EDGE_ATTR_DELAY, "Delay"],
  [EDGE_ATTR_NETWORK, "Net"]
];

export function escapeDot(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\r?\n/g, "\\n");
}

/**
 * Label lines for the attributes the document declares on the edge.
 * Defaults are not drawn.
 */
export function edgeLabel(edge: TopologyEdge): string {
  const parts: string[] = [];
  for (const [attrName, caption] of EDGE_LABEL_FIELDS) {
    const value = readAttribute(edge.attributes, attrName);
    if (value !== undefined) parts.push(`${caption}: ${escapeDot(value)}`);
  }
  return parts.join("\\n");
}

export function generateDot(model: TopologyModel, options: DotOptions = {}): string {
  const layout = options.layout ?? DEFAULT_LAYOUT_ENGINE;
  const dpi = options.dpi ?? DEFAULT_DPI;

  const lines = [
    "graph network_topology {",
    "    // Graph attributes",
    `    layout=${layout};`,
    `    dpi=${dpi};`,
    `    size="10,8!";`,
    "    ratio=fill;",
    "    overlap=false;",
    "    splines=true;",
    `    sep="+20,20";`,
    `    esep="+10,10";`,
    "    nodesep=1.5;",
    "    ranksep=2.0;",
    "",
    "    // Node and edge styling",
    "    node [shape=circle, style=filled, fillcolor=lightblue, fontsize=14,",
    "          width=1.2, height=1.2, fixedsize=true, penwidth=2];",
    "    edge [fontsize=11, color=darkblue, penwidth=2, labeldistance=2.5,",
    "          labelangle=0, labelfloat=true];",
    "",
    "    // Nodes"
  ];

  for (const node of model.orderedNodes()) {
    lines.push(`    "${escapeDot(node.id)}" [label="${escapeDot(model.nodeName(node.id))}"];`);
  }

  lines.push("", "    // Edges");
  for (const edge of model.edges()) {
    const label = edgeLabel(edge);
    const link = `    "${escapeDot(edge.source)}" -- "${escapeDot(edge.target)}"`;
    lines.push(label ? `${link} [label="${label}"];` : `${link};`);
  }

  lines.push("}", "");
  return lines.join("\n");
}
