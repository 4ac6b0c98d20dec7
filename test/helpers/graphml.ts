/**
 * Builds small GraphML documents for tests.
 */

export interface NodeSpec {
  id: string;
  name?: string;
}

export interface EdgeSpec {
  source: string;
  target: string;
  id?: string;
  datarate?: string;
  delay?: string;
  network?: string;
  tapA?: string;
  tapB?: string;
}

const EDGE_KEYS: Array<[keyof EdgeSpec, string, string]> = [
  ['datarate', 'd1', 'datarate'],
  ['delay', 'd2', 'delay'],
  ['network', 'd3', 'network'],
  ['tapA', 'd4', 'tap_device_a'],
  ['tapB', 'd5', 'tap_device_b']
];

function escapeXml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export function graphml(nodes: NodeSpec[], edges: EdgeSpec[]): string {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<graphml xmlns="http://graphml.graphdrawing.org/xmlns">',
    '  <key id="d0" for="node" attr.name="name" attr.type="string"/>'
  ];
  for (const [, keyId, attrName] of EDGE_KEYS) {
    lines.push(`  <key id="${keyId}" for="edge" attr.name="${attrName}" attr.type="string"/>`);
  }
  lines.push('  <graph id="G" edgedefault="undirected">');

  for (const node of nodes) {
    if (node.name === undefined) {
      lines.push(`    <node id="${escapeXml(node.id)}"/>`);
    } else {
      lines.push(`    <node id="${escapeXml(node.id)}"><data key="d0">${escapeXml(node.name)}</data></node>`);
    }
  }

  edges.forEach((edge, i) => {
    const id = edge.id ?? `e${i}`;
    const data = EDGE_KEYS.flatMap(([field, keyId]) => {
      const value = edge[field];
      return value === undefined ? [] : [`<data key="${keyId}">${escapeXml(value)}</data>`];
    });
    lines.push(
      `    <edge id="${escapeXml(id)}" source="${escapeXml(edge.source)}" target="${escapeXml(edge.target)}">${data.join('')}</edge>`
    );
  });

  lines.push('  </graph>', '</graphml>');
  return lines.join('\n');
}

/** Nodes 0, 1, 2 with edges (0,1) and (1,2) and no optional attributes. */
export const THREE_NODE_CHAIN = graphml(
  [{ id: '0' }, { id: '1' }, { id: '2' }],
  [
    { source: '0', target: '1' },
    { source: '1', target: '2' }
  ]
);
