/* eslint-env mocha */
/* global describe, it */
import { expect } from 'chai';

import { DanglingEdgeReferenceError, InvalidNodeIdError } from '../../../../src/shared/errors';
import { parseTopology } from '../../../../src/shared/parsing';
import { THREE_NODE_CHAIN, graphml } from '../../../helpers/graphml';

describe('parseTopology', () => {
  it('builds the model for a three node chain', () => {
    const model = parseTopology(THREE_NODE_CHAIN);
    expect(model.orderedNodes().map((n) => [n.id, n.index])).to.deep.equal([
      ['0', 0],
      ['1', 1],
      ['2', 2]
    ]);
    expect(model.edges().map((e) => `${e.source}-${e.target}`)).to.deep.equal(['0-1', '1-2']);
  });

  it('surfaces a dangling edge as an error', () => {
    const doc = graphml([{ id: '0' }], [{ source: '0', target: '1', id: 'uplink' }]);
    expect(() => parseTopology(doc)).to.throw(DanglingEdgeReferenceError, "Edge 'uplink' references unknown target node '1'");
  });

  it('surfaces a non-integer node id as an error', () => {
    expect(() => parseTopology(graphml([{ id: 'a' }], []))).to.throw(InvalidNodeIdError);
  });

  it('treats an edge without a target as dangling', () => {
    const doc = '<graphml><graph><node id="0"/><edge id="e" source="0"/></graph></graphml>';
    expect(() => parseTopology(doc)).to.throw(DanglingEdgeReferenceError, "Edge 'e' references unknown target node ''");
  });
});
