/* eslint-env mocha */
/* global describe, it */
import { expect } from 'chai';

import { nodeIdentity } from '../../../../src/shared/derivation';

describe('nodeIdentity', () => {
  it('hashes the namespaced node id', () => {
    expect(nodeIdentity('0')).to.equal('d8efae34b48a29682a1d91f58ee3a754');
    expect(nodeIdentity('1')).to.equal('bb8d2494b1f049d6977c9f11787103ae');
  });

  it('is deterministic and 32 hex characters long', () => {
    expect(nodeIdentity('2')).to.equal(nodeIdentity('2'));
    expect(nodeIdentity('2')).to.match(/^[0-9a-f]{32}$/);
  });

  it('gives distinct ids distinct hashes', () => {
    const hashes = new Set(['0', '1', '2', '10', '11'].map((id) => nodeIdentity(id)));
    expect(hashes.size).to.equal(5);
  });

  it('takes a namespace', () => {
    expect(nodeIdentity('7', 'lab')).to.equal('65b6d699555567d3171a4a87b99e8d66');
  });
});
