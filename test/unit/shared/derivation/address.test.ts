/* eslint-env mocha */
/* global describe, it */
import { expect } from 'chai';

import {
  BASE_PORT,
  formatListenEndpoint,
  networkBase,
  synthesizeAddress,
  synthesizePort
} from '../../../../src/shared/derivation';

describe('address synthesis', () => {
  it('replaces the wildcard with index + 1', () => {
    expect(synthesizeAddress(2, '10.0.1.*')).to.equal('10.0.1.3');
    expect(synthesizeAddress(0, '192.168.7.*')).to.equal('192.168.7.1');
  });

  it('strips the wildcard part of a prefix', () => {
    expect(networkBase('10.0.1.*')).to.equal('10.0.1');
    expect(networkBase('10.0.1.')).to.equal('10.0.1');
    expect(networkBase('10.0.1')).to.equal('10.0.1');
  });

  it('derives ports from the base port', () => {
    expect(BASE_PORT).to.equal(8000);
    expect(synthesizePort(0)).to.equal(8000);
    expect(synthesizePort(2)).to.equal(8002);
  });

  it('formats listen endpoints', () => {
    expect(formatListenEndpoint('10.0.1.2', 8001)).to.equal('tcp/10.0.1.2:8001');
    expect(formatListenEndpoint('10.0.1.2', 8001, 'udp')).to.equal('udp/10.0.1.2:8001');
  });
});
