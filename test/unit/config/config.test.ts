/* eslint-env mocha */
/* global describe, it */
import { expect } from 'chai';

import { defaultConfig, loadConfig, parseConfig } from '../../../src/helpers/config';
import { ConfigError } from '../../../src/shared/errors';
import { MemoryFileSystem } from '../../helpers/memoryFs';
import { spyLogger } from '../../helpers/spyLogger';

describe('parseConfig', () => {
  it('returns defaults for an empty document', () => {
    expect(parseConfig('')).to.deep.equal(defaultConfig());
  });

  it('has the documented defaults', () => {
    expect(defaultConfig()).to.deep.equal({
      logLevel: 'info',
      simulation: { stopSeconds: 600, logComponent: 'GeneratedTopologyExample' },
      mesh: { dockerTag: 'eclipse/zenoh:1.4.0', cleanFirst: false, volume: './zenoh', role: 'router' },
      render: { layout: 'neato', format: 'png', dpi: 150 }
    });
  });

  it('overrides defaults field by field', () => {
    const config = parseConfig(
      [
        'logLevel: debug',
        'simulation:',
        '  stopSeconds: 120',
        'mesh:',
        '  experiment: lab-a',
        '  cleanFirst: true',
        'render:',
        '  layout: dot',
        '  format: svg'
      ].join('\n')
    );
    expect(config).to.deep.equal({
      logLevel: 'debug',
      simulation: { stopSeconds: 120, logComponent: 'GeneratedTopologyExample' },
      mesh: {
        experiment: 'lab-a',
        dockerTag: 'eclipse/zenoh:1.4.0',
        cleanFirst: true,
        volume: './zenoh',
        role: 'router'
      },
      render: { layout: 'dot', format: 'svg', dpi: 150 }
    });
  });

  it('rejects fields of the wrong type', () => {
    expect(() => parseConfig('render:\n  dpi: high'))
      .to.throw(ConfigError, 'render.dpi: expected a positive number')
      .with.property('path', 'render.dpi');
    expect(() => parseConfig('mesh:\n  cleanFirst: maybe')).to.throw(ConfigError, 'mesh.cleanFirst: expected true or false');
    expect(() => parseConfig('simulation: 5')).to.throw(ConfigError, 'simulation: expected a mapping');
    expect(() => parseConfig('logLevel: loud')).to.throw(ConfigError, 'logLevel: expected one of debug, info, warn, error');
  });

  it('rejects unknown layout engines and formats', () => {
    expect(() => parseConfig('render:\n  layout: spring')).to.throw(
      ConfigError,
      'render.layout: expected one of dot, neato, circo, fdp, sfdp, twopi'
    );
    expect(() => parseConfig('render:\n  format: bmp')).to.throw(ConfigError, 'render.format: expected one of png, svg, pdf, jpg, gif');
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseConfig('- a\n- b')).to.throw(ConfigError, '(document): expected a mapping at the top level');
  });

  it('warns about unknown keys', () => {
    const log = spyLogger();
    parseConfig('render:\n  colour: blue', log);
    expect(log.warn.calledOnceWithExactly("Ignoring unknown config key 'render.colour'")).to.be.true;
  });
});

describe('loadConfig', () => {
  it('falls back to defaults when netgen.yaml is absent', async () => {
    const fs = new MemoryFileSystem();
    expect(await loadConfig(fs, { cwd: '/work' })).to.deep.equal(defaultConfig());
  });

  it('reads netgen.yaml from the working directory', async () => {
    const fs = new MemoryFileSystem({ '/work/netgen.yaml': 'render:\n  dpi: 96\n' });
    const config = await loadConfig(fs, { cwd: '/work' });
    expect(config.render.dpi).to.equal(96);
  });

  it('requires an explicitly named file to exist', async () => {
    const fs = new MemoryFileSystem();
    let caught: unknown;
    try {
      await loadConfig(fs, { cwd: '/work', path: '/etc/netgen.yaml' });
    } catch (err) {
      caught = err;
    }
    expect(caught).to.be.instanceOf(ConfigError);
    expect(caught).to.have.property('message', '/etc/netgen.yaml: configuration file not found');
  });

  it('prefixes field errors with the file path', async () => {
    const fs = new MemoryFileSystem({ '/work/netgen.yaml': 'simulation:\n  stopSeconds: -5\n' });
    let caught: unknown;
    try {
      await loadConfig(fs, { cwd: '/work' });
    } catch (err) {
      caught = err;
    }
    expect(caught).to.be.instanceOf(ConfigError);
    expect(caught).to.have.property('message', '/work/netgen.yaml: simulation.stopSeconds: expected a positive number');
  });
});
