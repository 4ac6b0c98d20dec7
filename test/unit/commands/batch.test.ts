/* eslint-env mocha */
/* global describe, it */
import { expect } from 'chai';

import { generateAll, type CommandContext } from '../../../src/commands';
import { defaultConfig } from '../../../src/helpers/config';
import { fakeGraphviz } from '../../helpers/fakeRunner';
import { THREE_NODE_CHAIN, graphml } from '../../helpers/graphml';
import { MemoryFileSystem } from '../../helpers/memoryFs';
import { spyLogger } from '../../helpers/spyLogger';

function context(fs: MemoryFileSystem, overrides: Partial<CommandContext> = {}): CommandContext {
  return { fs, config: defaultConfig(), ...overrides };
}

describe('generateAll', () => {
  it('generates every output for each topology directory', async () => {
    const fs = new MemoryFileSystem({
      '/topology/chain/topology.graphml': THREE_NODE_CHAIN,
      '/topology/pair/topology.graphml': graphml([{ id: '0' }, { id: '1' }], [{ source: '0', target: '1' }])
    });

    const summary = await generateAll(context(fs), '/topology');

    expect(summary).to.deep.equal({ found: 2, processed: 2, skipped: [], failures: [] });
    expect(Array.from(fs.files.keys()).sort()).to.deep.equal([
      '/topology/chain/NETWORK_CONFIG.json5',
      '/topology/chain/topology.cc',
      '/topology/chain/topology.dot',
      '/topology/chain/topology.graphml',
      '/topology/pair/NETWORK_CONFIG.json5',
      '/topology/pair/topology.cc',
      '/topology/pair/topology.dot',
      '/topology/pair/topology.graphml'
    ]);
    const mesh = fs.files.get('/topology/pair/NETWORK_CONFIG.json5') ?? '';
    expect(mesh.split('\n')).to.include('    experiment: "pair",');
    const dot = fs.files.get('/topology/chain/topology.dot') ?? '';
    expect(dot.split('\n')).to.include('    dpi=200;');
  });

  it('skips directories without a topology and keeps going after a failure', async () => {
    const fs = new MemoryFileSystem({
      '/topology/broken/topology.graphml': graphml([{ id: 'x' }], []),
      '/topology/chain/topology.graphml': THREE_NODE_CHAIN,
      '/topology/notes/README.md': 'draft'
    });
    const log = spyLogger();

    const summary = await generateAll(context(fs, { logger: log }), '/topology');

    expect(summary).to.deep.equal({
      found: 2,
      processed: 1,
      skipped: ['notes'],
      failures: [{ topology: 'broken', message: "Node id 'x' is not an integer" }]
    });
    expect(fs.files.has('/topology/broken/topology.cc')).to.be.false;
    expect(fs.files.has('/topology/chain/topology.cc')).to.be.true;
    expect(log.info.calledWith('SKIP: notes (no topology.graphml found)')).to.be.true;
    expect(log.error.calledWith("  Failed: Node id 'x' is not an integer")).to.be.true;
    expect(log.info.calledWith('  Errors: 1')).to.be.true;
  });

  it('renders images when asked', async () => {
    const fs = new MemoryFileSystem({ '/topology/chain/topology.graphml': THREE_NODE_CHAIN });
    const runner = fakeGraphviz();

    await generateAll(context(fs, { runner }), '/topology', { render: true });

    expect(runner.secondCall.args[0]).to.equal('neato');
    expect(runner.secondCall.args[1]).to.deep.equal(['-Tpng', '-Gdpi=200', '-o', '/topology/chain/topology.png']);
  });

  it('counts a render failure as an error', async () => {
    const fs = new MemoryFileSystem({ '/topology/chain/topology.graphml': THREE_NODE_CHAIN });
    const runner = fakeGraphviz({ installed: false });

    const summary = await generateAll(context(fs, { runner }), '/topology', { render: true });

    expect(summary.processed).to.equal(0);
    expect(summary.failures).to.deep.equal([{ topology: 'chain', message: 'Graphviz is not installed or not on PATH' }]);
  });

  it('returns an empty summary for a missing root', async () => {
    const summary = await generateAll(context(new MemoryFileSystem()), '/nowhere');
    expect(summary).to.deep.equal({ found: 0, processed: 0, skipped: [], failures: [] });
  });
});
