/* eslint-env mocha */
/* global describe, it, afterEach */
import { expect } from 'chai';
import sinon from 'sinon';

import { USAGE, runCli } from '../../../src/cli';
import { fakeGraphviz } from '../../helpers/fakeRunner';
import { THREE_NODE_CHAIN, graphml } from '../../helpers/graphml';
import { MemoryFileSystem } from '../../helpers/memoryFs';
import { spyLogger } from '../../helpers/spyLogger';

const GRAPHML = '/work/labs/chain/topology.graphml';

function setup(extra: Record<string, string> = {}) {
  const fs = new MemoryFileSystem({ [GRAPHML]: THREE_NODE_CHAIN, ...extra });
  const logger = spyLogger();
  const runner = fakeGraphviz();
  return { fs, logger, runner, deps: { fs, logger, runner, cwd: '/work' } };
}

describe('netgen CLI', () => {
  afterEach(() => {
    sinon.restore();
  });

  it('prints usage for --help', async () => {
    const print = sinon.stub(console, 'log');
    const { deps } = setup();
    expect(await runCli(['--help'], deps)).to.equal(0);
    expect(print.calledOnceWithExactly(USAGE)).to.be.true;
  });

  it('rejects an unknown command', async () => {
    const { deps, logger } = setup();
    expect(await runCli(['frob', 'x'], deps)).to.equal(1);
    expect(logger.error.firstCall.args[0]).to.equal("Error: unknown command 'frob'");
  });

  it('writes topology.cc into the working directory by default', async () => {
    const { deps, fs } = setup();
    expect(await runCli(['ns3', 'labs/chain/topology.graphml'], deps)).to.equal(0);
    expect(fs.files.has('/work/topology.cc')).to.be.true;
  });

  it('honours -o', async () => {
    const { deps, fs } = setup();
    expect(await runCli(['dot', 'labs/chain/topology.graphml', '-o', 'out/graph.dot', '-l', 'fdp', '-d', '96'], deps)).to.equal(0);
    const lines = (fs.files.get('/work/out/graph.dot') ?? '').split('\n');
    expect(lines).to.include('    layout=fdp;');
    expect(lines).to.include('    dpi=96;');
  });

  it('passes the experiment name and Zenoh path to the mesh generator', async () => {
    const { deps, fs } = setup();
    expect(await runCli(['mesh', GRAPHML, '-n', 'trial', '-z', '/opt/zenoh'], deps)).to.equal(0);
    const lines = (fs.files.get('/work/labs/chain/NETWORK_CONFIG.json5') ?? '').split('\n');
    expect(lines).to.include('    experiment: "trial",');
    expect(lines).to.include('    volume: "/opt/zenoh",');
  });

  it('names the rendered image after the input file', async () => {
    const { deps, runner } = setup();
    expect(await runCli(['render', GRAPHML, '-f', 'svg'], deps)).to.equal(0);
    expect(runner.secondCall.args[1]).to.deep.equal(['-Tsvg', '-Gdpi=150', '-o', '/work/topology.svg']);
  });

  it('reads netgen.yaml from the working directory', async () => {
    const { deps, runner } = setup({ '/work/netgen.yaml': 'render:\n  layout: circo\n  dpi: 90\n' });
    expect(await runCli(['render', GRAPHML, '-o', 'img.png'], deps)).to.equal(0);
    expect(runner.secondCall.args[0]).to.equal('circo');
    expect(runner.secondCall.args[1]).to.deep.equal(['-Tpng', '-Gdpi=90', '-o', '/work/img.png']);
  });

  it('lets flags override the configuration file', async () => {
    const { deps, runner } = setup({ '/work/netgen.yaml': 'render:\n  layout: circo\n' });
    expect(await runCli(['render', GRAPHML, '-l', 'sfdp'], deps)).to.equal(0);
    expect(runner.secondCall.args[0]).to.equal('sfdp');
  });

  it('exits 1 on an invalid flag value', async () => {
    const { deps, logger } = setup();
    expect(await runCli(['render', GRAPHML, '-f', 'bmp'], deps)).to.equal(1);
    expect(logger.error.firstCall.args[0]).to.equal(
      "Error: invalid format 'bmp' (choose from png, svg, pdf, jpg, gif)"
    );
  });

  it('exits 1 when the input file is missing', async () => {
    const { deps, logger } = setup();
    expect(await runCli(['ns3', 'missing.graphml'], deps)).to.equal(1);
    expect(logger.error.firstCall.args[0]).to.equal("Error: GraphML file '/work/missing.graphml' not found");
  });

  it('exits 1 on a topology error', async () => {
    const { deps, logger } = setup({ '/work/bad.graphml': graphml([{ id: '0' }], [{ source: '0', target: '9' }]) });
    expect(await runCli(['mesh', 'bad.graphml'], deps)).to.equal(1);
    expect(logger.error.firstCall.args[0]).to.equal("Error: Edge 'e0' references unknown target node '9'");
  });

  it('exits 1 when a named configuration file is missing', async () => {
    const { deps } = setup();
    expect(await runCli(['ns3', GRAPHML, '--config', 'other.yaml'], deps)).to.equal(1);
  });

  it('exits 1 from all when any topology fails', async () => {
    const { deps } = setup({ '/work/labs/bad/topology.graphml': graphml([{ id: 'r1' }], []) });
    expect(await runCli(['all', 'labs'], deps)).to.equal(1);
  });

  it('exits 0 from all when every topology succeeds', async () => {
    const { deps, fs } = setup();
    expect(await runCli(['all', 'labs', '--render'], deps)).to.equal(0);
    expect(fs.files.has('/work/labs/chain/topology.cc')).to.be.true;
  });
});
