/* eslint-env mocha */
/* global describe, it */
import { expect } from 'chai';

import { loadDeclarations, parseDeclarations } from '../../../src/io/DeclarationIO';
import { LinkError } from '../../../src/reconciler/errors';
import { captureError } from '../../helpers/captureError';
import { MemoryFsAdapter } from '../../helpers/memoryFsAdapter';

const VALID = `lab: /tests/demo.unl
links:
  r1-r2:
    source: { node: 1, port: e0 }
    target: { node: 2, port: e1 }
    style:
      color: "#ff0000"
      width: 3
  r3-uplink:
    source: { node: 3, port: Gi0/0 }
    network: 4
`;

function parseError(content: string): LinkError {
  try {
    parseDeclarations(content, 'links.yaml');
  } catch (err) {
    if (err instanceof LinkError) return err;
    throw err;
  }
  throw new Error('expected parseDeclarations to fail');
}

describe('DeclarationIO', () => {
  it('parses node and network links', () => {
    expect(parseDeclarations(VALID)).to.deep.equal({
      'r1-r2': {
        labPath: '/tests/demo.unl',
        source: { nodeId: 1, port: 'e0' },
        target: { nodeId: 2, port: 'e1' },
        style: { color: '#ff0000', width: 3 },
      },
      'r3-uplink': {
        labPath: '/tests/demo.unl',
        source: { nodeId: 3, port: 'Gi0/0' },
        networkId: 4,
      },
    });
  });

  it('accepts an empty links map', () => {
    expect(parseDeclarations('lab: /tests/demo.unl\nlinks: {}\n')).to.deep.equal({});
  });

  it('reports a missing port with its location', () => {
    const err = parseError(`lab: /tests/demo.unl
links:
  r1:
    source: { node: 1 }
    network: 2
`);
    expect(err.code).to.equal('INVALID_DECLARATION');
    expect(err.message).to.equal("links.yaml: /links/r1/source must have required property 'port'");
  });

  it('rejects a link with both a target and a network', () => {
    const err = parseError(`lab: /tests/demo.unl
links:
  r1:
    source: { node: 1, port: e0 }
    target: { node: 2, port: e0 }
    network: 2
`);
    expect(err.code).to.equal('INVALID_DECLARATION');
    expect(err.message).to.contain('/links/r1 must match exactly one schema in oneOf');
  });

  it('rejects an unknown line style', () => {
    const err = parseError(`lab: /tests/demo.unl
links:
  r1:
    source: { node: 1, port: e0 }
    target: { node: 2, port: e0 }
    style: { style: Dotted }
`);
    expect(err.message).to.equal('links.yaml: /links/r1/style/style must be equal to one of the allowed values');
  });

  it('rejects malformed YAML', () => {
    const err = parseError('lab: [unterminated\n');
    expect(err.code).to.equal('INVALID_DECLARATION');
    expect(err.message.startsWith('links.yaml: ')).to.equal(true);
  });

  it('loads a declarations file through the adapter', async () => {
    const fs = new MemoryFsAdapter();
    fs.files.set('/work/links.yaml', VALID);
    const declared = await loadDeclarations(fs, '/work/links.yaml');
    expect(Object.keys(declared)).to.deep.equal(['r1-r2', 'r3-uplink']);
  });

  it('names the file in validation errors', async () => {
    const fs = new MemoryFsAdapter();
    fs.files.set('/work/links.yaml', 'links: {}\n');
    const err = await captureError(() => loadDeclarations(fs, '/work/links.yaml'));
    expect(err.message).to.equal("/work/links.yaml: / must have required property 'lab'");
  });
});
