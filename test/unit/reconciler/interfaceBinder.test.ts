/* eslint-env mocha */
/* global describe, it, beforeEach */
import { expect } from 'chai';

import { InterfaceBinder } from '../../../src/reconciler/InterfaceBinder';
import { captureError } from '../../helpers/captureError';
import { createFakeLab, FakeLabApi, LAB_PATH } from '../../helpers/fakeLabApi';

describe('InterfaceBinder', () => {
  let api: FakeLabApi;
  let binder: InterfaceBinder;

  beforeEach(() => {
    api = createFakeLab();
    api.addNetwork('shared', { id: 5 });
    api.addNetwork('other', { id: 6 });
    binder = new InterfaceBinder(api.nodes);
  });

  it('binds an unbound interface', async () => {
    const changed = await binder.bind(LAB_PATH, { nodeId: 1, port: 'e0' }, 5);
    expect(changed).to.equal(true);
    expect(api.bindingOf(1, 'e0')).to.equal(5);
    expect(api.mutatingCalls()).to.deep.equal(['updateInterfaceBinding(1,e0,5)']);
  });

  it('skips the write when already bound to the same network', async () => {
    api.plug(1, 'e0', 5);
    const changed = await binder.bind(LAB_PATH, { nodeId: 1, port: 'e0' }, 5);
    expect(changed).to.equal(false);
    expect(api.mutatingCalls()).to.deep.equal([]);
  });

  it('unbinds by binding to network 0', async () => {
    api.plug(2, 'e1', 6);
    await binder.unbind(LAB_PATH, { nodeId: 2, port: 'e1' });
    expect(api.bindingOf(2, 'e1')).to.equal(0);
    expect(api.mutatingCalls()).to.deep.equal(['updateInterfaceBinding(2,e1,0)']);
  });

  describe('unbindIfBoundTo', () => {
    it('unbinds when the interface is on the expected network', async () => {
      api.plug(1, 'e0', 5);
      const changed = await binder.unbindIfBoundTo(LAB_PATH, { nodeId: 1, port: 'e0' }, 5);
      expect(changed).to.equal(true);
      expect(api.bindingOf(1, 'e0')).to.equal(0);
    });

    it('keeps a binding to another network', async () => {
      api.plug(1, 'e0', 6);
      const changed = await binder.unbindIfBoundTo(LAB_PATH, { nodeId: 1, port: 'e0' }, 5);
      expect(changed).to.equal(false);
      expect(api.bindingOf(1, 'e0')).to.equal(6);
      expect(api.mutatingCalls()).to.deep.equal([]);
    });

    it('does nothing for an already unbound interface', async () => {
      const changed = await binder.unbindIfBoundTo(LAB_PATH, { nodeId: 1, port: 'e0' }, 0);
      expect(changed).to.equal(false);
      expect(api.mutatingCalls()).to.deep.equal([]);
    });

    it('treats a missing port as nothing to unbind', async () => {
      const changed = await binder.unbindIfBoundTo(LAB_PATH, { nodeId: 1, port: 'e9' }, 5);
      expect(changed).to.equal(false);
    });

    it('propagates other remote failures', async () => {
      api.failOn('getInterface', 503, 'busy');
      const err = await captureError(() => binder.unbindIfBoundTo(LAB_PATH, { nodeId: 1, port: 'e0' }, 5));
      expect(err.message).to.equal('getInterface failed (503): busy');
    });
  });
});
