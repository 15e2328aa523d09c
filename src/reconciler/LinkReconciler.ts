/**
 * LinkReconciler - turns declared links into interface bindings
 *
 * A node-to-network link plugs its source interface into a user-owned
 * network. A node-to-node link owns a hidden bridge network and plugs both
 * interfaces into it. Every pass runs its remote calls one after another
 * and stops at the first failure; the step order (unbind before rebind,
 * bind before hide) leaves the lab in a state the next pass can finish.
 */

import type { LabApi } from '../client/LabApi';
import { isNotFound } from '../client/errors';
import type { IOLogger } from '../io/types';
import { noopLogger } from '../io/types';
import type { LabNode } from '../types/lab';
import type { EndpointRef, LinkDeclaration, LinkReadResult, LinkState } from '../types/links';
import { shapeOfState } from '../types/links';
import type { ResolvedLink, ResolvedNetworkLink, ResolvedNodeLink } from './EndpointResolver';
import { formatEndpoint, resolveLink, sameEndpoint } from './EndpointResolver';
import { ImplicitNetworkManager, syntheticNetworkName } from './ImplicitNetworkManager';
import { InterfaceBinder, UNBOUND_NETWORK_ID } from './InterfaceBinder';
import { StyleSynchronizer } from './StyleSynchronizer';
import { LinkError } from './errors';

export interface LinkReconcilerOptions {
  api: LabApi;
  logger?: IOLogger;
}

const CLEARED_ENDPOINT: Readonly<EndpointRef> = { nodeId: 0, port: '' };

function isEndpointSet(endpoint: EndpointRef | undefined): endpoint is EndpointRef {
  return endpoint !== undefined && endpoint.nodeId > 0 && endpoint.port !== '';
}

function cloneState(state: LinkState): LinkState {
  return {
    ...state,
    source: { ...state.source },
    ...(state.target ? { target: { ...state.target } } : {}),
  };
}

function toState(link: ResolvedLink, networkId: number): LinkState {
  const state: LinkState = { labPath: link.labPath, networkId, source: { ...link.source } };
  if (link.shape === 'node-to-node') {
    state.target = { ...link.target };
  }
  return state;
}

export class LinkReconciler {
  private readonly api: LabApi;
  private readonly logger: IOLogger;
  private readonly binder: InterfaceBinder;
  private readonly networks: ImplicitNetworkManager;
  private readonly styles: StyleSynchronizer;

  constructor(options: LinkReconcilerOptions) {
    this.api = options.api;
    this.logger = options.logger ?? noopLogger;
    this.binder = new InterfaceBinder(this.api.nodes, this.logger);
    this.networks = new ImplicitNetworkManager(this.api.networks, this.logger);
    this.styles = new StyleSynchronizer(this.api, this.logger);
  }

  /**
   * Establish a declared link that has no prior state.
   */
  async create(decl: LinkDeclaration): Promise<LinkState> {
    const link = resolveLink(decl);
    const networkId =
      link.shape === 'node-to-network'
        ? await this.connectToNetwork(link, undefined)
        : await this.connectNodes(link, undefined, null);

    this.logger.info(`[Reconcile] Created ${link.shape} link ${formatEndpoint(link.source)} on network ${networkId}`);
    return this.syncStyle(link, toState(link, networkId));
  }

  /**
   * Move a link from its persisted state to a new declaration.
   */
  async update(decl: LinkDeclaration, previous: LinkState): Promise<LinkState> {
    const link = resolveLink(decl);

    // A user network must never be mistaken for this link's implicit network
    let reusableNetworkId = previous.networkId;
    if (link.shape === 'node-to-node' && shapeOfState(previous) === 'node-to-network') {
      this.logger.info(`[Reconcile] Link ${formatEndpoint(link.source)} changed from network to node`);
      reusableNetworkId = null;
    }

    const networkId =
      link.shape === 'node-to-network'
        ? await this.connectToNetwork(link, previous)
        : await this.connectNodes(link, previous, reusableNetworkId);

    this.logger.info(`[Reconcile] Updated ${link.shape} link ${formatEndpoint(link.source)} on network ${networkId}`);
    return this.syncStyle(link, toState(link, networkId));
  }

  /**
   * Compare persisted state with the lab. Never mutates remote state.
   */
  async read(state: LinkState): Promise<LinkReadResult> {
    if (state.networkId === null) {
      return { kind: 'gone' };
    }
    try {
      await this.api.networks.getNetwork(state.labPath, state.networkId);
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.info(`[Reconcile] Network ${state.networkId} no longer exists, link must be recreated`);
        return { kind: 'gone' };
      }
      throw err;
    }

    const result = state.target
      ? await this.readNodeLink(state, state.networkId, state.target)
      : await this.readNetworkLink(state, state.networkId);

    if (result.kind !== 'present' || result.state.style === undefined || !result.state.target) {
      return result;
    }
    if (!(await this.styles.isEnabled())) {
      return result;
    }
    const style = await this.styles.read(state.labPath, result.state.target);
    return { kind: 'present', state: { ...result.state, style } };
  }

  /**
   * Tear the link down. A node-to-node link deletes its own network; a
   * node-to-network link only unplugs its source from the user network.
   */
  async delete(state: LinkState): Promise<void> {
    if (state.networkId === null) {
      this.logger.debug('[Reconcile] Link network unresolved, nothing to delete');
      return;
    }
    if (shapeOfState(state) === 'node-to-node') {
      await this.networks.remove(state.labPath, state.networkId);
      return;
    }
    if (isEndpointSet(state.source)) {
      await this.binder.unbindIfBoundTo(state.labPath, state.source, state.networkId);
    }
  }

  private async connectToNetwork(link: ResolvedNetworkLink, previous: LinkState | undefined): Promise<number> {
    if (link.networkId === UNBOUND_NETWORK_ID) {
      throw new LinkError('ZERO_NETWORK_ID', `link from ${formatEndpoint(link.source)} resolves to network 0`);
    }

    if (previous && previous.networkId !== null) {
      if (shapeOfState(previous) === 'node-to-node') {
        // the old implicit network would otherwise be left without an owner
        await this.releaseImplicitNetwork(previous.labPath, previous.networkId);
      } else if (isEndpointSet(previous.source) && !sameEndpoint(previous.source, link.source)) {
        await this.binder.unbindIfBoundTo(link.labPath, previous.source, previous.networkId);
      }
    }

    await this.binder.bind(link.labPath, link.source, link.networkId);
    return link.networkId;
  }

  private async connectNodes(
    link: ResolvedNodeLink,
    previous: LinkState | undefined,
    reusableNetworkId: number | null
  ): Promise<number> {
    if (previous && previous.networkId !== null) {
      await this.unbindIfMoved(link.labPath, previous.source, link.source, previous.networkId);
      await this.unbindIfMoved(link.labPath, previous.target, link.target, previous.networkId);
    }

    const { labPath, source, target } = link;
    const { index: sourceIndex } = await this.api.nodes.getInterface(labPath, source.nodeId, source.port);
    const { index: targetIndex } = await this.api.nodes.getInterface(labPath, target.nodeId, target.port);
    const name = syntheticNetworkName(source.nodeId, sourceIndex, target.nodeId, targetIndex);

    const network = await this.networks.createOrUpdate(labPath, reusableNetworkId, name);
    if (network.id === UNBOUND_NETWORK_ID) {
      throw new LinkError('ZERO_NETWORK_ID', `network ${name} was stored with id 0`);
    }

    await this.binder.bind(labPath, source, network.id);
    await this.binder.bind(labPath, target, network.id);
    await this.networks.hide(labPath, network);
    return network.id;
  }

  private async unbindIfMoved(
    labPath: string,
    before: EndpointRef | undefined,
    after: EndpointRef,
    networkId: number
  ): Promise<void> {
    if (!isEndpointSet(before) || sameEndpoint(before, after)) return;
    await this.binder.unbindIfBoundTo(labPath, before, networkId);
  }

  private async releaseImplicitNetwork(labPath: string, networkId: number): Promise<void> {
    try {
      await this.networks.remove(labPath, networkId);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      this.logger.debug(`[Reconcile] Implicit network ${networkId} already gone`);
    }
  }

  private async syncStyle(link: ResolvedLink, state: LinkState): Promise<LinkState> {
    if (link.style === undefined) return state;
    if (link.shape !== 'node-to-node') {
      this.logger.warn(`[Style] Ignoring style on network link ${formatEndpoint(link.source)}`);
      return state;
    }
    if (!(await this.styles.isEnabled())) {
      this.logger.debug('[Style] Link styles need the Pro tier, skipping');
      // nothing observable to compare against, same as a missing topology entry
      return { ...state, style: {} };
    }
    await this.styles.write(link.labPath, link.target, link.style);
    return { ...state, style: await this.styles.read(link.labPath, link.target) };
  }

  private async findNode(labPath: string, nodeId: number): Promise<LabNode | undefined> {
    try {
      return await this.api.nodes.getNode(labPath, nodeId);
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  /**
   * Observed network of an endpoint, undefined when the port is gone.
   */
  private async findBinding(labPath: string, endpoint: EndpointRef): Promise<number | undefined> {
    try {
      const { iface } = await this.api.nodes.getInterface(labPath, endpoint.nodeId, endpoint.port);
      return iface.networkId;
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  private async readNetworkLink(state: LinkState, networkId: number): Promise<LinkReadResult> {
    const model = cloneState(state);

    if (!(await this.findNode(state.labPath, state.source.nodeId))) {
      model.source = { ...CLEARED_ENDPOINT };
      return {
        kind: 'drifted',
        state: model,
        error: new LinkError('SOURCE_NODE_MISSING', `source node ${state.source.nodeId} not found`),
      };
    }
    if (state.source.port === '') {
      return { kind: 'present', state: model };
    }

    const bound = await this.findBinding(state.labPath, state.source);
    if (bound === undefined) {
      model.source.port = '';
      return {
        kind: 'drifted',
        state: model,
        error: new LinkError(
          'ENDPOINT_DRIFT',
          `source port ${state.source.port} not found on node ${state.source.nodeId}`
        ),
      };
    }
    if (bound !== networkId) {
      // unplugged from the shared network outside of this tool
      this.logger.info(`[Reconcile] Source port ${state.source.port} left network ${networkId}`);
      model.source.port = '';
    }
    return { kind: 'present', state: model };
  }

  private async readNodeLink(state: LinkState, networkId: number, target: EndpointRef): Promise<LinkReadResult> {
    const model = cloneState(state);

    if (!(await this.findNode(state.labPath, state.source.nodeId))) {
      model.source = { ...CLEARED_ENDPOINT };
      return {
        kind: 'drifted',
        state: model,
        error: new LinkError('SOURCE_NODE_MISSING', `source node ${state.source.nodeId} not found`),
      };
    }
    if (!(await this.findNode(state.labPath, target.nodeId))) {
      model.target = { ...CLEARED_ENDPOINT };
      return {
        kind: 'drifted',
        state: model,
        error: new LinkError('TARGET_NODE_MISSING', `target node ${target.nodeId} not found`),
      };
    }

    const sourceError = await this.checkOwnedEndpoint(state.labPath, 'source', state.source, networkId);
    if (sourceError) {
      model.source.port = '';
      return { kind: 'drifted', state: model, error: sourceError };
    }
    const targetError = await this.checkOwnedEndpoint(state.labPath, 'target', target, networkId);
    if (targetError) {
      model.target = { ...target, port: '' };
      return { kind: 'drifted', state: model, error: targetError };
    }
    return { kind: 'present', state: model };
  }

  /**
   * Both ends of a node-to-node link are owned by it, so any other binding
   * means someone else touched the interface.
   */
  private async checkOwnedEndpoint(
    labPath: string,
    role: 'source' | 'target',
    endpoint: EndpointRef,
    networkId: number
  ): Promise<LinkError | undefined> {
    const bound = await this.findBinding(labPath, endpoint);
    if (bound === undefined) {
      return new LinkError('ENDPOINT_DRIFT', `${role} port ${endpoint.port} not found on node ${endpoint.nodeId}`);
    }
    if (bound !== networkId) {
      return new LinkError('ENDPOINT_DRIFT', `${role} port ${endpoint.port} is not connected to network ${networkId}`);
    }
    return undefined;
  }
}
