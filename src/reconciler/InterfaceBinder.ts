/**
 * Plugs single node interfaces into networks and unplugs them again.
 * Every higher-level link operation is composed from these calls.
 */

import type { NodeApi } from '../client/LabApi';
import { isNotFound } from '../client/errors';
import type { IOLogger } from '../io/types';
import { noopLogger } from '../io/types';
import type { EndpointRef } from '../types/links';
import { formatEndpoint } from './EndpointResolver';

export const UNBOUND_NETWORK_ID = 0;

export class InterfaceBinder {
  constructor(
    private readonly nodes: NodeApi,
    private readonly logger: IOLogger = noopLogger
  ) {}

  /**
   * Network the interface is currently plugged into (0 when unbound).
   */
  async observedNetwork(labPath: string, endpoint: EndpointRef): Promise<number> {
    const { iface } = await this.nodes.getInterface(labPath, endpoint.nodeId, endpoint.port);
    return iface.networkId;
  }

  /**
   * Bind the interface to networkId. Skips the remote write when the
   * interface is already bound to that network.
   *
   * @returns true when a remote update was issued
   */
  async bind(labPath: string, endpoint: EndpointRef, networkId: number): Promise<boolean> {
    const current = await this.observedNetwork(labPath, endpoint);
    if (current === networkId) {
      this.logger.debug(`[Binder] ${formatEndpoint(endpoint)} already bound to network ${networkId}`);
      return false;
    }
    await this.nodes.updateInterfaceBinding(labPath, endpoint.nodeId, endpoint.port, networkId);
    this.logger.info(`[Binder] ${formatEndpoint(endpoint)}: network ${current} -> ${networkId}`);
    return true;
  }

  async unbind(labPath: string, endpoint: EndpointRef): Promise<boolean> {
    return this.bind(labPath, endpoint, UNBOUND_NETWORK_ID);
  }

  /**
   * Unbind the interface only if it is still bound to expectedNetworkId.
   * A binding to any other network belongs to someone else and is kept.
   * A node or port that no longer exists has nothing left to unbind.
   *
   * @returns true when the interface was unbound
   */
  async unbindIfBoundTo(labPath: string, endpoint: EndpointRef, expectedNetworkId: number): Promise<boolean> {
    let current: number;
    try {
      current = await this.observedNetwork(labPath, endpoint);
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.debug(`[Binder] ${formatEndpoint(endpoint)} no longer exists, nothing to unbind`);
        return false;
      }
      throw err;
    }

    if (current !== expectedNetworkId || current === UNBOUND_NETWORK_ID) {
      this.logger.debug(
        `[Binder] ${formatEndpoint(endpoint)} bound to ${current}, expected ${expectedNetworkId}; leaving it`
      );
      return false;
    }
    await this.nodes.updateInterfaceBinding(labPath, endpoint.nodeId, endpoint.port, UNBOUND_NETWORK_ID);
    this.logger.info(`[Binder] ${formatEndpoint(endpoint)}: unbound from network ${expectedNetworkId}`);
    return true;
  }
}
