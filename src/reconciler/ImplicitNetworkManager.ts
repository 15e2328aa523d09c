/**
 * Owns the hidden bridge networks that back node-to-node links.
 *
 * The remote system only connects interfaces through networks, so a direct
 * link between two interfaces is a private network with exactly those two
 * members. Such a network belongs to the single link that created it.
 */

import type { NetworkApi } from '../client/LabApi';
import { isNotFound } from '../client/errors';
import type { IOLogger } from '../io/types';
import { noopLogger } from '../io/types';
import type { LabNetwork, NetworkSpec } from '../types/lab';

export const IMPLICIT_NETWORK_TYPE = 'bridge';
export const IMPLICIT_NETWORK_ICON = 'lan.png';

/**
 * Deterministic name of the network joining two interfaces, built from the
 * node ids and the interface indices.
 */
export function syntheticNetworkName(
  sourceNodeId: number,
  sourceIndex: number,
  targetNodeId: number,
  targetIndex: number
): string {
  return `${sourceNodeId}_${sourceIndex}_${targetNodeId}_${targetIndex}`;
}

function implicitNetworkSpec(name: string): NetworkSpec {
  return {
    name,
    type: IMPLICIT_NETWORK_TYPE,
    // stays visible until both interfaces are bound, see hide()
    visibility: 'visible',
    left: 0,
    top: 0,
    icon: IMPLICIT_NETWORK_ICON,
  };
}

export class ImplicitNetworkManager {
  constructor(
    private readonly networks: NetworkApi,
    private readonly logger: IOLogger = noopLogger
  ) {}

  /**
   * Rename the existing network in place when it is still alive, otherwise
   * create a fresh one. Renaming keeps the interfaces bound to it.
   */
  async createOrUpdate(labPath: string, existingNetworkId: number | null, name: string): Promise<LabNetwork> {
    if (existingNetworkId !== null && existingNetworkId > 0) {
      const existing = await this.findNetwork(labPath, existingNetworkId);
      if (existing) {
        const network: LabNetwork = { ...implicitNetworkSpec(name), id: existing.id };
        await this.networks.updateNetwork(labPath, network);
        this.logger.info(`[ImplicitNetwork] Updated network ${network.id} as ${name}`);
        return network;
      }
      this.logger.warn(`[ImplicitNetwork] Network ${existingNetworkId} vanished, creating a new one`);
    }

    const created = await this.networks.createNetwork(labPath, implicitNetworkSpec(name));
    this.logger.info(`[ImplicitNetwork] Created network ${created.id} as ${name}`);
    return created;
  }

  /**
   * Force the network out of the user-visible network list.
   */
  async hide(labPath: string, network: LabNetwork): Promise<LabNetwork> {
    const hidden: LabNetwork = { ...network, visibility: 'hidden' };
    await this.networks.updateNetwork(labPath, hidden);
    this.logger.debug(`[ImplicitNetwork] Network ${network.id} hidden`);
    return hidden;
  }

  /**
   * Delete the network. Its remaining members are unplugged by the remote side.
   */
  async remove(labPath: string, networkId: number): Promise<void> {
    await this.networks.deleteNetwork(labPath, networkId);
    this.logger.info(`[ImplicitNetwork] Deleted network ${networkId}`);
  }

  private async findNetwork(labPath: string, networkId: number): Promise<LabNetwork | undefined> {
    try {
      return await this.networks.getNetwork(labPath, networkId);
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }
}
