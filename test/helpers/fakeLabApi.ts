/**
 * In-process stand-in for the lab server.
 *
 * Models nodes with named interfaces, networks, the topology listing used
 * for style read-back and the Pro flag. Every call is recorded in `calls`
 * as `operation(args)`, and failures can be injected per operation.
 */

import type { CapabilityApi, LabApi, NetworkApi, NodeApi, TopologyApi } from '../../src/client/LabApi';
import { RemoteApiError } from '../../src/client/errors';
import type { LabNetwork, LinkStyle, NetworkSpec, NodeInterface, TopologyEntry } from '../../src/types/lab';

export interface FakeNode {
  name: string;
  interfaces: NodeInterface[];
}

const MUTATING = /^(updateInterfaceBinding|updateInterfaceStyle|createNetwork|updateNetwork|deleteNetwork)\(/;

export class FakeLabApi implements LabApi {
  readonly calls: string[] = [];
  readonly nodeRecords = new Map<number, FakeNode>();
  readonly networkRecords = new Map<number, LabNetwork>();
  topologyEntries: TopologyEntry[] = [];
  proTier = false;

  private nextNetworkId = 1;
  private readonly failures = new Map<string, RemoteApiError>();

  addNode(id: number, ports: string[], name = `node${id}`): void {
    this.nodeRecords.set(id, { name, interfaces: ports.map((port) => ({ name: port, networkId: 0 })) });
  }

  addNetwork(name: string, overrides: Partial<LabNetwork> = {}): LabNetwork {
    const network: LabNetwork = {
      id: overrides.id ?? this.allocateNetworkId(),
      name,
      type: 'bridge',
      visibility: 'visible',
      left: 100,
      top: 100,
      icon: 'lan.png',
      ...overrides,
    };
    this.networkRecords.set(network.id, network);
    return network;
  }

  /** Plug an interface directly, bypassing call recording */
  plug(nodeId: number, port: string, networkId: number): void {
    this.findInterface(nodeId, port).networkId = networkId;
  }

  bindingOf(nodeId: number, port: string): number {
    return this.findInterface(nodeId, port).networkId;
  }

  /** Make every later call of `operation` fail with the given status */
  failOn(operation: string, status = 500, message = 'injected failure'): void {
    this.failures.set(operation, new RemoteApiError(operation, status, message));
  }

  clearFailures(): void {
    this.failures.clear();
  }

  mutatingCalls(): string[] {
    return this.calls.filter((call) => MUTATING.test(call));
  }

  resetCalls(): void {
    this.calls.length = 0;
  }

  private allocateNetworkId(): number {
    while (this.networkRecords.has(this.nextNetworkId)) this.nextNetworkId++;
    return this.nextNetworkId++;
  }

  private record(operation: string, ...args: Array<string | number>): void {
    this.calls.push(`${operation}(${args.join(',')})`);
    const failure = this.failures.get(operation);
    if (failure) throw failure;
  }

  private findNode(nodeId: number): FakeNode {
    const node = this.nodeRecords.get(nodeId);
    if (!node) throw new RemoteApiError('getNode', 404, `node ${nodeId} not found`);
    return node;
  }

  private findInterface(nodeId: number, port: string): NodeInterface {
    const iface = this.findNode(nodeId).interfaces.find((entry) => entry.name === port);
    if (!iface) throw new RemoteApiError('getInterface', 404, `interface ${port} not found on node ${nodeId}`);
    return iface;
  }

  private findNetwork(networkId: number): LabNetwork {
    const network = this.networkRecords.get(networkId);
    if (!network) throw new RemoteApiError('getNetwork', 404, `network ${networkId} not found`);
    return network;
  }

  private writeStyleEntry(nodeId: number, port: string, style: LinkStyle): void {
    const source = `node${nodeId}`;
    const entry: TopologyEntry = {
      type: 'ethernet',
      source,
      source_label: port,
      style: style.style,
      color: style.color,
      srcpos: String(style.srcpos),
      dstpos: String(style.dstpos),
      linkstyle: style.linkstyle,
      width: String(style.width),
      label: style.label,
      labelpos: String(style.labelpos),
      stub: String(style.stub),
      curviness: String(style.curviness),
      beziercurviness: String(style.beziercurviness),
      round: String(style.round),
      midpoint: String(style.midpoint),
    };
    this.topologyEntries = this.topologyEntries
      .filter((existing) => !(existing.source === source && existing.source_label === port))
      .concat(entry);
  }

  readonly nodes: NodeApi = {
    getNode: async (_labPath, nodeId) => {
      this.record('getNode', nodeId);
      const node = this.findNode(nodeId);
      return { id: nodeId, name: node.name, interfaces: node.interfaces.map((iface) => ({ ...iface })) };
    },
    getInterface: async (_labPath, nodeId, port) => {
      this.record('getInterface', nodeId, port);
      const node = this.findNode(nodeId);
      const index = node.interfaces.findIndex((iface) => iface.name === port);
      if (index < 0) throw new RemoteApiError('getInterface', 404, `interface ${port} not found on node ${nodeId}`);
      return { index, iface: { ...node.interfaces[index] } };
    },
    updateInterfaceBinding: async (_labPath, nodeId, port, networkId) => {
      this.record('updateInterfaceBinding', nodeId, port, networkId);
      const iface = this.findInterface(nodeId, port);
      if (networkId !== 0) this.findNetwork(networkId);
      iface.networkId = networkId;
    },
    updateInterfaceStyle: async (_labPath, nodeId, port, style) => {
      this.record('updateInterfaceStyle', nodeId, port);
      this.findInterface(nodeId, port);
      this.writeStyleEntry(nodeId, port, style);
    },
  };

  readonly networks: NetworkApi = {
    getNetwork: async (_labPath, networkId) => {
      this.record('getNetwork', networkId);
      return { ...this.findNetwork(networkId) };
    },
    createNetwork: async (_labPath, spec: NetworkSpec) => {
      this.record('createNetwork', spec.name);
      const network = { ...spec, id: this.allocateNetworkId() };
      this.networkRecords.set(network.id, network);
      return { ...network };
    },
    updateNetwork: async (_labPath, network) => {
      this.record('updateNetwork', network.id, network.name, network.visibility);
      this.findNetwork(network.id);
      this.networkRecords.set(network.id, { ...network });
    },
    deleteNetwork: async (_labPath, networkId) => {
      this.record('deleteNetwork', networkId);
      this.findNetwork(networkId);
      this.networkRecords.delete(networkId);
      for (const node of this.nodeRecords.values()) {
        for (const iface of node.interfaces) {
          if (iface.networkId === networkId) iface.networkId = 0;
        }
      }
    },
  };

  readonly topology: TopologyApi = {
    getTopology: async () => {
      this.record('getTopology');
      return this.topologyEntries.map((entry) => ({ ...entry }));
    },
  };

  readonly capabilities: CapabilityApi = {
    isProTier: async () => {
      this.record('isProTier');
      return this.proTier;
    },
  };
}

/** Lab with three nodes, each with ports e0..e2 */
export function createFakeLab(): FakeLabApi {
  const api = new FakeLabApi();
  for (const id of [1, 2, 3]) {
    api.addNode(id, ['e0', 'e1', 'e2']);
  }
  return api;
}

export const LAB_PATH = '/tests/demo.unl';
