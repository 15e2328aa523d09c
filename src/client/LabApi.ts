/**
 * Operations consumed from the remote lab system.
 *
 * Every call is awaited before the next one starts; implementations throw
 * RemoteApiError on failure.
 */
import type {
  InterfaceLookup,
  LabNetwork,
  LabNode,
  LinkStyle,
  NetworkSpec,
  TopologyEntry,
} from '../types/lab';

export interface NodeApi {
  getNode(labPath: string, nodeId: number): Promise<LabNode>;
  getInterface(labPath: string, nodeId: number, port: string): Promise<InterfaceLookup>;
  /** Plug the interface into networkId, 0 unplugs it */
  updateInterfaceBinding(labPath: string, nodeId: number, port: string, networkId: number): Promise<void>;
  updateInterfaceStyle(labPath: string, nodeId: number, port: string, style: LinkStyle): Promise<void>;
}

export interface NetworkApi {
  getNetwork(labPath: string, networkId: number): Promise<LabNetwork>;
  createNetwork(labPath: string, network: NetworkSpec): Promise<LabNetwork>;
  updateNetwork(labPath: string, network: LabNetwork): Promise<void>;
  deleteNetwork(labPath: string, networkId: number): Promise<void>;
}

export interface TopologyApi {
  getTopology(labPath: string): Promise<TopologyEntry[]>;
}

export interface CapabilityApi {
  isProTier(): Promise<boolean>;
}

export interface LabApi {
  nodes: NodeApi;
  networks: NetworkApi;
  topology: TopologyApi;
  capabilities: CapabilityApi;
}
