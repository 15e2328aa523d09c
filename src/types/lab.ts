/**
 * Remote lab object model as seen through the lab API.
 */

export type NetworkVisibility = 'visible' | 'hidden';

export interface NodeInterface {
  name: string;
  /** Network this interface is plugged into, 0 when unbound */
  networkId: number;
}

/** Result of looking up a node interface by its port label */
export interface InterfaceLookup {
  index: number;
  iface: NodeInterface;
}

export interface LabNode {
  id: number;
  name: string;
  interfaces: NodeInterface[];
}

export interface LabNetwork {
  id: number;
  name: string;
  type: string;
  visibility: NetworkVisibility;
  left: number;
  top: number;
  icon: string;
}

/** Network payload for creation, the id is assigned remotely */
export type NetworkSpec = Omit<LabNetwork, 'id'>;

/**
 * One entry of the lab topology listing. The listing mixes links of every
 * kind, so entries are loosely typed attribute maps.
 */
export type TopologyEntry = Record<string, unknown>;

export type LinkLineStyle = 'Solid' | 'Dashed';
export type LinkConnector = 'Straight' | 'Bezier' | 'Flowchart' | 'StateMachine';

/** Link decoration attached to the target interface of a node-to-node link */
export interface LinkStyle {
  style: LinkLineStyle;
  color: string;
  srcpos: number;
  dstpos: number;
  linkstyle: LinkConnector;
  width: number;
  label: string;
  labelpos: number;
  stub: number;
  curviness: number;
  beziercurviness: number;
  round: number;
  midpoint: number;
}

/**
 * Style as observed on the remote side. An empty record means the topology
 * had no entry for the link, which is not the same as an all-defaults style.
 */
export type StyleSnapshot = LinkStyle | Record<string, never>;
