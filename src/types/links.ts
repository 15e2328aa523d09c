import type { LinkStyle, StyleSnapshot } from './lab';
import type { LinkError } from '../reconciler/errors';

export type LinkShape = 'node-to-network' | 'node-to-node';

export interface EndpointRef {
  nodeId: number;
  port: string;
}

/** A link as the user declares it */
export interface LinkDeclaration {
  labPath: string;
  source: EndpointRef;
  /** Peer interface, mutually exclusive with networkId */
  target?: EndpointRef;
  /** User-owned network to plug the source into */
  networkId?: number;
  style?: Partial<LinkStyle>;
}

/**
 * Persisted record of a reconciled link.
 * networkId is null while the network in effect is not yet known.
 */
export interface LinkState {
  labPath: string;
  networkId: number | null;
  source: EndpointRef;
  target?: EndpointRef;
  style?: StyleSnapshot;
}

export type LinkReadResult =
  | { kind: 'present'; state: LinkState }
  | { kind: 'drifted'; state: LinkState; error: LinkError }
  | { kind: 'gone' };

export function shapeOfState(state: LinkState): LinkShape {
  return state.target ? 'node-to-node' : 'node-to-network';
}
