/**
 * Validates a link declaration and decides its shape before any remote call.
 */

import type { LinkStyle } from '../types/lab';
import type { EndpointRef, LinkDeclaration } from '../types/links';
import { LinkError } from './errors';

export interface ResolvedBase {
  labPath: string;
  source: EndpointRef;
  style?: Partial<LinkStyle>;
}

export interface ResolvedNetworkLink extends ResolvedBase {
  shape: 'node-to-network';
  networkId: number;
}

export interface ResolvedNodeLink extends ResolvedBase {
  shape: 'node-to-node';
  target: EndpointRef;
}

export type ResolvedLink = ResolvedNetworkLink | ResolvedNodeLink;

function checkEndpoint(role: string, endpoint: EndpointRef): void {
  if (!Number.isInteger(endpoint.nodeId) || endpoint.nodeId <= 0) {
    throw new LinkError('INVALID_DECLARATION', `${role} node id must be a positive integer, got ${endpoint.nodeId}`);
  }
  if (endpoint.port.trim() === '') {
    throw new LinkError('INVALID_DECLARATION', `${role} port must not be empty`);
  }
}

export function formatEndpoint(endpoint: EndpointRef): string {
  return `node${endpoint.nodeId}:${endpoint.port}`;
}

export function sameEndpoint(a: EndpointRef | undefined, b: EndpointRef | undefined): boolean {
  if (!a || !b) return a === b;
  return a.nodeId === b.nodeId && a.port === b.port;
}

/**
 * Resolve the shape of a declared link.
 *
 * @throws LinkError CONFLICTING_TARGET, SELF_LINK or INVALID_DECLARATION
 */
export function resolveLink(decl: LinkDeclaration): ResolvedLink {
  const { labPath, source, target, networkId, style } = decl;

  if (target && networkId !== undefined) {
    throw new LinkError(
      'CONFLICTING_TARGET',
      `link from ${formatEndpoint(source)} declares both a target endpoint and network ${networkId}`
    );
  }
  if (target && target.nodeId === source.nodeId) {
    throw new LinkError('SELF_LINK', `cannot link node ${source.nodeId} to itself`);
  }
  if (labPath.trim() === '') {
    throw new LinkError('INVALID_DECLARATION', 'lab path must not be empty');
  }
  checkEndpoint('source', source);

  if (target) {
    checkEndpoint('target', target);
    return { shape: 'node-to-node', labPath, source, target, style };
  }
  if (networkId === undefined) {
    throw new LinkError(
      'INVALID_DECLARATION',
      `link from ${formatEndpoint(source)} declares neither a target endpoint nor a network`
    );
  }
  return { shape: 'node-to-network', labPath, source, networkId, style };
}
