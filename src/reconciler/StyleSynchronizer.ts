/**
 * Projects link decoration onto the target interface of a node-to-node link
 * and reads it back from the lab topology listing.
 *
 * Only available on the Pro tier of the remote system. There is no
 * per-interface style query, so read-back scans the topology for the entry
 * whose source is the target node and whose label is the target port.
 */

import type { LabApi } from '../client/LabApi';
import type { IOLogger } from '../io/types';
import { noopLogger } from '../io/types';
import type { LinkConnector, LinkLineStyle, LinkStyle, StyleSnapshot, TopologyEntry } from '../types/lab';
import type { EndpointRef } from '../types/links';
import { getInteger, getNumeric, getString } from '../utilities/typeHelpers';
import { formatEndpoint } from './EndpointResolver';

export const DEFAULT_LINK_STYLE: Readonly<LinkStyle> = {
  style: 'Solid',
  color: '#3e7089',
  srcpos: 0.15,
  dstpos: 0.85,
  linkstyle: 'Straight',
  width: 2,
  label: '',
  labelpos: 0.5,
  stub: 0,
  curviness: 10,
  beziercurviness: 150,
  round: 0,
  midpoint: 0.5,
};

export const LINE_STYLES: readonly LinkLineStyle[] = ['Solid', 'Dashed'];
export const CONNECTORS: readonly LinkConnector[] = ['Straight', 'Bezier', 'Flowchart', 'StateMachine'];

function isLineStyle(value: unknown): value is LinkLineStyle {
  return typeof value === 'string' && (LINE_STYLES as readonly string[]).includes(value);
}

function isConnector(value: unknown): value is LinkConnector {
  return typeof value === 'string' && (CONNECTORS as readonly string[]).includes(value);
}

/**
 * Fill every field the declaration left out with its default.
 */
export function withStyleDefaults(style: Partial<LinkStyle>): LinkStyle {
  return { ...DEFAULT_LINK_STYLE, ...style };
}

export function isEmptyStyle(style: StyleSnapshot): style is Record<string, never> {
  return Object.keys(style).length === 0;
}

/** Identifier the topology listing uses for a node */
export function topologyNodeId(nodeId: number): string {
  return `node${nodeId}`;
}

/**
 * Parse a topology entry into a style, applying the default of each field
 * that is missing, empty or unparsable.
 */
export function parseTopologyStyle(entry: TopologyEntry): LinkStyle {
  const d = DEFAULT_LINK_STYLE;
  const color = getString(entry.color);
  return {
    style: isLineStyle(entry.style) ? entry.style : d.style,
    color: color !== undefined && color !== '' ? color : d.color,
    srcpos: getNumeric(entry.srcpos) ?? d.srcpos,
    dstpos: getNumeric(entry.dstpos) ?? d.dstpos,
    linkstyle: isConnector(entry.linkstyle) ? entry.linkstyle : d.linkstyle,
    width: getInteger(entry.width) ?? d.width,
    label: getString(entry.label) ?? d.label,
    labelpos: getNumeric(entry.labelpos) ?? d.labelpos,
    stub: getInteger(entry.stub) ?? d.stub,
    curviness: getInteger(entry.curviness) ?? d.curviness,
    beziercurviness: getInteger(entry.beziercurviness) ?? d.beziercurviness,
    round: getInteger(entry.round) ?? d.round,
    midpoint: getNumeric(entry.midpoint) ?? d.midpoint,
  };
}

/**
 * Find the topology entry describing the link that ends on target.
 */
export function findTargetEntry(topology: TopologyEntry[], target: EndpointRef): TopologyEntry | undefined {
  const source = topologyNodeId(target.nodeId);
  return topology.find(
    (entry) => getString(entry.source) === source && getString(entry.source_label) === target.port
  );
}

export class StyleSynchronizer {
  constructor(
    private readonly api: Pick<LabApi, 'nodes' | 'topology' | 'capabilities'>,
    private readonly logger: IOLogger = noopLogger
  ) {}

  async isEnabled(): Promise<boolean> {
    return this.api.capabilities.isProTier();
  }

  /**
   * Write the declared style (with defaults) to the target interface.
   * Decoration never fails a reconciliation pass, errors are logged.
   */
  async write(labPath: string, target: EndpointRef, style: Partial<LinkStyle>): Promise<boolean> {
    try {
      await this.api.nodes.updateInterfaceStyle(labPath, target.nodeId, target.port, withStyleDefaults(style));
      this.logger.debug(`[Style] Updated style of ${formatEndpoint(target)}`);
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`[Style] Failed to update style of ${formatEndpoint(target)}: ${message}`);
      return false;
    }
  }

  /**
   * Read the style in effect for the link ending on target. Returns the
   * empty style when the topology has no matching entry or cannot be read.
   */
  async read(labPath: string, target: EndpointRef): Promise<StyleSnapshot> {
    let topology: TopologyEntry[];
    try {
      topology = await this.api.topology.getTopology(labPath);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`[Style] Failed to get topology of ${labPath}: ${message}`);
      return {};
    }

    const entry = findTargetEntry(topology, target);
    if (!entry) {
      this.logger.debug(`[Style] No topology entry for ${formatEndpoint(target)}`);
      return {};
    }
    return parseTopologyStyle(entry);
  }
}
