/**
 * LinkStateIO - persisted link records
 *
 * The state file keeps what the last pass established for every named link
 * so the next pass can re-derive each link's shape without asking the lab:
 *
 * ```yaml
 * version: 1
 * links:
 *   r1-r2:
 *     lab: /folder/lab.unl
 *     networkId: 7
 *     source: { node: 1, port: e0 }
 *     target: { node: 2, port: e0 }
 * ```
 */

import * as YAML from 'yaml';

import stateSchema from '../../schema/link-state.schema.json';
import type { LinkStyle } from '../types/lab';
import type { EndpointRef, LinkState } from '../types/links';
import { createAjv, formatSchemaErrors } from '../utilities/schemaValidation';
import type { EndpointDoc } from './DeclarationIO';
import type { FileSystemAdapter, IOLogger, SaveResult } from './types';
import { ERROR_LINKS_NOT_MAP, ERROR_STATE_VERSION, noopLogger } from './types';
import { writeYamlFile } from './YamlDocumentIO';

export const STATE_VERSION = 1;

interface StateRecordDoc {
  lab: string;
  networkId: number | null;
  source: EndpointDoc;
  target?: EndpointDoc;
  style?: Partial<LinkStyle>;
}

interface StateDoc {
  version: number;
  links: Record<string, StateRecordDoc>;
}

/** Persisted records keyed by link name */
export type LinkStates = Record<string, LinkState>;

const validateState = createAjv().compile<StateDoc>(stateSchema);

function toEndpoint(doc: EndpointDoc): EndpointRef {
  return { nodeId: doc.node, port: doc.port };
}

function isFullStyle(style: Partial<LinkStyle>): style is LinkStyle {
  const required: Array<keyof LinkStyle> = [
    'style', 'color', 'srcpos', 'dstpos', 'linkstyle', 'width', 'label',
    'labelpos', 'stub', 'curviness', 'beziercurviness', 'round', 'midpoint',
  ];
  return required.every((key) => style[key] !== undefined);
}

function toState(doc: StateRecordDoc): LinkState {
  const state: LinkState = {
    labPath: doc.lab,
    networkId: doc.networkId,
    source: toEndpoint(doc.source),
  };
  if (doc.target) state.target = toEndpoint(doc.target);
  if (doc.style) state.style = isFullStyle(doc.style) ? { ...doc.style } : {};
  return state;
}

/**
 * Parse state file content. Empty content is an empty state.
 */
export function parseState(content: string): LinkStates {
  const parsed: unknown = YAML.parse(content);
  if (parsed === null || parsed === undefined) return {};

  if (!validateState(parsed)) {
    const errors = validateState.errors ?? [];
    if (errors.some((err) => err.instancePath === '/version')) {
      throw new Error(`${ERROR_STATE_VERSION}: expected ${STATE_VERSION}`);
    }
    if (errors.some((err) => err.instancePath === '/links' && err.keyword === 'type')) {
      throw new Error(ERROR_LINKS_NOT_MAP);
    }
    throw new Error(`Invalid link state: ${formatSchemaErrors(errors)}`);
  }

  const states: LinkStates = {};
  for (const [name, record] of Object.entries(parsed.links)) {
    states[name] = toState(record);
  }
  return states;
}

function createEndpointNode(doc: YAML.Document, endpoint: EndpointRef): YAML.YAMLMap {
  const map = new YAML.YAMLMap();
  map.flow = true;
  map.set('node', doc.createNode(endpoint.nodeId));
  map.set('port', doc.createNode(endpoint.port));
  return map;
}

function createRecordNode(doc: YAML.Document, state: LinkState): YAML.YAMLMap {
  const map = new YAML.YAMLMap();
  map.set('lab', doc.createNode(state.labPath));
  map.set('networkId', doc.createNode(state.networkId));
  map.set('source', createEndpointNode(doc, state.source));
  if (state.target) {
    map.set('target', createEndpointNode(doc, state.target));
  }
  if (state.style) {
    // an empty style is kept as {} so it reads back as empty, not absent
    map.set('style', doc.createNode({ ...state.style }));
  }
  return map;
}

/**
 * Build the YAML document for a set of link records, sorted by name.
 */
export function createStateDocument(states: LinkStates): YAML.Document {
  const doc = new YAML.Document();
  const links = new YAML.YAMLMap();
  for (const name of Object.keys(states).sort()) {
    links.set(name, createRecordNode(doc, states[name]));
  }
  const root = new YAML.YAMLMap();
  root.set('version', doc.createNode(STATE_VERSION));
  root.set('links', links);
  doc.contents = root;
  return doc;
}

export function stringifyState(states: LinkStates): string {
  return createStateDocument(states).toString();
}

export interface LinkStateStoreOptions {
  fs: FileSystemAdapter;
  filePath: string;
  logger?: IOLogger;
}

/**
 * Loads and saves the state file through a FileSystemAdapter.
 */
export class LinkStateStore {
  private readonly fs: FileSystemAdapter;
  private readonly filePath: string;
  private readonly logger: IOLogger;

  constructor(options: LinkStateStoreOptions) {
    this.fs = options.fs;
    this.filePath = options.filePath;
    this.logger = options.logger ?? noopLogger;
  }

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * A missing state file is an empty state.
   */
  async load(): Promise<LinkStates> {
    if (!(await this.fs.exists(this.filePath))) {
      this.logger.debug(`[LinkState] ${this.filePath} does not exist yet`);
      return {};
    }
    const content = await this.fs.readFile(this.filePath);
    return parseState(content);
  }

  async save(states: LinkStates): Promise<SaveResult> {
    return writeYamlFile(createStateDocument(states), this.filePath, this.fs, this.logger);
  }
}
