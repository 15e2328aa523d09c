/**
 * HttpLabClient - LabApi over the lab server's JSON REST API
 *
 * Logs in lazily on the first call and replays the session cookie. Every
 * response is wrapped in `{ code, status, message, data }`; non-2xx
 * responses become RemoteApiError.
 */

import type { IOLogger } from '../io/types';
import { noopLogger } from '../io/types';
import type {
  InterfaceLookup,
  LabNetwork,
  LabNode,
  LinkStyle,
  NetworkSpec,
  NetworkVisibility,
  NodeInterface,
  TopologyEntry,
} from '../types/lab';
import { getInteger, getString, isRecord } from '../utilities/typeHelpers';
import type { CapabilityApi, LabApi, NetworkApi, NodeApi, TopologyApi } from './LabApi';
import type { LabClientConfig } from './config';
import { RemoteApiError } from './errors';

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface ApiEnvelope {
  message?: string;
  data?: unknown;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpLabClientOptions {
  config: LabClientConfig;
  logger?: IOLogger;
  /** Replaces the global fetch, mainly for tests */
  fetchFn?: FetchFn;
}

const PRO_VERSION_PATTERN = /\bpro\b/i;

async function readEnvelope(response: Response): Promise<ApiEnvelope> {
  const text = await response.text();
  if (text.trim() === '') return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { message: text };
  }
  if (!isRecord(parsed)) return { data: parsed };
  return { message: getString(parsed.message), data: parsed.data };
}

/**
 * Build the API path of a lab, encoding every segment of its file path.
 */
export function labUrl(labPath: string): string {
  const segments = labPath.split('/').filter((segment) => segment !== '');
  return `/api/labs/${segments.map(encodeURIComponent).join('/')}`;
}

function toVisibility(value: unknown): NetworkVisibility {
  return getInteger(value) === 0 ? 'hidden' : 'visible';
}

function parseNetwork(networkId: number, data: unknown): LabNetwork {
  const record = isRecord(data) ? data : {};
  return {
    id: getInteger(record.id) ?? networkId,
    name: getString(record.name) ?? '',
    type: getString(record.type) ?? '',
    visibility: toVisibility(record.visibility),
    left: getInteger(record.left) ?? 0,
    top: getInteger(record.top) ?? 0,
    icon: getString(record.icon) ?? '',
  };
}

function networkBody(network: NetworkSpec): Record<string, unknown> {
  return {
    name: network.name,
    type: network.type,
    left: network.left,
    top: network.top,
    icon: network.icon,
    visibility: network.visibility === 'hidden' ? '0' : '1',
  };
}

/**
 * Ethernet interfaces of a node in index order. The API returns them either
 * as an array or as an object keyed by index.
 */
export function parseEthernetInterfaces(data: unknown): InterfaceLookup[] {
  const ethernet = isRecord(data) ? data.ethernet : undefined;
  let entries: Array<[number, unknown]> = [];
  if (Array.isArray(ethernet)) {
    entries = ethernet.map((entry, index): [number, unknown] => [index, entry]);
  } else if (isRecord(ethernet)) {
    entries = Object.entries(ethernet)
      .map(([key, entry]): [number, unknown] => [getInteger(key) ?? -1, entry])
      .filter(([index]) => index >= 0);
  }

  return entries
    .filter((pair): pair is [number, Record<string, unknown>] => isRecord(pair[1]))
    .map(([index, entry]) => {
      const iface: NodeInterface = {
        name: getString(entry.name) ?? '',
        networkId: getInteger(entry.network_id) ?? 0,
      };
      return { index, iface };
    })
    .sort((a, b) => a.index - b.index);
}

export class HttpLabClient implements LabApi {
  readonly nodes: NodeApi;
  readonly networks: NetworkApi;
  readonly topology: TopologyApi;
  readonly capabilities: CapabilityApi;

  private readonly config: LabClientConfig;
  private readonly logger: IOLogger;
  private readonly fetchFn: FetchFn;
  private session: Promise<string> | undefined;
  private proTier: boolean | undefined;

  constructor(options: HttpLabClientOptions) {
    this.config = options.config;
    this.logger = options.logger ?? noopLogger;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));

    this.nodes = {
      getNode: (labPath, nodeId) => this.getNode(labPath, nodeId),
      getInterface: (labPath, nodeId, port) => this.getInterface(labPath, nodeId, port),
      updateInterfaceBinding: (labPath, nodeId, port, networkId) =>
        this.updateInterfaceBinding(labPath, nodeId, port, networkId),
      updateInterfaceStyle: (labPath, nodeId, port, style) => this.updateInterfaceStyle(labPath, nodeId, port, style),
    };
    this.networks = {
      getNetwork: (labPath, networkId) => this.getNetwork(labPath, networkId),
      createNetwork: (labPath, network) => this.createNetwork(labPath, network),
      updateNetwork: (labPath, network) => this.updateNetwork(labPath, network),
      deleteNetwork: (labPath, networkId) => this.deleteNetwork(labPath, networkId),
    };
    this.topology = {
      getTopology: (labPath) => this.getTopology(labPath),
    };
    this.capabilities = {
      isProTier: () => this.isProTier(),
    };
  }

  private async login(): Promise<string> {
    const response = await this.fetchFn(`${this.config.host}/api/auth/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ username: this.config.username, password: this.config.password, html5: '-1' }),
    });
    const envelope = await readEnvelope(response);
    if (!response.ok) {
      throw new RemoteApiError('login', response.status, envelope.message ?? response.statusText);
    }
    const cookie = response.headers.get('set-cookie') ?? '';
    this.logger.debug(`[HttpLabClient] Logged in to ${this.config.host} as ${this.config.username}`);
    return cookie.split(';')[0];
  }

  private async ensureSession(): Promise<string> {
    if (!this.session) {
      this.session = this.login();
    }
    try {
      return await this.session;
    } catch (err) {
      // let the next call retry the login
      this.session = undefined;
      throw err;
    }
  }

  private async request(operation: string, method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const cookie = await this.ensureSession();
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (cookie !== '') headers.Cookie = cookie;
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    this.logger.debug(`[HttpLabClient] ${method} ${path}`);
    const response = await this.fetchFn(`${this.config.host}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const envelope = await readEnvelope(response);
    if (!response.ok) {
      throw new RemoteApiError(operation, response.status, envelope.message ?? response.statusText);
    }
    return envelope.data;
  }

  private async listInterfaces(labPath: string, nodeId: number): Promise<InterfaceLookup[]> {
    const data = await this.request('getInterfaces', 'GET', `${labUrl(labPath)}/nodes/${nodeId}/interfaces`);
    return parseEthernetInterfaces(data);
  }

  async getNode(labPath: string, nodeId: number): Promise<LabNode> {
    const data = await this.request('getNode', 'GET', `${labUrl(labPath)}/nodes/${nodeId}`);
    const record = isRecord(data) ? data : {};
    const interfaces = await this.listInterfaces(labPath, nodeId);
    return {
      id: nodeId,
      name: getString(record.name) ?? '',
      interfaces: interfaces.map((entry) => entry.iface),
    };
  }

  async getInterface(labPath: string, nodeId: number, port: string): Promise<InterfaceLookup> {
    const interfaces = await this.listInterfaces(labPath, nodeId);
    const found = interfaces.find((entry) => entry.iface.name === port);
    if (!found) {
      throw new RemoteApiError('getInterface', 404, `interface ${port} not found on node ${nodeId}`);
    }
    return found;
  }

  async updateInterfaceBinding(labPath: string, nodeId: number, port: string, networkId: number): Promise<void> {
    const { index } = await this.getInterface(labPath, nodeId, port);
    await this.request('updateInterfaceBinding', 'PUT', `${labUrl(labPath)}/nodes/${nodeId}/interfaces`, {
      [String(index)]: networkId,
    });
  }

  async updateInterfaceStyle(labPath: string, nodeId: number, port: string, style: LinkStyle): Promise<void> {
    const { index } = await this.getInterface(labPath, nodeId, port);
    await this.request(
      'updateInterfaceStyle',
      'PUT',
      `${labUrl(labPath)}/nodes/${nodeId}/interfaces/${index}/style`,
      style
    );
  }

  async getNetwork(labPath: string, networkId: number): Promise<LabNetwork> {
    const data = await this.request('getNetwork', 'GET', `${labUrl(labPath)}/networks/${networkId}`);
    return parseNetwork(networkId, data);
  }

  async createNetwork(labPath: string, network: NetworkSpec): Promise<LabNetwork> {
    const data = await this.request('createNetwork', 'POST', `${labUrl(labPath)}/networks`, {
      ...networkBody(network),
      count: 1,
    });
    const id = isRecord(data) ? getInteger(data.id) : undefined;
    return { ...network, id: id ?? 0 };
  }

  async updateNetwork(labPath: string, network: LabNetwork): Promise<void> {
    await this.request('updateNetwork', 'PUT', `${labUrl(labPath)}/networks/${network.id}`, networkBody(network));
  }

  async deleteNetwork(labPath: string, networkId: number): Promise<void> {
    await this.request('deleteNetwork', 'DELETE', `${labUrl(labPath)}/networks/${networkId}`);
  }

  async getTopology(labPath: string): Promise<TopologyEntry[]> {
    const data = await this.request('getTopology', 'GET', `${labUrl(labPath)}/topology`);
    const entries: unknown[] = Array.isArray(data) ? data : isRecord(data) ? Object.values(data) : [];
    return entries.filter(isRecord);
  }

  async isProTier(): Promise<boolean> {
    if (this.proTier === undefined) {
      const data = await this.request('getStatus', 'GET', '/api/status');
      const version = isRecord(data) ? getString(data.version) ?? '' : '';
      this.proTier = PRO_VERSION_PATTERN.test(version);
      this.logger.debug(`[HttpLabClient] Server version ${version}, pro tier: ${this.proTier}`);
    }
    return this.proTier;
  }
}
