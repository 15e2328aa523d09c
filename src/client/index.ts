export type { CapabilityApi, LabApi, NetworkApi, NodeApi, TopologyApi } from './LabApi';
export { HttpLabClient, labUrl, parseEthernetInterfaces } from './HttpLabClient';
export type { FetchFn, HttpLabClientOptions } from './HttpLabClient';
export { ENV_HOST, ENV_PASSWORD, ENV_USER, loadClientConfig } from './config';
export type { LabClientConfig } from './config';
export { ConfigError, RemoteApiError, isNotFound } from './errors';
