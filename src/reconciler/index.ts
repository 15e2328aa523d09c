export { LinkReconciler } from './LinkReconciler';
export type { LinkReconcilerOptions } from './LinkReconciler';
export { formatEndpoint, resolveLink, sameEndpoint } from './EndpointResolver';
export type { ResolvedLink, ResolvedNetworkLink, ResolvedNodeLink } from './EndpointResolver';
export { InterfaceBinder, UNBOUND_NETWORK_ID } from './InterfaceBinder';
export {
  ImplicitNetworkManager,
  IMPLICIT_NETWORK_ICON,
  IMPLICIT_NETWORK_TYPE,
  syntheticNetworkName,
} from './ImplicitNetworkManager';
export {
  StyleSynchronizer,
  DEFAULT_LINK_STYLE,
  findTargetEntry,
  isEmptyStyle,
  parseTopologyStyle,
  withStyleDefaults,
} from './StyleSynchronizer';
export { LinkError, isLinkError } from './errors';
export type { LinkErrorCode } from './errors';
