export * from './client';
export * from './io';
export * from './reconciler';
export { LinkService, isInSync } from './services/linkService';
export type {
  ApplyReport,
  DriftReport,
  LinkAction,
  LinkServiceOptions,
  PlannedChange,
} from './services/linkService';
export { log, setLogLevel, getLogLevel } from './logging/logger';
export type { LogLevel } from './logging/loggerUtils';
export type {
  InterfaceLookup,
  LabNetwork,
  LabNode,
  LinkConnector,
  LinkLineStyle,
  LinkStyle,
  NetworkSpec,
  NetworkVisibility,
  NodeInterface,
  StyleSnapshot,
  TopologyEntry,
} from './types/lab';
export type { EndpointRef, LinkDeclaration, LinkReadResult, LinkShape, LinkState } from './types/links';
export { shapeOfState } from './types/links';
