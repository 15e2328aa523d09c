/**
 * I/O for declared links and persisted link state
 */

export type { FileSystemAdapter, SaveResult, IOLogger } from './types';
export { noopLogger, ERROR_LINKS_NOT_MAP, ERROR_STATE_VERSION } from './types';

export { NodeFsAdapter, nodeFsAdapter } from './NodeFsAdapter';

export { deepEqual, writeYamlFile } from './YamlDocumentIO';

export { loadDeclarations, parseDeclarations, toDeclaration } from './DeclarationIO';
export type { DeclarationDoc, DeclaredLinks, EndpointDoc, LinkDoc } from './DeclarationIO';

export { LinkStateStore, STATE_VERSION, createStateDocument, parseState, stringifyState } from './LinkStateIO';
export type { LinkStateStoreOptions, LinkStates } from './LinkStateIO';
