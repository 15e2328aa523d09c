export type LinkErrorCode =
  | 'SELF_LINK'
  | 'CONFLICTING_TARGET'
  | 'INVALID_DECLARATION'
  | 'ZERO_NETWORK_ID'
  | 'SOURCE_NODE_MISSING'
  | 'TARGET_NODE_MISSING'
  | 'ENDPOINT_DRIFT';

export class LinkError extends Error {
  constructor(public readonly code: LinkErrorCode, message: string) {
    super(message);
    this.name = 'LinkError';
  }
}

export function isLinkError(err: unknown): err is LinkError {
  return err instanceof LinkError;
}
