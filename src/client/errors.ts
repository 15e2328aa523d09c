export class RemoteApiError extends Error {
  constructor(
    public readonly operation: string,
    public readonly status: number,
    message: string
  ) {
    super(`${operation} failed (${status}): ${message}`);
    this.name = 'RemoteApiError';
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof RemoteApiError && err.isNotFound;
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid lab API configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}
