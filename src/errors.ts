export type CompletionErrorKind =
  | 'AuthError'
  | 'RateLimited'
  | 'MalformedResponse'
  | 'NetworkError'
  | 'RequestRejected';

export class StoreUnavailableError extends Error {
  readonly code = 'STORE_UNAVAILABLE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export class CompletionError extends Error {
  readonly code = 'COMPLETION_ERROR';

  constructor(
    public readonly kind: CompletionErrorKind,
    message: string,
    public readonly status?: number,
    /** Seconds, from a Retry-After header */
    public readonly retryAfter?: number,
  ) {
    super(message);
    this.name = 'CompletionError';
  }
}

export class SendFailureError extends Error {
  readonly code = 'SEND_FAILURE';

  constructor(
    public readonly peer: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SendFailureError';
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigInvalidError extends Error {
  readonly code = 'CONFIG_INVALID';

  constructor(public readonly issues: ConfigIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigInvalidError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
