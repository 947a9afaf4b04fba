/**
 * Error taxonomy shared by the fetchers and the discovery flow
 */

/** Timeout, connection reset or refused. Safe to retry. */
export class TransientNetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientNetworkError';
  }
}

/** The upstream answered, but with an error status or a body we cannot use. Never retried. */
export class UpstreamError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamError';
    this.status = status;
  }
}

export class MatchPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MatchPreconditionError';
  }
}

export function isTransientError(err: unknown): boolean {
  return err instanceof TransientNetworkError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
