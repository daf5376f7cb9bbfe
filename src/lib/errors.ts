/**
 * Request Failure Types
 * Classified failures raised by the request executor and the session controller
 */

export type TransientKind = 'rate-limit' | 'server-error' | 'connection' | 'unauthorized';

export type FatalKind =
  | 'unsupported-method'
  | 'unexpected-status'
  | 'invalid-response'
  | 'auth'
  | 'closed';

export type RequestFailure =
  | { type: 'transient'; kind: TransientKind; status?: number }
  | { type: 'fatal'; kind: FatalKind; detail: string; status?: number };

/**
 * Error carrying a classified request failure.
 * Transient failures are replayed by the retry wrapper; fatal ones never are.
 */
export class GraphRequestError extends Error {
  public readonly code: string;
  public readonly failure: RequestFailure;

  constructor(message: string, failure: RequestFailure, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GraphRequestError';
    this.failure = failure;
    this.code = failure.kind.toUpperCase().replace(/-/g, '_');
  }

  get status(): number | undefined {
    return this.failure.status;
  }

  get retryable(): boolean {
    return this.failure.type === 'transient';
  }

  static transient(
    kind: TransientKind,
    message: string,
    status?: number,
    cause?: unknown
  ): GraphRequestError {
    return new GraphRequestError(message, { type: 'transient', kind, status }, { cause });
  }

  static fatal(
    kind: FatalKind,
    detail: string,
    status?: number,
    cause?: unknown
  ): GraphRequestError {
    const message = status === undefined ? detail : `HTTP ${status}: ${detail}`;
    return new GraphRequestError(message, { type: 'fatal', kind, detail, status }, { cause });
  }
}

/**
 * Retry predicate: only transient request failures are replayed
 */
export function isTransientError(error: unknown): error is GraphRequestError {
  return error instanceof GraphRequestError && error.failure.type === 'transient';
}
