/**
 * Sync error taxonomy.
 *
 * - NetworkUnavailableError: no link; the entity is not at fault, retry_count is untouched
 * - RemoteRequestError (+ ServerError, NotFoundError): the request reached the remote and failed
 * - AuthenticationError: propagated to the caller, never retried here
 * - MalformedResponseError: a nominal success the engine cannot trust
 * - CancelledError: the caller or the engine asked to stop; queue state is untouched
 */

export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkUnavailableError extends SyncError {
  constructor(message: string = 'Network is not available') {
    super(message);
  }
}

export class RemoteRequestError extends SyncError {
  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  /** Timeouts, throttling and gateway failures are worth another try. */
  get isTransient(): boolean {
    return this.status === null || TRANSIENT_STATUS_CODES.has(this.status);
  }
}

export class ServerError extends RemoteRequestError {}

export class NotFoundError extends RemoteRequestError {}

export class AuthenticationError extends SyncError {
  constructor(
    message: string = 'Authentication required',
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class MalformedResponseError extends SyncError {}

export class CancelledError extends SyncError {
  constructor(message: string = 'Operation was cancelled') {
    super(message);
  }
}

export const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

export function isCancellation(error: unknown): boolean {
  return error instanceof CancelledError || (error instanceof Error && error.name === 'AbortError');
}

/**
 * Errors the engine must not record against the entity or retry.
 */
export function isNonRetryable(error: unknown): boolean {
  return isCancellation(error) || error instanceof AuthenticationError || error instanceof NetworkUnavailableError;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Map an HTTP status to the matching error class.
 */
export function errorForStatus(status: number, message: string): SyncError {
  if (status === 401 || status === 403) {
    return new AuthenticationError(message || 'Unauthorized', status);
  }
  if (status === 404) {
    return new NotFoundError(message || 'Resource not found', status);
  }
  if (status === 400) {
    return new RemoteRequestError(message || 'Bad request', status);
  }
  if (status >= 500) {
    return new ServerError(message || 'Server error', status);
  }
  return new RemoteRequestError(message || `Request failed with status ${status}`, status);
}
