/**
 * Error taxonomy for task API calls
 *
 * Every failure surfaced by the client is a TaskApiError tagged with a
 * `kind`, so callers can tell a request that never left (validation), one
 * that got no answer (network) and one the server refused (not_found, server).
 */

export type TaskApiErrorKind = 'validation' | 'not_found' | 'server' | 'network';

export abstract class TaskApiError extends Error {
  abstract readonly kind: TaskApiErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rejected locally before any request was sent */
export class ValidationError extends TaskApiError {
  readonly kind = 'validation' as const;

  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message);
  }
}

export class NotFoundError extends TaskApiError {
  readonly kind = 'not_found' as const;
  readonly status = 404;
}

/** Non-2xx response (other than 404), or a 2xx body that does not parse */
export class ServerError extends TaskApiError {
  readonly kind = 'server' as const;

  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
  }
}

/** The request failed or timed out without a response */
export class NetworkError extends TaskApiError {
  readonly kind = 'network' as const;
}

export function isTaskApiError(value: unknown): value is TaskApiError {
  return value instanceof TaskApiError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
