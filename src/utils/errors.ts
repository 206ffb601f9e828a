export type PipelineErrorKind = 'config' | 'auth' | 'fetch' | 'not_found' | 'transport' | 'parse';

/**
 * Base class for every failure the talent pipeline classifies.
 * `kind` is what the coordinator branches on; `message` is safe to show to a client.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Upstream credentials are not configured. */
export class ConfigError extends PipelineError {
  readonly kind = 'config' as const;
}

/** Token exchange failed, or the API rejected the bearer token. */
export class AuthError extends PipelineError {
  readonly kind = 'auth' as const;

  constructor(
    message: string,
    readonly status?: number,
    readonly body?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Rankings query failed or came back without a rankings array. */
export class FetchError extends PipelineError {
  readonly kind = 'fetch' as const;
}

/** Actor or talent code absent for a report/fight. */
export class NotFoundError extends PipelineError {
  readonly kind = 'not_found' as const;
}

/** HTTP-level failure: network error, timeout or non-2xx status. */
export class TransportError extends PipelineError {
  readonly kind = 'transport' as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Response body was not JSON or lacked an expected field. */
export class ParseError extends PipelineError {
  readonly kind = 'parse' as const;
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Tagged outcome of one pipeline stage. */
export type StageResult<T, E extends PipelineError = PipelineError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): StageResult<T, never> {
  return { ok: true, value };
}

export function fail<E extends PipelineError>(error: E): StageResult<never, E> {
  return { ok: false, error };
}

export function truncateBody(body: string, maxChars = 200): string {
  return body.length <= maxChars ? body : `${body.slice(0, maxChars)}…`;
}
