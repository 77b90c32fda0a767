export const ERROR_KINDS = [
  'TransientSourceError',
  'QuotaExceededError',
  'PermanentItemError',
  'SourceRejectedError',
  'StoreUnavailableError',
  'TimeoutError',
  'UnexpectedError',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

abstract class IngestionError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeout, 5xx or network failure. Worth retrying. */
export class TransientSourceError extends IngestionError {
  readonly kind = 'TransientSourceError';
}

/** The source's API quota is spent; stop using it for the rest of the run. */
export class QuotaExceededError extends IngestionError {
  readonly kind = 'QuotaExceededError';
}

/** One malformed or unsupported item. Skip it and keep going. */
export class PermanentItemError extends IngestionError {
  readonly kind = 'PermanentItemError';
}

/** Missing credentials or a request the source refuses outright. */
export class SourceRejectedError extends IngestionError {
  readonly kind = 'SourceRejectedError';
}

export class StoreUnavailableError extends IngestionError {
  readonly kind = 'StoreUnavailableError';
}

export class RunTimeoutError extends IngestionError {
  readonly kind = 'TimeoutError';

  constructor(readonly deadlineMs: number) {
    super(`Run exceeded its deadline of ${deadlineMs}ms`);
  }
}

export function errorKind(err: unknown): ErrorKind {
  return err instanceof IngestionError ? err.kind : 'UnexpectedError';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
