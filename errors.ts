/**
 * Error taxonomy for upstream data providers and composite calculations
 */

export type FetchErrorKind = 'NotFound' | 'RateLimited' | 'Transient' | 'Fatal';

export type DataSource = 'FRED' | 'Yahoo';

/**
 * Raised by the raw data clients. `kind` decides whether a retry is worthwhile.
 */
export class SeriesFetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly source: DataSource;
  readonly seriesId: string;
  readonly status?: number;

  constructor(
    kind: FetchErrorKind,
    source: DataSource,
    seriesId: string,
    message: string,
    status?: number,
  ) {
    super(message);
    this.name = 'SeriesFetchError';
    this.kind = kind;
    this.source = source;
    this.seriesId = seriesId;
    this.status = status;
  }
}

/**
 * A composite was requested but none of its components had data
 */
export class NoViableInputError extends Error {
  readonly requested: string[];

  constructor(requested: string[]) {
    super(`No components available for composite (requested: ${requested.join(', ') || 'none'})`);
    this.name = 'NoViableInputError';
    this.requested = requested;
  }
}

/**
 * The upstream call succeeded but returned no usable observations
 */
export class NoDataError extends Error {
  readonly seriesId: string;

  constructor(seriesId: string) {
    super(`No data received for ${seriesId}`);
    this.name = 'NoDataError';
    this.seriesId = seriesId;
  }
}

export class UnknownIndicatorError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Indicator '${key}' not found in registry`);
    this.name = 'UnknownIndicatorError';
    this.key = key;
  }
}

/**
 * Rate limits, timeouts, 5xx responses and bare network failures are retryable.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof SeriesFetchError) {
    return error.kind === 'RateLimited' || error.kind === 'Transient';
  }
  if (error instanceof Error) {
    return error.name === 'AbortError' || error.name === 'TimeoutError' || error.name === 'TypeError';
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
