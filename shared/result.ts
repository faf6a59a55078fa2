import {
  NoDataError,
  NoViableInputError,
  SeriesFetchError,
  UnknownIndicatorError,
  errorMessage,
  type FetchErrorKind,
} from '../errors.js';

/**
 * Outcome kinds surfaced to consumers. Fetch kinds come straight from the
 * clients; the rest are produced by the service layer.
 */
export type OutcomeErrorKind = FetchErrorKind | 'NoData' | 'NoViableInput' | 'UnknownIndicator' | 'Internal';

export interface OutcomeError {
  kind: OutcomeErrorKind;
  message: string;
}

/**
 * A piece of a multi-series result that could not be produced
 */
export interface Issue {
  component: string;
  kind: OutcomeErrorKind;
  message: string;
}

export type AvailableOutcome<T> =
  | { status: 'ok'; data: T }
  | { status: 'degraded'; data: T; issues: Issue[] };

export type Outcome<T> = AvailableOutcome<T> | { status: 'failed'; error: OutcomeError };

export const ok = <T>(data: T): AvailableOutcome<T> => ({ status: 'ok', data });

/**
 * Degrades only when something was actually lost
 */
export const withIssues = <T>(data: T, issues: Issue[]): AvailableOutcome<T> =>
  issues.length > 0 ? { status: 'degraded', data, issues } : { status: 'ok', data };

export const failed = (error: OutcomeError): { status: 'failed'; error: OutcomeError } => ({
  status: 'failed',
  error,
});

export function toOutcomeError(error: unknown): OutcomeError {
  if (error instanceof SeriesFetchError) return { kind: error.kind, message: error.message };
  if (error instanceof NoViableInputError) return { kind: 'NoViableInput', message: error.message };
  if (error instanceof NoDataError) return { kind: 'NoData', message: error.message };
  if (error instanceof UnknownIndicatorError) return { kind: 'UnknownIndicator', message: error.message };
  return { kind: 'Internal', message: errorMessage(error) };
}

export function toIssue(component: string, error: unknown): Issue {
  return { component, ...toOutcomeError(error) };
}
