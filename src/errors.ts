// src/errors.ts
// What: Error taxonomy for the recommender.
// How: One base class carrying a stable code and a recoverable flag. Recoverable errors are raised per modality
//      and turned into an empty ranking by the fusion engine; the rest reach the caller.

export type RecommenderErrorCode =
  | 'NO_SIGNAL'
  | 'STORE_UNAVAILABLE'
  | 'DIMENSION_MISMATCH'
  | 'CATALOG_UNAVAILABLE'
  | 'INVALID_REQUEST';

export class RecommenderError extends Error {
  readonly code: RecommenderErrorCode;
  readonly recoverable: boolean;
  constructor(code: RecommenderErrorCode, message: string, recoverable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecommenderError';
    this.code = code;
    this.recoverable = recoverable;
  }
}

/** The query vector is all zeros: the encoder produced nothing usable. */
export class NoSignalError extends RecommenderError {
  constructor(message = 'Query vector carries no signal') {
    super('NO_SIGNAL', message, true);
    this.name = 'NoSignalError';
  }
}

export class StoreUnavailableError extends RecommenderError {
  readonly modality: string;
  constructor(modality: string, message: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', message, true, options);
    this.name = 'StoreUnavailableError';
    this.modality = modality;
  }
}

export class DimensionMismatchError extends RecommenderError {
  constructor(expected: number, actual: number) {
    super('DIMENSION_MISMATCH', `Query vector has ${actual} dimensions, store has ${expected}`, true);
    this.name = 'DimensionMismatchError';
  }
}

/** Nothing to rank against; surfaced to the caller as a service error. */
export class CatalogUnavailableError extends RecommenderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CATALOG_UNAVAILABLE', message, false, options);
    this.name = 'CatalogUnavailableError';
  }
}

export class InvalidRequestError extends RecommenderError {
  constructor(message: string) {
    super('INVALID_REQUEST', message, false);
    this.name = 'InvalidRequestError';
  }
}

export function isRecoverable(err: unknown): err is RecommenderError {
  return err instanceof RecommenderError && err.recoverable;
}
