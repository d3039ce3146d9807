import { ValidationError } from '../types/validation';

export type StoreErrorCode = 'NOT_FOUND' | 'IO';

/**
 * Failure reported by a JobStore or DraftStore. Stores return these inside
 * a Result instead of throwing.
 */
export class StoreError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly entity: string,
    public readonly code: StoreErrorCode = 'IO',
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

export type CoreErrorKind = 'NOT_FOUND' | 'VALIDATION' | 'STORE_FAILURE' | 'UNEXPECTED' | 'CANCELLED';

export abstract class CoreError extends Error {
  abstract readonly kind: CoreErrorKind;
  abstract readonly status: number;
}

export class NotFoundError extends CoreError {
  readonly kind = 'NOT_FOUND';
  readonly status = 404;

  constructor(
    public readonly entity: string,
    public readonly id: string
  ) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationFailedError extends CoreError {
  readonly kind = 'VALIDATION';
  readonly status = 400;

  constructor(public readonly errors: ValidationError[]) {
    super(errors.length > 0 ? errors[0].message : 'Validation failed');
    this.name = 'ValidationFailedError';
  }
}

export class StoreFailureError extends CoreError {
  readonly kind = 'STORE_FAILURE';
  readonly status = 502;

  constructor(public readonly storeError: StoreError) {
    super(storeError.message);
    this.name = 'StoreFailureError';
  }
}

export class UnexpectedError extends CoreError {
  readonly kind = 'UNEXPECTED';
  readonly status = 500;

  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'UnexpectedError';
  }
}

export class CancelledError extends CoreError {
  readonly kind = 'CANCELLED';
  readonly status = 499;

  constructor(operation: string) {
    super(`${operation} was cancelled`);
    this.name = 'CancelledError';
  }
}

export type CoreFailure =
  | NotFoundError
  | ValidationFailedError
  | StoreFailureError
  | UnexpectedError
  | CancelledError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
