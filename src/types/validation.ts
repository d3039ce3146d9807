export type ValidationErrorKind =
  | 'REQUIRED'
  | 'TOO_SHORT'
  | 'TOO_LONG'
  | 'PATTERN_MISMATCH'
  | 'INVALID_VALUE'
  | 'OUT_OF_RANGE';

export interface ValidationError {
  field: string;
  message: string;
  kind: ValidationErrorKind;
}

export type ValidationOutcome =
  | { valid: true }
  | { valid: false; errors: ValidationError[] };

export const VALID: ValidationOutcome = { valid: true };

export const invalid = (errors: ValidationError[]): ValidationOutcome => ({
  valid: false,
  errors,
});
