import { ValidationErrorKind, ValidationOutcome, VALID, invalid } from '../../types/validation';

const EMAIL_REGEX =
  /^[a-zA-Z0-9+._%-]{1,256}@[a-zA-Z0-9][a-zA-Z0-9-]{0,64}(\.[a-zA-Z0-9][a-zA-Z0-9-]{0,25})+$/;

export type StringRule =
  | { kind: 'notEmpty'; errorMessage: string }
  | { kind: 'minLength'; length: number; errorMessage: string }
  | { kind: 'maxLength'; length: number; errorMessage: string }
  | { kind: 'pattern'; regex: RegExp; errorMessage: string }
  | { kind: 'email'; errorMessage: string };

export type NumberRule =
  | { kind: 'minimum'; min: number; errorMessage: string }
  | { kind: 'maximum'; max: number; errorMessage: string }
  | { kind: 'range'; min: number; max: number; errorMessage: string };

export interface CustomRule<T> {
  kind: 'custom';
  predicate: (value: T) => boolean;
  errorMessage: string;
  errorKind: ValidationErrorKind;
}

export type Rule<T> = StringRule | NumberRule | CustomRule<T>;

/** Rules that make sense for a value of type T. */
export type RuleFor<T> =
  | CustomRule<T>
  | (T extends string ? StringRule : never)
  | (T extends number ? NumberRule : never);

export type RuleCheck =
  | { passed: true }
  | { passed: false; message: string; kind: ValidationErrorKind };

export const rules = {
  notEmpty: (errorMessage = 'Field cannot be empty'): StringRule => ({
    kind: 'notEmpty',
    errorMessage,
  }),

  minLength: (length: number, errorMessage = `Minimum length is ${length} characters`): StringRule => ({
    kind: 'minLength',
    length,
    errorMessage,
  }),

  maxLength: (length: number, errorMessage = `Maximum length is ${length} characters`): StringRule => ({
    kind: 'maxLength',
    length,
    errorMessage,
  }),

  // global/sticky flags would make `test` depend on lastIndex
  pattern: (regex: RegExp, errorMessage: string): StringRule => ({
    kind: 'pattern',
    regex: new RegExp(regex.source, regex.flags.replace(/[gy]/g, '')),
    errorMessage,
  }),

  email: (errorMessage = 'Invalid email address'): StringRule => ({
    kind: 'email',
    errorMessage,
  }),

  minimum: (min: number, errorMessage = `Value must be at least ${min}`): NumberRule => ({
    kind: 'minimum',
    min,
    errorMessage,
  }),

  maximum: (max: number, errorMessage = `Value must be at most ${max}`): NumberRule => ({
    kind: 'maximum',
    max,
    errorMessage,
  }),

  range: (min: number, max: number, errorMessage = `Value must be between ${min} and ${max}`): NumberRule => ({
    kind: 'range',
    min,
    max,
    errorMessage,
  }),

  custom: <T>(
    predicate: (value: T) => boolean,
    errorMessage: string,
    errorKind: ValidationErrorKind = 'INVALID_VALUE'
  ): CustomRule<T> => ({
    kind: 'custom',
    predicate,
    errorMessage,
    errorKind,
  }),
};

const passed: RuleCheck = { passed: true };

const check = (ok: boolean, message: string, kind: ValidationErrorKind): RuleCheck =>
  ok ? passed : { passed: false, message, kind };

/**
 * Evaluate a single rule. String and number rules fail on a value of the
 * wrong runtime type.
 */
export function checkRule<T>(rule: Rule<T>, value: T): RuleCheck {
  switch (rule.kind) {
    case 'notEmpty':
      return check(typeof value === 'string' && value.trim().length > 0, rule.errorMessage, 'REQUIRED');
    case 'minLength':
      return check(typeof value === 'string' && value.length >= rule.length, rule.errorMessage, 'TOO_SHORT');
    case 'maxLength':
      return check(typeof value === 'string' && value.length <= rule.length, rule.errorMessage, 'TOO_LONG');
    case 'pattern':
      return check(typeof value === 'string' && rule.regex.test(value), rule.errorMessage, 'PATTERN_MISMATCH');
    case 'email':
      return check(typeof value === 'string' && EMAIL_REGEX.test(value), rule.errorMessage, 'PATTERN_MISMATCH');
    case 'minimum':
      return check(typeof value === 'number' && value >= rule.min, rule.errorMessage, 'OUT_OF_RANGE');
    case 'maximum':
      return check(typeof value === 'number' && value <= rule.max, rule.errorMessage, 'OUT_OF_RANGE');
    case 'range':
      return check(
        typeof value === 'number' && value >= rule.min && value <= rule.max,
        rule.errorMessage,
        'OUT_OF_RANGE'
      );
    case 'custom':
      return check(rule.predicate(value), rule.errorMessage, rule.errorKind);
  }
}

/**
 * Ordered rule list for one field. Evaluation stops at the first failing
 * rule so the field reports its most specific problem only.
 */
export class Validator<T> {
  private readonly rules: Rule<T>[] = [];

  constructor(public readonly field: string) {}

  addRule(rule: RuleFor<T>): this {
    this.rules.push(rule);
    return this;
  }

  validate(value: T): ValidationOutcome {
    for (const rule of this.rules) {
      const result = checkRule(rule, value);
      if (!result.passed) {
        return invalid([{ field: this.field, message: result.message, kind: result.kind }]);
      }
    }
    return VALID;
  }
}

/**
 * Run validations for the same field in order and return the first failure.
 */
export const firstFailure = (...steps: Array<() => ValidationOutcome>): ValidationOutcome => {
  for (const step of steps) {
    const outcome = step();
    if (!outcome.valid) return outcome;
  }
  return VALID;
};
