import { describe, it, expect, vi } from 'vitest';
import { Validator, checkRule, firstFailure, rules } from './validation.rules';
import { VALID, invalid } from '../../types/validation';

// ============================================================================
// Single rules
// ============================================================================

describe('checkRule', () => {
  it('should reject blank strings with notEmpty', () => {
    expect(checkRule(rules.notEmpty(), '   ')).toEqual({
      passed: false,
      message: 'Field cannot be empty',
      kind: 'REQUIRED',
    });
  });

  it('should report length rules with their default messages', () => {
    expect(checkRule(rules.minLength(3), 'ab')).toEqual({
      passed: false,
      message: 'Minimum length is 3 characters',
      kind: 'TOO_SHORT',
    });
    expect(checkRule(rules.maxLength(5), 'abcdef')).toEqual({
      passed: false,
      message: 'Maximum length is 5 characters',
      kind: 'TOO_LONG',
    });
    expect(checkRule(rules.maxLength(5), 'abcde')).toEqual({ passed: true });
  });

  it('should give the same answer for a global pattern on repeated checks', () => {
    const rule = rules.pattern(/^a+$/g, 'Only the letter a');
    expect(checkRule(rule, 'aaa')).toEqual({ passed: true });
    expect(checkRule(rule, 'aaa')).toEqual({ passed: true });
    expect(checkRule(rule, 'abc')).toEqual({
      passed: false,
      message: 'Only the letter a',
      kind: 'PATTERN_MISMATCH',
    });
  });

  it('should validate email addresses', () => {
    expect(checkRule(rules.email(), 'hiring@example.com')).toEqual({ passed: true });
    expect(checkRule(rules.email(), 'not-an-email')).toEqual({
      passed: false,
      message: 'Invalid email address',
      kind: 'PATTERN_MISMATCH',
    });
  });

  it('should check numeric bounds inclusively', () => {
    expect(checkRule(rules.minimum(1), 1)).toEqual({ passed: true });
    expect(checkRule(rules.maximum(10), 10)).toEqual({ passed: true });
    expect(checkRule(rules.minimum(1), 0)).toEqual({
      passed: false,
      message: 'Value must be at least 1',
      kind: 'OUT_OF_RANGE',
    });
    expect(checkRule(rules.range(1, 10), 11)).toEqual({
      passed: false,
      message: 'Value must be between 1 and 10',
      kind: 'OUT_OF_RANGE',
    });
  });

  it('should fail a string rule applied to a number', () => {
    expect(checkRule(rules.minLength(2), 42)).toEqual({
      passed: false,
      message: 'Minimum length is 2 characters',
      kind: 'TOO_SHORT',
    });
  });

  it('should default custom rules to INVALID_VALUE', () => {
    const rule = rules.custom((value: number) => value % 2 === 0, 'Must be even');
    expect(checkRule(rule, 3)).toEqual({ passed: false, message: 'Must be even', kind: 'INVALID_VALUE' });
  });
});

// ============================================================================
// Validator
// ============================================================================

describe('Validator', () => {
  it('should stop at the first failing rule', () => {
    const later = vi.fn((value: string) => value.startsWith('x'));
    const validator = new Validator<string>('code')
      .addRule(rules.notEmpty('Code is required'))
      .addRule(rules.custom(later, 'Code must start with x'));

    expect(validator.validate('')).toEqual(
      invalid([{ field: 'code', message: 'Code is required', kind: 'REQUIRED' }])
    );
    expect(later).not.toHaveBeenCalled();
  });

  it('should report the field name on every error', () => {
    const validator = new Validator<number>('headcount').addRule(rules.maximum(50, 'Too many'));
    expect(validator.validate(51)).toEqual(
      invalid([{ field: 'headcount', message: 'Too many', kind: 'OUT_OF_RANGE' }])
    );
  });

  it('should be valid when every rule passes', () => {
    const validator = new Validator<string>('code').addRule(rules.notEmpty()).addRule(rules.maxLength(4));
    expect(validator.validate('x12')).toEqual(VALID);
  });
});

describe('firstFailure', () => {
  it('should return the first failing outcome and skip the rest', () => {
    const last = vi.fn(() => VALID);
    const failure = invalid([{ field: 'a', message: 'bad', kind: 'INVALID_VALUE' }]);

    expect(firstFailure(() => VALID, () => failure, last)).toBe(failure);
    expect(last).not.toHaveBeenCalled();
  });

  it('should be valid when nothing fails', () => {
    expect(firstFailure(() => VALID, () => VALID)).toEqual(VALID);
  });
});
