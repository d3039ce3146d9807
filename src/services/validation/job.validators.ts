import {
  DURATION_UNITS,
  JOB_STATUSES,
  JobInput,
  Location,
  SALARY_UNITS,
  parseDurationUnit,
  parseJobStatus,
  parseSalaryUnit,
} from '../../types/job';
import { ValidationError, ValidationOutcome, VALID, invalid } from '../../types/validation';
import { Validator, firstFailure, rules } from './validation.rules';

export const TITLE_MIN_LENGTH = 3;
export const TITLE_MAX_LENGTH = 100;
export const DESCRIPTION_MIN_LENGTH = 10;
export const DESCRIPTION_MAX_LENGTH = 5000;
export const MAX_SALARY = 1_000_000;
export const MIN_DURATION = 1;
export const MAX_DURATION = 365;

export interface SalaryValue {
  amount: number;
  unit: string;
}

export interface DurationValue {
  amount: number;
  unit: string;
}

export interface FieldValueMap {
  title: string;
  description: string;
  salary: SalaryValue;
  duration: DurationValue;
  location: Location;
  status: string;
  employerId: string;
}

export type JobField = keyof FieldValueMap;

/** Declaration order; whole-job errors are reported in this order. */
export const JOB_FIELDS: readonly JobField[] = [
  'title',
  'description',
  'salary',
  'duration',
  'location',
  'status',
  'employerId',
];

const titleValidator = new Validator<string>('title')
  .addRule(rules.notEmpty('Title is required'))
  .addRule(rules.minLength(TITLE_MIN_LENGTH, `Title must be at least ${TITLE_MIN_LENGTH} characters`))
  .addRule(rules.maxLength(TITLE_MAX_LENGTH, `Title must not exceed ${TITLE_MAX_LENGTH} characters`));

const descriptionValidator = new Validator<string>('description')
  .addRule(rules.notEmpty('Description is required'))
  .addRule(
    rules.minLength(DESCRIPTION_MIN_LENGTH, `Description must be at least ${DESCRIPTION_MIN_LENGTH} characters`)
  )
  .addRule(
    rules.maxLength(DESCRIPTION_MAX_LENGTH, `Description must not exceed ${DESCRIPTION_MAX_LENGTH} characters`)
  );

const salaryAmountValidator = new Validator<number>('salary')
  .addRule(rules.custom((amount: number) => amount > 0, 'Salary must be greater than 0', 'OUT_OF_RANGE'))
  .addRule(rules.maximum(MAX_SALARY, 'Salary must not exceed 1,000,000'));

const salaryUnitValidator = new Validator<string>('salary').addRule(
  rules.custom(
    (unit: string) => parseSalaryUnit(unit) !== null,
    `Invalid salary unit. Allowed values: ${SALARY_UNITS.join(', ')}`
  )
);

const durationAmountValidator = new Validator<number>('duration')
  .addRule(rules.custom((amount: number) => Number.isInteger(amount), 'Duration must be a whole number'))
  .addRule(rules.minimum(MIN_DURATION, `Duration must be at least ${MIN_DURATION}`))
  .addRule(rules.maximum(MAX_DURATION, `Duration must not exceed ${MAX_DURATION}`));

const durationUnitValidator = new Validator<string>('duration').addRule(
  rules.custom(
    (unit: string) => parseDurationUnit(unit) !== null,
    `Invalid duration unit. Allowed values: ${DURATION_UNITS.join(', ')}`
  )
);

const isBlank = (value: string) => value.trim().length === 0;

const locationValidator = new Validator<Location>('location')
  .addRule(
    rules.custom(
      (location: Location) => !isBlank(location.state) && !isBlank(location.district),
      'Both state and district are required',
      'REQUIRED'
    )
  )
  .addRule(
    rules.custom(
      ({ latitude }: Location) => latitude == null || (latitude >= -90 && latitude <= 90),
      'Invalid latitude',
      'OUT_OF_RANGE'
    )
  )
  .addRule(
    rules.custom(
      ({ longitude }: Location) => longitude == null || (longitude >= -180 && longitude <= 180),
      'Invalid longitude',
      'OUT_OF_RANGE'
    )
  );

const statusValidator = new Validator<string>('status').addRule(
  rules.custom(
    (status: string) => parseJobStatus(status) !== null,
    `Invalid status. Allowed values: ${JOB_STATUSES.join(', ')}`
  )
);

const employerIdValidator = new Validator<string>('employerId').addRule(
  rules.notEmpty('Employer ID is required')
);

const FIELD_VALIDATORS: { [K in JobField]: (value: FieldValueMap[K]) => ValidationOutcome } = {
  title: (value) => titleValidator.validate(value),
  description: (value) => descriptionValidator.validate(value),
  salary: (value) =>
    firstFailure(
      () => salaryAmountValidator.validate(value.amount),
      () => salaryUnitValidator.validate(value.unit)
    ),
  duration: (value) =>
    firstFailure(
      () => durationAmountValidator.validate(value.amount),
      () => durationUnitValidator.validate(value.unit)
    ),
  location: (value) => locationValidator.validate(value),
  status: (value) => statusValidator.validate(value),
  employerId: (value) => employerIdValidator.validate(value),
};

/**
 * Run one field's rule set.
 */
export function validateField<K extends JobField>(field: K, value: FieldValueMap[K]): ValidationOutcome {
  const validate: (value: FieldValueMap[K]) => ValidationOutcome = FIELD_VALIDATORS[field];
  return validate(value);
}

export type FieldInput = { [K in JobField]: { field: K; value: FieldValueMap[K] } }[JobField];

/** validateField over an already-discriminated `{ field, value }` pair. */
export function validateFieldInput(input: FieldInput): ValidationOutcome {
  switch (input.field) {
    case 'title':
      return validateField('title', input.value);
    case 'description':
      return validateField('description', input.value);
    case 'salary':
      return validateField('salary', input.value);
    case 'duration':
      return validateField('duration', input.value);
    case 'location':
      return validateField('location', input.value);
    case 'status':
      return validateField('status', input.value);
    case 'employerId':
      return validateField('employerId', input.value);
  }
}

/**
 * Validate every field independently and collect each field's first error,
 * in declaration order. One failing field never hides another.
 */
export function validateJob(job: JobInput): ValidationOutcome {
  const checks: Array<() => ValidationOutcome> = [
    () => validateField('title', job.title),
    () => validateField('description', job.description),
    () => validateField('salary', { amount: job.salaryAmount, unit: job.salaryUnit }),
    () => validateField('duration', { amount: job.durationAmount, unit: job.durationUnit }),
    () => validateField('location', job.location),
  ];

  const { status, employerId } = job;
  if (status !== undefined) checks.push(() => validateField('status', status));
  if (employerId !== undefined) checks.push(() => validateField('employerId', employerId));

  const errors: ValidationError[] = [];
  for (const run of checks) {
    const outcome = run();
    if (!outcome.valid) errors.push(...outcome.errors);
  }

  return errors.length === 0 ? VALID : invalid(errors);
}

export const toErrorMap = (outcome: ValidationOutcome): Partial<Record<string, ValidationError>> => {
  if (outcome.valid) return {};
  const map: Partial<Record<string, ValidationError>> = {};
  for (const error of outcome.errors) {
    map[error.field] ??= error;
  }
  return map;
};
