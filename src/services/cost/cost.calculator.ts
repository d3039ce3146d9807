import { DurationUnit, SalaryUnit, parseDurationUnit, parseSalaryUnit } from '../../types/job';

export const HOURS_PER_DAY = 8;
export const HOURS_PER_WEEK = 40;
export const HOURS_PER_MONTH = 160;
export const DAYS_PER_WEEK = 5;
export const DAYS_PER_MONTH = 22;
export const WEEKS_PER_MONTH = 4.33;

export interface CostBreakdown {
  baseAmount: number;
  totalAmount: number;
  perPeriodLabel: string;
  totalPeriods: number;
  durationInDays: number;
  costPerDay: number;
}

/**
 * How a duration converts into pay periods. The operand order is part of
 * the contract: advertised totals must not drift in the last bit.
 *   multiply: amount * duration * factor
 *   divide:   amount * (duration / factor)
 */
type Conversion = { op: 'multiply' | 'divide'; factor: number };

const times = (factor: number): Conversion => ({ op: 'multiply', factor });
const per = (factor: number): Conversion => ({ op: 'divide', factor });
const same = times(1);

const CONVERSIONS: Record<SalaryUnit, Record<DurationUnit, Conversion>> = {
  hourly: {
    hours: same,
    days: times(HOURS_PER_DAY),
    weeks: times(HOURS_PER_WEEK),
    months: times(HOURS_PER_MONTH),
  },
  daily: {
    hours: per(HOURS_PER_DAY),
    days: same,
    weeks: times(DAYS_PER_WEEK),
    months: times(DAYS_PER_MONTH),
  },
  weekly: {
    hours: per(HOURS_PER_WEEK),
    days: per(DAYS_PER_WEEK),
    weeks: same,
    months: times(WEEKS_PER_MONTH),
  },
  monthly: {
    hours: per(HOURS_PER_MONTH),
    days: per(DAYS_PER_MONTH),
    weeks: per(WEEKS_PER_MONTH),
    months: same,
  },
};

const PERIOD_LABELS: Record<SalaryUnit, string> = {
  hourly: 'per hour',
  daily: 'per day',
  weekly: 'per week',
  monthly: 'per month',
};

/**
 * Total pay for `duration` durationUnits at `amount` per amountUnit.
 * Unknown units give 0.
 */
export function totalCost(amount: number, amountUnit: string, duration: number, durationUnit: string): number {
  const salaryUnit = parseSalaryUnit(amountUnit);
  const workUnit = parseDurationUnit(durationUnit);
  if (!salaryUnit || !workUnit) return 0;

  const { op, factor } = CONVERSIONS[salaryUnit][workUnit];
  return op === 'multiply' ? amount * duration * factor : amount * (duration / factor);
}

/** Calendar days covered by the duration (hours round down to whole days). */
export function durationInDays(duration: number, durationUnit: string): number {
  switch (parseDurationUnit(durationUnit)) {
    case 'hours':
      return Math.floor(duration / HOURS_PER_DAY);
    case 'days':
      return duration;
    case 'weeks':
      return duration * 7;
    case 'months':
      return duration * 30;
    default:
      return 0;
  }
}

export function computeCost(
  amount: number,
  amountUnit: string,
  duration: number,
  durationUnit: string
): CostBreakdown {
  const totalAmount = totalCost(amount, amountUnit, duration, durationUnit);
  const days = durationInDays(duration, durationUnit);
  const salaryUnit = parseSalaryUnit(amountUnit);

  return {
    baseAmount: amount,
    totalAmount,
    perPeriodLabel: salaryUnit ? PERIOD_LABELS[salaryUnit] : '',
    totalPeriods: totalCost(1, amountUnit, duration, durationUnit),
    durationInDays: days,
    costPerDay: days > 0 ? totalAmount / days : 0,
  };
}
