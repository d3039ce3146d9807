import { describe, it, expect } from 'vitest';
import { computeCost, durationInDays, totalCost } from './cost.calculator';

// ============================================================================
// totalCost
// ============================================================================

describe('totalCost', () => {
  it('should bill 8 hours per day for hourly pay', () => {
    expect(totalCost(100, 'hourly', 1, 'days')).toBe(800);
  });

  it('should bill a monthly salary over 22 working days as one month', () => {
    expect(totalCost(1000, 'monthly', 22, 'days')).toBe(1000);
  });

  it.each([
    ['hourly', 'hours', 10, 3, 30],
    ['hourly', 'days', 10, 3, 240],
    ['hourly', 'weeks', 10, 3, 1200],
    ['hourly', 'months', 10, 2, 3200],
    ['daily', 'hours', 200, 4, 100],
    ['daily', 'days', 200, 4, 800],
    ['daily', 'weeks', 100, 2, 1000],
    ['daily', 'months', 100, 1, 2200],
    ['weekly', 'hours', 400, 20, 200],
    ['weekly', 'days', 400, 10, 800],
    ['weekly', 'weeks', 400, 3, 1200],
    ['weekly', 'months', 500, 2, 4330],
    ['monthly', 'hours', 3200, 80, 1600],
    ['monthly', 'days', 2200, 11, 1100],
    ['monthly', 'weeks', 4330, 1, 1000],
    ['monthly', 'months', 3000, 2, 6000],
  ])('should convert %s pay over %s', (amountUnit, durationUnit, amount, duration, expected) => {
    expect(totalCost(amount, amountUnit, duration, durationUnit)).toBeCloseTo(expected, 6);
  });

  it('should ignore case and surrounding whitespace in units', () => {
    expect(totalCost(100, ' HOURLY', 1, 'Days ')).toBe(800);
  });

  it('should return 0 for unknown units', () => {
    expect(totalCost(100, 'yearly', 1, 'days')).toBe(0);
    expect(totalCost(100, 'hourly', 1, 'fortnights')).toBe(0);
  });
});

// ============================================================================
// durationInDays
// ============================================================================

describe('durationInDays', () => {
  it('should round hours down to whole working days', () => {
    expect(durationInDays(20, 'hours')).toBe(2);
    expect(durationInDays(7, 'hours')).toBe(0);
  });

  it('should use calendar days for weeks and months', () => {
    expect(durationInDays(3, 'weeks')).toBe(21);
    expect(durationInDays(2, 'months')).toBe(60);
    expect(durationInDays(12, 'days')).toBe(12);
  });

  it('should return 0 for unknown units', () => {
    expect(durationInDays(2, 'years')).toBe(0);
  });
});

// ============================================================================
// computeCost
// ============================================================================

describe('computeCost', () => {
  it('should build the full breakdown', () => {
    expect(computeCost(100, 'hourly', 5, 'days')).toEqual({
      baseAmount: 100,
      totalAmount: 4000,
      perPeriodLabel: 'per hour',
      totalPeriods: 40,
      durationInDays: 5,
      costPerDay: 800,
    });
  });

  it('should report fractional periods and no per-day cost under one day', () => {
    expect(computeCost(50, 'daily', 4, 'hours')).toEqual({
      baseAmount: 50,
      totalAmount: 25,
      perPeriodLabel: 'per day',
      totalPeriods: 0.5,
      durationInDays: 0,
      costPerDay: 0,
    });
  });

  it('should leave the label empty for an unknown salary unit', () => {
    const breakdown = computeCost(100, 'yearly', 5, 'days');
    expect(breakdown.perPeriodLabel).toBe('');
    expect(breakdown.totalAmount).toBe(0);
    expect(breakdown.costPerDay).toBe(0);
  });
});
