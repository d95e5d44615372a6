// src/tests/BillingPeriodResolver.test.ts
import { resolveBillingMonth, resolveBillingPeriod, isCalendarMonth } from '../services/BillingPeriodResolver';

const CYCLES = 21;

describe('BillingPeriodResolver', () => {
  describe('resolveBillingPeriod', () => {
    it('should move a late cycle reported early in the month to the previous billing month', () => {
      expect(resolveBillingPeriod({ scheduleDay: 5, scheduleMonth: 6, readCycle: 15 }, CYCLES)).toEqual({
        billingMonth: 5,
        rule: 'previous-month',
        outOfRange: false
      });
    });

    it('should move an early cycle reported late in the month to the next billing month', () => {
      expect(resolveBillingPeriod({ scheduleDay: 28, scheduleMonth: 6, readCycle: 2 }, CYCLES)).toEqual({
        billingMonth: 7,
        rule: 'next-month',
        outOfRange: false
      });
    });

    it('should keep the calendar month when day and cycle are close', () => {
      expect(resolveBillingMonth({ scheduleDay: 14, scheduleMonth: 6, readCycle: 12 }, CYCLES)).toBe(6);
      expect(resolveBillingMonth({ scheduleDay: 3, scheduleMonth: 6, readCycle: 2 }, CYCLES)).toBe(6);
    });

    it('should treat the thresholds as strict', () => {
      // day 10 is not early, cycle 10 is neither late nor early
      expect(resolveBillingMonth({ scheduleDay: 10, scheduleMonth: 4, readCycle: 15 }, CYCLES)).toBe(4);
      expect(resolveBillingMonth({ scheduleDay: 5, scheduleMonth: 4, readCycle: 10 }, CYCLES)).toBe(4);
      expect(resolveBillingMonth({ scheduleDay: 25, scheduleMonth: 4, readCycle: 10 }, CYCLES)).toBe(4);
      // late-month limit is cyclesPerBillingMonth - 1
      expect(resolveBillingMonth({ scheduleDay: 20, scheduleMonth: 4, readCycle: 3 }, CYCLES)).toBe(4);
      expect(resolveBillingMonth({ scheduleDay: 21, scheduleMonth: 4, readCycle: 3 }, CYCLES)).toBe(5);
    });

    it('should follow cyclesPerBillingMonth for the late-month limit', () => {
      expect(resolveBillingMonth({ scheduleDay: 18, scheduleMonth: 4, readCycle: 3 }, 18)).toBe(5);
      expect(resolveBillingMonth({ scheduleDay: 18, scheduleMonth: 4, readCycle: 3 }, 21)).toBe(4);
    });

    it('should not wrap around the year and flag the result instead', () => {
      expect(resolveBillingPeriod({ scheduleDay: 28, scheduleMonth: 12, readCycle: 1 }, CYCLES)).toEqual({
        billingMonth: 13,
        rule: 'next-month',
        outOfRange: true
      });
      expect(resolveBillingPeriod({ scheduleDay: 2, scheduleMonth: 1, readCycle: 19 }, CYCLES)).toEqual({
        billingMonth: 0,
        rule: 'previous-month',
        outOfRange: true
      });
    });

    it('should give the same answer for the same inputs', () => {
      const input = { scheduleDay: 7, scheduleMonth: 9, readCycle: 18 };
      expect(resolveBillingPeriod(input, CYCLES)).toEqual(resolveBillingPeriod({ ...input }, CYCLES));
    });
  });

  describe('isCalendarMonth', () => {
    it('should accept 1..12 only', () => {
      expect(isCalendarMonth(1)).toBe(true);
      expect(isCalendarMonth(12)).toBe(true);
      expect(isCalendarMonth(0)).toBe(false);
      expect(isCalendarMonth(13)).toBe(false);
      expect(isCalendarMonth(2.5)).toBe(false);
    });
  });
});
