// src/services/BillingPeriodResolver.ts

// Thresholds of the billing-month heuristic
export const EARLY_DAY_LIMIT = 10;
export const LATE_CYCLE_LIMIT = 10;
export const EARLY_CYCLE_LIMIT = 10;

export interface BillingPeriodInput {
  scheduleDay: number;
  scheduleMonth: number;
  readCycle: number;
}

export interface BillingPeriod {
  billingMonth: number;
  rule: 'previous-month' | 'next-month' | 'same-month';
  outOfRange: boolean;
}

/**
 * Billing cycles don't line up with calendar months. A late cycle reported in
 * the first days of a month belongs to the previous billing month; an early
 * cycle reported at the end of a month belongs to the next one.
 *
 * There is no year rollover: December's next month comes back as 13 and
 * January's previous month as 0, flagged with `outOfRange`.
 */
export function resolveBillingPeriod(input: BillingPeriodInput, cyclesPerBillingMonth: number): BillingPeriod {
  const { scheduleDay, scheduleMonth, readCycle } = input;

  let billingMonth: number;
  let rule: BillingPeriod['rule'];
  if (scheduleDay < EARLY_DAY_LIMIT && readCycle > LATE_CYCLE_LIMIT) {
    billingMonth = scheduleMonth - 1;
    rule = 'previous-month';
  } else if (scheduleDay > cyclesPerBillingMonth - 1 && readCycle < EARLY_CYCLE_LIMIT) {
    billingMonth = scheduleMonth + 1;
    rule = 'next-month';
  } else {
    billingMonth = scheduleMonth;
    rule = 'same-month';
  }

  return { billingMonth, rule, outOfRange: !isCalendarMonth(billingMonth) };
}

export function resolveBillingMonth(input: BillingPeriodInput, cyclesPerBillingMonth: number): number {
  return resolveBillingPeriod(input, cyclesPerBillingMonth).billingMonth;
}

export function isCalendarMonth(month: number): boolean {
  return Number.isInteger(month) && month >= 1 && month <= 12;
}
