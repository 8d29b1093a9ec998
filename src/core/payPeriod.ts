import {
  addMonths,
  eachDayOfInterval,
  format,
  getDate,
  isBefore,
  isSaturday,
  isSunday,
  isWeekend,
  lastDayOfMonth,
  subDays,
  subMonths,
} from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { freeze } from 'immer';
import { resolvePolicy, type PolicyOverrides } from '../config/policy';
import { ISO_DATE, requireISODate, toISODate } from './dates';
import { ErrorCode, PayrollError, type PayrollIssue } from './errors';
import type { PayPeriod, PeriodType } from './types';

const MID_MONTH_PAY_DAY = 15;
const MID_MONTH_CUTOFF_START_DAY = 27; // 上个月
const MID_MONTH_CUTOFF_END_DAY = 12;
const END_MONTH_CUTOFF_START_DAY = 13;
const END_MONTH_CUTOFF_END_DAY = 26;

export const PERIOD_TYPES: readonly PeriodType[] = ['MID_MONTH', 'END_MONTH'];

export const isPeriodType = (v: unknown): v is PeriodType =>
  v === 'MID_MONTH' || v === 'END_MONTH';

function monthStart(year: number, month: number): Date {
  if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
    throw new PayrollError({
      code: ErrorCode.INVALID_CALENDAR_DATE,
      message: `invalid payroll month ${year}-${month}`,
      details: { year, month },
    });
  }
  return new Date(year, month - 1, 1);
}

/** 周六 -> 周五，周日 -> 周五 */
export function adjustForWeekend(d: Date): Date {
  if (isSaturday(d)) return subDays(d, 1);
  if (isSunday(d)) return subDays(d, 2);
  return d;
}

export function getPayDate(year: number, month: number, periodType: PeriodType): string {
  const first = monthStart(year, month);
  const raw =
    periodType === 'MID_MONTH'
      ? new Date(year, month - 1, MID_MONTH_PAY_DAY)
      : lastDayOfMonth(first);
  return toISODate(adjustForWeekend(raw));
}

export function getCutoffRange(
  year: number,
  month: number,
  periodType: PeriodType,
): { startDate: string; endDate: string } {
  const first = monthStart(year, month);
  if (periodType === 'MID_MONTH') {
    const prev = subMonths(first, 1);
    return {
      startDate: toISODate(
        new Date(prev.getFullYear(), prev.getMonth(), MID_MONTH_CUTOFF_START_DAY),
      ),
      endDate: toISODate(new Date(year, month - 1, MID_MONTH_CUTOFF_END_DAY)),
    };
  }
  return {
    startDate: toISODate(new Date(year, month - 1, END_MONTH_CUTOFF_START_DAY)),
    endDate: toISODate(new Date(year, month - 1, END_MONTH_CUTOFF_END_DAY)),
  };
}

/**
 * 校验 startDate <= endDate <= payDate。
 * 违反即调用方 bug，直接抛错。
 */
export function createPayPeriod(fields: {
  startDate: string;
  endDate: string;
  payDate: string;
  periodType: PeriodType;
}): PayPeriod {
  const { startDate, endDate, payDate, periodType } = fields;
  const start = requireISODate(startDate, 'startDate');
  const end = requireISODate(endDate, 'endDate');
  const pay = requireISODate(payDate, 'payDate');

  if (!isPeriodType(periodType)) {
    throw new PayrollError({
      code: ErrorCode.INVALID_PAY_PERIOD,
      message: `invalid period type "${String(periodType)}"`,
      details: { periodType },
    });
  }
  if (isBefore(end, start)) {
    throw new PayrollError({
      code: ErrorCode.INVALID_PAY_PERIOD,
      message: `End date ${endDate} is before start date ${startDate}`,
      details: { startDate, endDate },
    });
  }
  if (isBefore(pay, end)) {
    throw new PayrollError({
      code: ErrorCode.INVALID_PAY_PERIOD,
      message: `Pay date ${payDate} is before cutoff end ${endDate}`,
      details: { endDate, payDate },
    });
  }

  return freeze({ startDate, endDate, payDate, periodType });
}

export function getPayPeriod(year: number, month: number, periodType: PeriodType): PayPeriod {
  return createPayPeriod({
    ...getCutoffRange(year, month, periodType),
    payDate: getPayDate(year, month, periodType),
    periodType,
  });
}

/** 某天的考勤归属哪个 cutoff：<=12 本月上半，13..26 本月下半，>=27 下月上半 */
export function payPeriodContaining(date: string): PayPeriod {
  const d = requireISODate(date, 'date');
  const day = getDate(d);
  if (day >= MID_MONTH_CUTOFF_START_DAY) {
    const next = addMonths(new Date(d.getFullYear(), d.getMonth(), 1), 1);
    return getPayPeriod(next.getFullYear(), next.getMonth() + 1, 'MID_MONTH');
  }
  const type: PeriodType = day <= MID_MONTH_CUTOFF_END_DAY ? 'MID_MONTH' : 'END_MONTH';
  return getPayPeriod(d.getFullYear(), d.getMonth() + 1, type);
}

/** “今天”按公司时区（policy.timeZone）判断 */
export function currentPayPeriod(now: Date, policy: PolicyOverrides = {}): PayPeriod {
  const { timeZone } = resolvePolicy(policy);
  return payPeriodContaining(formatInTimeZone(now, timeZone, ISO_DATE));
}

export function isDateInPeriod(period: PayPeriod, date: string): boolean {
  // yyyy-MM-dd 可直接按字符串比较
  return date >= period.startDate && date <= period.endDate;
}

/** [start, end] 内的工作日（周一到周五），不含节假日 */
export function listWorkingDays(startDate: string, endDate: string): string[] {
  const start = requireISODate(startDate, 'startDate');
  const end = requireISODate(endDate, 'endDate');
  if (isBefore(end, start)) return [];
  return eachDayOfInterval({ start, end })
    .filter((d) => !isWeekend(d))
    .map(toISODate);
}

export const countWorkingDays = (startDate: string, endDate: string): number =>
  listWorkingDays(startDate, endDate).length;

/** e.g. "Cutoff: Oct 27 – Nov 12, Pay date: Nov 15" */
export function formatPayPeriod(period: PayPeriod): string {
  const fmt = (s: string) => format(requireISODate(s, 'date'), 'MMM d');
  return `Cutoff: ${fmt(period.startDate)} – ${fmt(period.endDate)}, Pay date: ${fmt(period.payDate)}`;
}

/** 外部传入的 periodType 可能是任意值；未知时回退 MID_MONTH 并给出 warning */
export function normalizePeriodType(value: unknown): {
  periodType: PeriodType;
  issue?: PayrollIssue;
} {
  if (isPeriodType(value)) return { periodType: value };
  return {
    periodType: 'MID_MONTH',
    issue: {
      level: 'WARNING',
      code: 'UNKNOWN_PERIOD_TYPE',
      message: `Unknown period type "${String(value)}", falling back to MID_MONTH.`,
      meta: { value },
    },
  };
}
