import { format, startOfWeek } from 'date-fns';
import { defaultPolicy, resolvePolicy, type PolicyOverrides } from '../config/policy';
import { resolveDailyAttendance } from '../core/daily';
import { ISO_DATE, requireISODate } from '../core/dates';
import type { PayrollIssue } from '../core/errors';
import { max0, minutesToHours, round2, sumBy } from '../core/number';
import { listWorkingDays } from '../core/payPeriod';
import type {
  AbsenceClassification,
  AttendanceDay,
  DailyResult,
  PeriodTotals,
} from '../core/types';

export type AggregateRange = {
  employeeId: string;
  startDate: string; // yyyy-MM-dd，含
  endDate: string; // yyyy-MM-dd，含
};

export type AggregateOptions = {
  policy?: PolicyOverrides;
  absences?: AbsenceClassification; // 不传 = 没有外部缺勤分类
};

export type ResolvedDay = {
  date: string;
  weekStart: string;
  result: DailyResult;
};

export type WeeklySubtotal = {
  weekStart: string; // yyyy-MM-dd
  daysWorked: number;
  hoursWorked: number;
  overtimeHours: number;
  lateMinutes: number;
  undertimeMinutes: number;
};

export type AggregateResult = {
  totals: PeriodTotals;
  weeks: WeeklySubtotal[];
  days: ResolvedDay[];
  issues: PayrollIssue[];
};

function skippedDayIssue(day: AttendanceDay, result: DailyResult): PayrollIssue {
  if (result.status === 'OVERNIGHT') {
    return {
      level: 'WARNING',
      code: 'OVERNIGHT_ATTENDANCE',
      message: `Time-out is earlier than time-in for ${day.employeeId} on ${day.date}; day skipped.`,
      employeeId: day.employeeId,
      date: day.date,
    };
  }
  return {
    level: 'WARNING',
    code: 'INCOMPLETE_ATTENDANCE',
    message: `Missing ${day.timeIn ? 'time-out' : 'time-in'} for ${day.employeeId} on ${day.date}; day skipped.`,
    employeeId: day.employeeId,
    date: day.date,
  };
}

/**
 * 一个员工在 [startDate, endDate] 内的工时汇总。
 * - 同一天多条只取第一条
 * - INCOMPLETE / OVERNIGHT 的日子不计入（不是按 0 小时计入）
 * - 周小计按 weekStartsOn 分组（默认周一）
 */
export function aggregateHours(
  attendance: readonly AttendanceDay[],
  range: AggregateRange,
  opts: AggregateOptions = {},
): AggregateResult {
  const policy = opts.policy ? resolvePolicy(opts.policy) : defaultPolicy;
  const { employeeId, startDate, endDate } = range;
  const issues: PayrollIssue[] = [];

  const workingDays = listWorkingDays(startDate, endDate);

  // 1) 过滤 + 去重 + 逐日判定
  const seen = new Set<string>();
  const days: ResolvedDay[] = [];
  const own = attendance
    .filter((d) => d.employeeId === employeeId && d.date >= startDate && d.date <= endDate)
    .sort((a, b) => a.date.localeCompare(b.date));

  for (const day of own) {
    if (seen.has(day.date)) {
      issues.push({
        level: 'WARNING',
        code: 'DUPLICATE_ATTENDANCE',
        message: `More than one attendance row for ${employeeId} on ${day.date}; extra row skipped.`,
        employeeId,
        date: day.date,
      });
      continue;
    }
    seen.add(day.date);

    const result = resolveDailyAttendance(day, policy);
    if (result.status !== 'OK') {
      issues.push(skippedDayIssue(day, result));
      continue;
    }
    const weekStart = format(
      startOfWeek(requireISODate(day.date, 'date'), { weekStartsOn: policy.weekStartsOn }),
      ISO_DATE,
    );
    days.push({ date: day.date, weekStart, result });
  }

  // 2) 周小计
  const byWeek = new Map<string, WeeklySubtotal>();
  for (const d of days) {
    const w = byWeek.get(d.weekStart) ?? {
      weekStart: d.weekStart,
      daysWorked: 0,
      hoursWorked: 0,
      overtimeHours: 0,
      lateMinutes: 0,
      undertimeMinutes: 0,
    };
    w.daysWorked += 1;
    w.hoursWorked = round2(w.hoursWorked + d.result.hoursWorked);
    w.overtimeHours = round2(w.overtimeHours + d.result.overtimeHours);
    w.lateMinutes += d.result.lateMinutes;
    w.undertimeMinutes += d.result.undertimeMinutes;
    byWeek.set(d.weekStart, w);
  }
  const weeks = Array.from(byWeek.values()).sort((a, b) => a.weekStart.localeCompare(b.weekStart));

  // 3) 期间合计
  const hoursWorked = round2(sumBy(days, (d) => d.result.hoursWorked));
  const overtimeHours = round2(sumBy(days, (d) => d.result.overtimeHours));
  const lateMinutes = sumBy(days, (d) => d.result.lateMinutes);
  const undertimeMinutes = sumBy(days, (d) => d.result.undertimeMinutes);
  const expectedHours = round2(workingDays.length * policy.regularHoursPerDay);

  // 4) 缺勤：工时缺口 > 0 且外部分类里至少一个缺席工作日为 UNPAID；PAID 的缺席日不计
  const gap = max0(
    expectedHours - hoursWorked - minutesToHours(lateMinutes) - minutesToHours(undertimeMinutes),
  );
  const workedDates = new Set(days.map((d) => d.date));
  const missingDays = workingDays.filter((d) => !workedDates.has(d));

  let unpaidAbsentDays = 0;
  if (gap > 0 && missingDays.length > 0) {
    if (opts.absences) {
      const { absences } = opts;
      unpaidAbsentDays = missingDays.filter((d) => absences[d] === 'UNPAID').length;
    } else {
      issues.push({
        level: 'INFO',
        code: 'ABSENCE_UNCLASSIFIED',
        message: `${employeeId} has ${missingDays.length} weekday(s) without attendance and no absence classification; no absence deduction applied.`,
        employeeId,
        meta: { missingDays },
      });
    }
  }

  return {
    totals: {
      hoursWorked,
      overtimeHours,
      lateMinutes,
      undertimeMinutes,
      isLateAnyDay: days.some((d) => d.result.isLate),
      hasUnpaidAbsence: unpaidAbsentDays > 0,
      unpaidAbsentDays,
      daysWorked: days.length,
      expectedHours,
    },
    weeks,
    days,
    issues,
  };
}
