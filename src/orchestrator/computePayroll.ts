import {
  defaultHolidayPayRates,
  holidayPayForPeriod,
  type HolidayCalendar,
  type HolidayPayRates,
} from '../calendar/holidays';
import { defaultPolicy, resolvePolicy, type PolicyOverrides } from '../config/policy';
import type { PayrollIssue } from '../core/errors';
import { normalizePeriodType } from '../core/payPeriod';
import { max0, minutesToHours, num, round2 } from '../core/number';
import type { EmployeeRateProfile, PayPeriod, PayrollResult, PeriodTotals } from '../core/types';
import { calculateDeductions, type DeductionCalculator } from '../deductions/engine';

export type ComputePayrollInput = {
  employeeId: string;
  profile: EmployeeRateProfile | null | undefined; // 查不到档案 = NOT_FOUND
  totals: PeriodTotals;
  period: PayPeriod;
  monthlyGross?: number; // 缺省 = 月薪 + 加班费 × 2 + 假日工资
};

export type ComputePayrollOptions = {
  policy?: PolicyOverrides;
  calculators?: readonly DeductionCalculator[];
  holidays?: HolidayCalendar; // 不传则 holidayPay = 0
  holidayRates?: HolidayPayRates;
};

export type PayrollOutcome =
  | { status: 'OK'; result: PayrollResult; issues: PayrollIssue[] }
  | { status: 'NOT_FOUND'; employeeId: string; issues: PayrollIssue[] };

/** 负数输入夹到 0，并记一条 warning */
function clampInput(
  issues: PayrollIssue[],
  employeeId: string,
  field: string,
  value: number,
): number {
  const v = num(value);
  if (v >= 0) return v;
  issues.push({
    level: 'WARNING',
    code: 'NEGATIVE_INPUT_CLAMPED',
    message: `${field} for ${employeeId} is negative (${v}); treated as 0.`,
    employeeId,
    meta: { field, value: v },
  });
  return 0;
}

/**
 * 单个员工单个半月的工资计算（纯函数）。
 *
 * gross = base + overtime + holiday - late - undertime - absence，夹到 >= 0；
 * net = gross - 法定扣款合计，夹到 >= 0。
 * 迟到过任何一天则整期没有加班费。
 * 缺勤扣款天数 = min(工时缺口 / 每日工时, UNPAID 缺席日数)。
 */
export function computePayroll(
  input: ComputePayrollInput,
  opts: ComputePayrollOptions = {},
): PayrollOutcome {
  const { employeeId, profile, period } = input;
  const issues: PayrollIssue[] = [];

  if (!profile) {
    issues.push({
      level: 'ERROR',
      code: 'EMPLOYEE_NOT_FOUND',
      message: `No rate profile for employee ${employeeId}.`,
      employeeId,
    });
    return { status: 'NOT_FOUND', employeeId, issues };
  }

  const policy = opts.policy ? resolvePolicy(opts.policy) : defaultPolicy;
  const clamp = (field: string, value: number) => clampInput(issues, employeeId, field, value);

  // 1) 输入清洗
  const monthlyBasicSalary = clamp('monthlyBasicSalary', profile.monthlyBasicSalary);
  const semiMonthlyRate = clamp('semiMonthlyRate', profile.semiMonthlyRate);
  const hourlyRate = clamp('hourlyRate', profile.hourlyRate);
  const dailyRate = clamp('dailyRate', profile.dailyRate);

  const { totals } = input;
  const hoursWorked = clamp('hoursWorked', totals.hoursWorked);
  const overtimeHours = clamp('overtimeHours', totals.overtimeHours);
  const lateMinutes = clamp('lateMinutes', totals.lateMinutes);
  const undertimeMinutes = clamp('undertimeMinutes', totals.undertimeMinutes);
  const expectedHours = clamp('expectedHours', totals.expectedHours);
  const unpaidAbsentDays = clamp('unpaidAbsentDays', totals.unpaidAbsentDays);

  // 2) 各项
  const perMinute = hourlyRate / 60;
  const basePay = round2(semiMonthlyRate);
  const lateDeduction = round2(perMinute * lateMinutes);
  const undertimeDeduction = round2(perMinute * undertimeMinutes);

  const gapDays = max0(
    (expectedHours -
      hoursWorked -
      minutesToHours(lateMinutes) -
      minutesToHours(undertimeMinutes)) /
      policy.regularHoursPerDay,
  );
  const absentDays = Math.min(gapDays, unpaidAbsentDays);
  const absenceDeduction = totals.hasUnpaidAbsence ? round2(absentDays * dailyRate) : 0;

  const overtimePay = totals.isLateAnyDay
    ? 0
    : round2(hourlyRate * overtimeHours * policy.overtimeMultiplier);

  const holidayPay = opts.holidays
    ? holidayPayForPeriod(
        period,
        dailyRate,
        opts.holidays,
        opts.holidayRates ?? defaultHolidayPayRates,
      )
    : 0;

  const grossPay = max0(
    round2(
      basePay + overtimePay + holidayPay - lateDeduction - undertimeDeduction - absenceDeduction,
    ),
  );

  // 3) 法定扣款（按月额计算，再按 schedule 决定本半月扣多少）
  const monthlyGross =
    input.monthlyGross === undefined
      ? round2(monthlyBasicSalary + overtimePay * 2 + holidayPay)
      : clamp('monthlyGross', input.monthlyGross);

  const { periodType, issue: periodIssue } = normalizePeriodType(period.periodType);
  if (periodIssue) issues.push({ ...periodIssue, employeeId });

  const deductions = calculateDeductions(monthlyGross, periodType, {
    calculators: opts.calculators,
    schedule: policy.deductionSchedule,
  });

  const netPay = max0(round2(grossPay - deductions.total));

  return {
    status: 'OK',
    result: {
      employeeId,
      period,
      basePay,
      overtimePay,
      holidayPay,
      lateDeduction,
      undertimeDeduction,
      absenceDeduction,
      grossPay,
      deductions,
      netPay,
    },
    issues,
  };
}
