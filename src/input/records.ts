import { z } from 'zod';
import { freeze } from 'immer';
import { resolvePolicy, type PolicyOverrides } from '../config/policy';
import { ROW_DATE, rowDateToISO } from '../core/dates';
import type { PayrollIssue } from '../core/errors';
import { round2 } from '../core/number';
import { isTimeOfDay, parseClockTime } from '../core/time';
import type { AttendanceDay, EmployeeRateProfile } from '../core/types';

// 员工档案里金额可能带 ₱、逗号、空格，例如 "90,000" / "₱ 535.71"
const money = z.union([
  z.number().finite(),
  z
    .string()
    .transform((s) => s.replace(/[₱,\s]/g, ''))
    .pipe(z.coerce.number().finite()),
]);

export const EmployeeRateRecordSchema = z.object({
  employeeId: z.coerce.string().trim().min(1),
  monthlyBasicSalary: money,
  hourlyRate: money,
  semiMonthlyRate: money.optional(),
  dailyRate: money.optional(),
});
export type EmployeeRateRecord = z.input<typeof EmployeeRateRecordSchema>;

export const AttendanceRowSchema = z.object({
  employeeId: z.coerce.string().trim().min(1),
  date: z.string(),
  timeIn: z.string().nullish(),
  timeOut: z.string().nullish(),
});
export type AttendanceRow = z.input<typeof AttendanceRowSchema>;

export type Parsed<T> =
  | { ok: true; value: T; issues: PayrollIssue[] }
  | { ok: false; issues: PayrollIssue[] };

function invalidRecord(kind: string, error: z.ZodError, employeeId?: string): PayrollIssue {
  return {
    level: 'ERROR',
    code: 'INVALID_RECORD',
    message: `Invalid ${kind}: ${error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
    employeeId,
    meta: { issues: error.issues },
  };
}

/**
 * 缺省半月薪 = 月薪 / 2，缺省日薪 = 月薪 / policy.workingDaysPerYear。
 * 不做负数夹取：那属于 processor 的职责（带 warning）。
 */
export function toRateProfile(
  record: EmployeeRateRecord,
  policy: PolicyOverrides = {},
): Parsed<EmployeeRateProfile> {
  const { workingDaysPerYear } = resolvePolicy(policy);
  const parsed = EmployeeRateRecordSchema.safeParse(record);
  if (!parsed.success) {
    return { ok: false, issues: [invalidRecord('employee rate record', parsed.error)] };
  }
  const r = parsed.data;
  return {
    ok: true,
    value: {
      employeeId: r.employeeId,
      monthlyBasicSalary: r.monthlyBasicSalary,
      hourlyRate: r.hourlyRate,
      semiMonthlyRate: r.semiMonthlyRate ?? round2(r.monthlyBasicSalary / 2),
      dailyRate: r.dailyRate ?? round2(r.monthlyBasicSalary / workingDaysPerYear),
    },
    issues: [],
  };
}

/**
 * 一行考勤 -> AttendanceDay。
 * 日期解析失败整行丢弃；时间解析失败只把该时间置空（当天会被视为不完整）。
 */
export function toAttendanceDay(row: AttendanceRow): Parsed<AttendanceDay> {
  const parsed = AttendanceRowSchema.safeParse(row);
  if (!parsed.success) {
    return { ok: false, issues: [invalidRecord('attendance row', parsed.error)] };
  }
  const { employeeId, date: rawDate, timeIn: rawIn, timeOut: rawOut } = parsed.data;

  const date = rowDateToISO(rawDate);
  if (!date) {
    return {
      ok: false,
      issues: [
        {
          level: 'ERROR',
          code: 'DATE_PARSE_FAILED',
          message: `Cannot parse attendance date "${rawDate}" (expected ${ROW_DATE}).`,
          employeeId,
          meta: { raw: rawDate },
        },
      ],
    };
  }

  const issues: PayrollIssue[] = [];
  const readTime = (field: 'timeIn' | 'timeOut', raw: string | null | undefined) => {
    if (raw == null || raw.trim() === '') return null;
    const t = parseClockTime(raw);
    if (isTimeOfDay(t)) return t;
    issues.push({
      level: 'WARNING',
      code: 'TIME_PARSE_FAILED',
      message: `Cannot parse ${field} "${raw}" for ${employeeId} on ${date}.`,
      employeeId,
      date,
      meta: { field, raw },
    });
    return null;
  };

  const value: AttendanceDay = freeze({
    employeeId,
    date,
    timeIn: readTime('timeIn', rawIn),
    timeOut: readTime('timeOut', rawOut),
  });
  return { ok: true, value, issues };
}

/** 批量转换，坏行只产生 issue 不中断 */
export function toAttendanceDays(rows: readonly AttendanceRow[]): {
  days: AttendanceDay[];
  issues: PayrollIssue[];
} {
  const days: AttendanceDay[] = [];
  const issues: PayrollIssue[] = [];
  for (const row of rows) {
    const res = toAttendanceDay(row);
    issues.push(...res.issues);
    if (res.ok) days.push(res.value);
  }
  return { days, issues };
}
