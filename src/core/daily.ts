import { defaultPolicy, type PayrollPolicy } from '../config/policy';
import { PayrollError, ErrorCode } from './errors';
import { round2 } from './number';
import { minutesOfDay } from './time';
import type { AttendanceDay, DailyResult, DailyStatus } from './types';

const POLICY_TIME = /^([01]\d|2[0-3]):([0-5]\d)$/;

/** policy 里的时间固定为 24 小时制 HH:mm，不走打卡时间的猜测规则 */
export function policyMinutes(hhmm: string): number {
  const m = POLICY_TIME.exec(hhmm);
  if (!m) {
    throw new PayrollError({
      code: ErrorCode.INVALID_POLICY,
      message: `[policy] expected HH:mm, got "${hhmm}"`,
      details: { value: hhmm },
    });
  }
  return Number(m[1]) * 60 + Number(m[2]);
}

function emptyResult(status: DailyStatus): DailyResult {
  return {
    status,
    hoursWorked: 0,
    lateMinutes: 0,
    undertimeMinutes: 0,
    overtimeHours: 0,
    isLate: false,
    isUndertime: false,
  };
}

/**
 * 单日考勤规则：
 * - 超过 standardStart + graceMinutes（默认 08:10）即迟到，迟到分钟从宽限期末开始算
 * - 早于标准下班（默认 17:00）离开记为 undertime
 * - 迟到当天：工时截止到标准下班，且没有加班
 * - regular 工时封顶 regularHoursPerDay
 */
export function resolveDailyAttendance(
  day: AttendanceDay,
  policy: PayrollPolicy = defaultPolicy,
): DailyResult {
  const { timeIn, timeOut } = day;
  if (!timeIn || !timeOut) return emptyResult('INCOMPLETE');

  const inMin = minutesOfDay(timeIn);
  const outMin = minutesOfDay(timeOut);
  if (outMin < inMin) return emptyResult('OVERNIGHT');

  const graceEnd = policyMinutes(policy.standardStart) + policy.graceMinutes;
  const standardEnd = policyMinutes(policy.standardEnd);

  const isLate = inMin > graceEnd;
  const lateMinutes = isLate ? inMin - graceEnd : 0;

  const isUndertime = outMin < standardEnd;
  const undertimeMinutes = isUndertime ? standardEnd - outMin : 0;

  const effectiveOut = isLate ? Math.min(outMin, standardEnd) : outMin;
  let spanHours = Math.max(0, effectiveOut - inMin) / 60;

  const { lunchBreak } = policy;
  if (lunchBreak.enabled && spanHours >= lunchBreak.minSpanHours) {
    spanHours = Math.max(0, spanHours - lunchBreak.hours);
  }

  const hoursWorked = Math.min(spanHours, policy.regularHoursPerDay);
  const overtimeHours = !isLate && outMin > standardEnd ? (outMin - standardEnd) / 60 : 0;

  return {
    status: 'OK',
    hoursWorked: round2(hoursWorked),
    lateMinutes,
    undertimeMinutes,
    overtimeHours: round2(overtimeHours),
    isLate,
    isUndertime,
  };
}
