import type { PeriodType } from '../core/types';

/** 某项扣款在哪个半月扣：BOTH 表示月额对半分摊到两个半月 */
export type DeductionTiming = PeriodType | 'BOTH';

export type DeductionSchedule = Record<
  'socialInsurance' | 'healthInsurance' | 'housingFund' | 'incomeTax',
  DeductionTiming
>;

export type LunchBreakPolicy = {
  enabled: boolean;
  hours: number;
  minSpanHours: number; // 原始时长 >= 该值才扣午休
};

export type PayrollPolicy = {
  standardStart: string; // HH:mm
  graceMinutes: number; // standardStart 之后的宽限分钟数，超过即迟到
  standardEnd: string; // HH:mm
  regularHoursPerDay: number;
  lunchBreak: LunchBreakPolicy;
  overtimeMultiplier: number;
  weekStartsOn: 0 | 1 | 2 | 3 | 4 | 5 | 6; // 0 = Sunday, 1 = Monday (ISO)
  timeZone: string; // 公司时区，用于判断“今天”属于哪个 cutoff
  workingDaysPerYear: number; // 推导日薪用
  deductionSchedule: DeductionSchedule;
};

export const defaultDeductionSchedule: DeductionSchedule = {
  socialInsurance: 'MID_MONTH',
  healthInsurance: 'MID_MONTH',
  housingFund: 'MID_MONTH',
  incomeTax: 'END_MONTH',
};

export const defaultPolicy: PayrollPolicy = {
  standardStart: '08:00',
  graceMinutes: 10,
  standardEnd: '17:00',
  regularHoursPerDay: 8,
  lunchBreak: { enabled: false, hours: 1, minSpanHours: 5 },
  overtimeMultiplier: 1.25,
  weekStartsOn: 1,
  timeZone: 'Asia/Manila',
  workingDaysPerYear: 245,
  deductionSchedule: defaultDeductionSchedule,
};

export type PolicyOverrides = Partial<
  Omit<PayrollPolicy, 'lunchBreak' | 'deductionSchedule'> & {
    lunchBreak: Partial<LunchBreakPolicy>;
    deductionSchedule: Partial<DeductionSchedule>;
  }
>;

/** 逐项合并；显式传入 undefined 的项保留默认值 */
export function resolvePolicy(overrides: PolicyOverrides = {}): PayrollPolicy {
  const d = defaultPolicy;
  const lunch: Partial<LunchBreakPolicy> = overrides.lunchBreak ?? {};
  const schedule: Partial<DeductionSchedule> = overrides.deductionSchedule ?? {};
  return {
    standardStart: overrides.standardStart ?? d.standardStart,
    graceMinutes: overrides.graceMinutes ?? d.graceMinutes,
    standardEnd: overrides.standardEnd ?? d.standardEnd,
    regularHoursPerDay: overrides.regularHoursPerDay ?? d.regularHoursPerDay,
    lunchBreak: {
      enabled: lunch.enabled ?? d.lunchBreak.enabled,
      hours: lunch.hours ?? d.lunchBreak.hours,
      minSpanHours: lunch.minSpanHours ?? d.lunchBreak.minSpanHours,
    },
    overtimeMultiplier: overrides.overtimeMultiplier ?? d.overtimeMultiplier,
    weekStartsOn: overrides.weekStartsOn ?? d.weekStartsOn,
    timeZone: overrides.timeZone ?? d.timeZone,
    workingDaysPerYear: overrides.workingDaysPerYear ?? d.workingDaysPerYear,
    deductionSchedule: {
      socialInsurance: schedule.socialInsurance ?? d.deductionSchedule.socialInsurance,
      healthInsurance: schedule.healthInsurance ?? d.deductionSchedule.healthInsurance,
      housingFund: schedule.housingFund ?? d.deductionSchedule.housingFund,
      incomeTax: schedule.incomeTax ?? d.deductionSchedule.incomeTax,
    },
  };
}
