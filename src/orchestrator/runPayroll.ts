import { produce } from 'immer';
import { resolvePolicy } from '../config/policy';
import { countIssuesByLevel, type IssueLevel, type PayrollIssue } from '../core/errors';
import { round2 } from '../core/number';
import type {
  AbsenceClassification,
  EmployeeRateProfile,
  PayPeriod,
  PayrollResult,
} from '../core/types';
import { toAttendanceDays, type AttendanceRow } from '../input/records';
import { createLogger, reportIssues, type PayrollLogger } from '../logging/logger';
import { aggregateHours, type WeeklySubtotal } from '../summarize/aggregateHours';
import { computePayroll, type ComputePayrollOptions } from './computePayroll';

export type RunPayrollInput = {
  period: PayPeriod;
  /** 不传则取考勤里出现过的所有员工 */
  employeeIds?: readonly string[];
  findProfile: (employeeId: string) => EmployeeRateProfile | null | undefined;
  attendance: readonly AttendanceRow[];
  absences?: Readonly<Record<string, AbsenceClassification>>; // employeeId -> 分类
  monthlyGross?: Readonly<Record<string, number>>; // employeeId -> 月总收入
};

export type RunPayrollOptions = ComputePayrollOptions & {
  logger?: PayrollLogger;
};

export type EmployeeRunOutcome =
  | {
      employeeId: string;
      status: 'OK';
      result: PayrollResult;
      weeks: WeeklySubtotal[];
      issues: PayrollIssue[];
    }
  | { employeeId: string; status: 'NOT_FOUND'; issues: PayrollIssue[] };

export type PayrollRunTotals = {
  employees: number;
  processed: number;
  notFound: number;
  grossPay: number;
  deductions: number;
  netPay: number;
};

export type PayrollRunSummary = {
  period: PayPeriod;
  outcomes: EmployeeRunOutcome[];
  totals: PayrollRunTotals;
  /** 整批的 issue（输入解析 + 每个员工的），按产生顺序 */
  issues: PayrollIssue[];
  issueCounts: Record<IssueLevel, number>;
};

const emptySummary = (period: PayPeriod): PayrollRunSummary => ({
  period,
  outcomes: [],
  totals: { employees: 0, processed: 0, notFound: 0, grossPay: 0, deductions: 0, netPay: 0 },
  issues: [],
  issueCounts: { INFO: 0, WARNING: 0, ERROR: 0 },
});

function distinctEmployeeIds(ids: Iterable<string>): string[] {
  return Array.from(new Set(ids));
}

/**
 * 整批计算一个半月：
 * 考勤行 -> AttendanceDay -> 每个员工 aggregateHours -> computePayroll。
 * 单个员工的问题只体现在它自己的 outcome 里，不会中断整批。
 */
export function runPayroll(
  input: RunPayrollInput,
  opts: RunPayrollOptions = {},
): PayrollRunSummary {
  const { period } = input;
  const { logger = createLogger('payroll-engine'), ...computeOpts } = opts;
  const policy = resolvePolicy(opts.policy);

  const parsed = toAttendanceDays(input.attendance);
  const employeeIds = distinctEmployeeIds(
    input.employeeIds ?? parsed.days.map((d) => d.employeeId),
  );

  const summary = produce(emptySummary(period), (draft) => {
    draft.issues.push(...parsed.issues);

    for (const employeeId of employeeIds) {
      const aggregate = aggregateHours(
        parsed.days,
        { employeeId, startDate: period.startDate, endDate: period.endDate },
        { policy, absences: input.absences?.[employeeId] },
      );
      const outcome = computePayroll(
        {
          employeeId,
          profile: input.findProfile(employeeId),
          totals: aggregate.totals,
          period,
          monthlyGross: input.monthlyGross?.[employeeId],
        },
        { ...computeOpts, policy },
      );

      const issues = [...aggregate.issues, ...outcome.issues];
      draft.totals.employees += 1;
      draft.issues.push(...issues);

      if (outcome.status === 'NOT_FOUND') {
        draft.totals.notFound += 1;
        draft.outcomes.push({ employeeId, status: 'NOT_FOUND', issues });
        continue;
      }

      const { result } = outcome;
      draft.totals.processed += 1;
      draft.totals.grossPay = round2(draft.totals.grossPay + result.grossPay);
      draft.totals.deductions = round2(draft.totals.deductions + result.deductions.total);
      draft.totals.netPay = round2(draft.totals.netPay + result.netPay);
      draft.outcomes.push({ employeeId, status: 'OK', result, weeks: aggregate.weeks, issues });
    }

    draft.issueCounts = countIssuesByLevel(draft.issues);
  });

  reportIssues(logger, summary.issues);
  logger.info('payroll run finished', {
    period: summary.period,
    totals: summary.totals,
    issueCounts: summary.issueCounts,
  });

  return summary;
}
