export enum ErrorCode {
  INVALID_PAY_PERIOD = 'INVALID_PAY_PERIOD',
  INVALID_CALENDAR_DATE = 'INVALID_CALENDAR_DATE',
  INVALID_TABLE = 'INVALID_TABLE',
  INVALID_POLICY = 'INVALID_POLICY',
}

export interface PayrollErrorParams {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Thrown only for caller bugs (broken invariants at construction time).
 * Bad user data never throws; it becomes a {@link PayrollIssue}.
 */
export class PayrollError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(params: PayrollErrorParams) {
    super(params.message);
    this.code = params.code;
    this.details = params.details;
    this.name = 'PayrollError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PayrollError);
    }
  }
}

export type IssueLevel = 'INFO' | 'WARNING' | 'ERROR';

export type IssueCode =
  | 'INVALID_RECORD'
  | 'DATE_PARSE_FAILED'
  | 'TIME_PARSE_FAILED'
  | 'INCOMPLETE_ATTENDANCE'
  | 'OVERNIGHT_ATTENDANCE'
  | 'DUPLICATE_ATTENDANCE'
  | 'ABSENCE_UNCLASSIFIED'
  | 'NEGATIVE_INPUT_CLAMPED'
  | 'UNKNOWN_PERIOD_TYPE'
  | 'EMPLOYEE_NOT_FOUND';

export type PayrollIssue = {
  level: IssueLevel;
  code: IssueCode;
  message: string; // 人类可读
  employeeId?: string;
  date?: string; // yyyy-MM-dd
  meta?: Record<string, unknown>;
};

export function countIssuesByLevel(issues: readonly PayrollIssue[]): Record<IssueLevel, number> {
  const counts = { INFO: 0, WARNING: 0, ERROR: 0 };
  for (const issue of issues) counts[issue.level]++;
  return counts;
}
