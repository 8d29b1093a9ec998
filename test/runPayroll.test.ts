import { describe, it, expect, vi } from 'vitest';
import {
  getPayPeriod,
  listWorkingDays,
  runPayroll,
  type AttendanceRow,
  type EmployeeRateProfile,
} from '../src';
import { EMP, makeProfile } from './helpers/factories';

const PERIOD = getPayPeriod(2024, 11, 'MID_MONTH');
const WORKDAYS = listWorkingDays(PERIOD.startDate, PERIOD.endDate);

const toRowDate = (iso: string) => {
  const [y, m, d] = iso.split('-');
  return `${m}/${d}/${y}`;
};

function rowsFor(
  employeeId: string,
  override: Record<string, Partial<AttendanceRow> | 'skip'> = {},
): AttendanceRow[] {
  const rows: AttendanceRow[] = [];
  for (const date of WORKDAYS) {
    const o = override[date];
    if (o === 'skip') continue;
    rows.push({ employeeId, date: toRowDate(date), timeIn: '0800', timeOut: '5:00 PM', ...o });
  }
  return rows;
}

const fakeLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const findProfile = (id: string): EmployeeRateProfile | undefined =>
  id === EMP ? makeProfile() : undefined;

describe('runPayroll', () => {
  it('pays a clean period and logs a run summary', () => {
    const logger = fakeLogger();
    const summary = runPayroll(
      { period: PERIOD, findProfile, attendance: rowsFor(EMP) },
      { logger },
    );

    expect(summary.totals).toEqual({
      employees: 1,
      processed: 1,
      notFound: 0,
      grossPay: 10000,
      deductions: 1600,
      netPay: 8400,
    });
    expect(summary.issues).toEqual([]);
    expect(summary.issueCounts).toEqual({ INFO: 0, WARNING: 0, ERROR: 0 });

    const [outcome] = summary.outcomes;
    expect(outcome.status).toBe('OK');
    if (outcome.status !== 'OK') return;
    expect(outcome.result.netPay).toBe(8400);
    expect(outcome.weeks).toHaveLength(3);

    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith('payroll run finished', {
      period: PERIOD,
      totals: summary.totals,
      issueCounts: summary.issueCounts,
    });
  });

  it('keeps going past bad rows and unknown employees', () => {
    const logger = fakeLogger();
    const attendance = [
      ...rowsFor(EMP, { '2024-11-05': { timeIn: 'abc' } }),
      { employeeId: EMP, date: '2024-11-04', timeIn: '0800', timeOut: '1700' },
    ];
    const summary = runPayroll(
      { period: PERIOD, employeeIds: [EMP, 'E-404'], findProfile, attendance },
      { logger },
    );

    expect(summary.issues.map((i) => i.code)).toEqual([
      'TIME_PARSE_FAILED',
      'DATE_PARSE_FAILED',
      'INCOMPLETE_ATTENDANCE',
      'ABSENCE_UNCLASSIFIED',
      'ABSENCE_UNCLASSIFIED',
      'EMPLOYEE_NOT_FOUND',
    ]);
    expect(summary.issueCounts).toEqual({ INFO: 2, WARNING: 2, ERROR: 2 });
    expect(summary.totals).toMatchObject({ employees: 2, processed: 1, notFound: 1 });

    // 没有缺勤分类时不扣缺勤
    const ok = summary.outcomes[0];
    expect(ok.status === 'OK' && ok.result.grossPay).toBe(10000);

    const missing = summary.outcomes[1];
    expect(missing.status).toBe('NOT_FOUND');
    expect(missing.issues.map((i) => i.code)).toEqual([
      'ABSENCE_UNCLASSIFIED',
      'EMPLOYEE_NOT_FOUND',
    ]);

    expect(logger.error).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.info).toHaveBeenCalledTimes(3);
    expect(logger.error).toHaveBeenLastCalledWith('No rate profile for employee E-404.', {
      code: 'EMPLOYEE_NOT_FOUND',
      employeeId: 'E-404',
    });
  });

  it('derives employees from attendance and applies unpaid absences', () => {
    const summary = runPayroll(
      {
        period: PERIOD,
        findProfile,
        attendance: rowsFor(EMP, { '2024-11-07': 'skip' }),
        absences: { [EMP]: { '2024-11-07': 'UNPAID' } },
      },
      { logger: fakeLogger() },
    );
    expect(summary.outcomes).toHaveLength(1);
    const [outcome] = summary.outcomes;
    if (outcome.status !== 'OK') throw new Error('expected OK');
    expect(outcome.result.absenceDeduction).toBe(800);
    expect(outcome.result.grossPay).toBe(9200);
    expect(outcome.result.netPay).toBe(7600);
  });

  it('does not charge paid leave as absence', () => {
    const summary = runPayroll(
      {
        period: PERIOD,
        findProfile,
        attendance: rowsFor(EMP, { '2024-11-07': 'skip', '2024-11-08': 'skip' }),
        absences: { [EMP]: { '2024-11-07': 'UNPAID', '2024-11-08': 'PAID' } },
      },
      { logger: fakeLogger() },
    );
    const [outcome] = summary.outcomes;
    if (outcome.status !== 'OK') throw new Error('expected OK');
    expect(outcome.result.absenceDeduction).toBe(800);
    expect(outcome.result.grossPay).toBe(9200);
    expect(summary.issues).toEqual([]);
  });

  it('returns a frozen summary', () => {
    const summary = runPayroll(
      { period: PERIOD, findProfile, attendance: rowsFor(EMP) },
      { logger: fakeLogger() },
    );
    expect(Object.isFrozen(summary)).toBe(true);
    expect(Object.isFrozen(summary.outcomes)).toBe(true);
  });
});
