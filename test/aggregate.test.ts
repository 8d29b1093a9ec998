import { describe, it, expect } from 'vitest';
import { aggregateHours, listWorkingDays, type AttendanceDay } from '../src';
import { EMP, makeDay } from './helpers/factories';

// 2024-11 上半月 cutoff：10/27 - 11/12，共 12 个工作日
const RANGE = { employeeId: EMP, startDate: '2024-10-27', endDate: '2024-11-12' };
const WORKDAYS = listWorkingDays(RANGE.startDate, RANGE.endDate);

function fullAttendance(
  override: Record<string, [string | null, string | null] | 'skip'> = {},
): AttendanceDay[] {
  const days: AttendanceDay[] = [];
  for (const date of WORKDAYS) {
    const o = override[date];
    if (o === 'skip') continue;
    const [tin, tout] = o ?? ['08:00', '17:00'];
    days.push(makeDay(date, tin, tout));
  }
  return days;
}

describe('aggregateHours', () => {
  it('sums a full period with weekly subtotals', () => {
    const r = aggregateHours(fullAttendance(), RANGE);
    expect(r.totals).toEqual({
      hoursWorked: 96,
      overtimeHours: 0,
      lateMinutes: 0,
      undertimeMinutes: 0,
      isLateAnyDay: false,
      hasUnpaidAbsence: false,
      unpaidAbsentDays: 0,
      daysWorked: 12,
      expectedHours: 96,
    });
    expect(r.weeks.map((w) => [w.weekStart, w.daysWorked, w.hoursWorked])).toEqual([
      ['2024-10-28', 5, 40],
      ['2024-11-04', 5, 40],
      ['2024-11-11', 2, 16],
    ]);
    expect(r.issues).toEqual([]);
  });

  it('ignores other employees and dates outside the range', () => {
    const days = [
      ...fullAttendance(),
      makeDay('2024-11-13', '08:00', '17:00'),
      makeDay('2024-10-25', '08:00', '17:00'),
      makeDay('2024-11-04', '08:00', '20:00', 'E-002'),
    ];
    const r = aggregateHours(days, RANGE);
    expect(r.totals.daysWorked).toBe(12);
    expect(r.totals.overtimeHours).toBe(0);
  });

  it('keeps the first row of a duplicated date', () => {
    const days = [...fullAttendance(), makeDay('2024-11-04', '07:00', '19:00')];
    const r = aggregateHours(days, RANGE);
    expect(r.totals.overtimeHours).toBe(0);
    expect(r.issues).toHaveLength(1);
    expect(r.issues[0]).toMatchObject({
      level: 'WARNING',
      code: 'DUPLICATE_ATTENDANCE',
      employeeId: EMP,
      date: '2024-11-04',
    });
  });

  it('skips incomplete and overnight days instead of counting zero hours', () => {
    const days = fullAttendance({
      '2024-11-05': ['08:00', null],
      '2024-11-06': ['20:00', '04:00'],
    });
    const r = aggregateHours(days, RANGE);
    expect(r.totals.daysWorked).toBe(10);
    expect(r.totals.hoursWorked).toBe(80);
    expect(r.issues.map((i) => i.code)).toEqual([
      'INCOMPLETE_ATTENDANCE',
      'OVERNIGHT_ATTENDANCE',
      'ABSENCE_UNCLASSIFIED',
    ]);
    expect(r.issues[2].level).toBe('INFO');
    expect(r.issues[2].meta).toEqual({ missingDays: ['2024-11-05', '2024-11-06'] });
    expect(r.totals.hasUnpaidAbsence).toBe(false);
  });

  it('flags an unpaid absence only when the classification says so', () => {
    const days = fullAttendance({ '2024-11-07': 'skip' });

    const unpaid = aggregateHours(days, RANGE, { absences: { '2024-11-07': 'UNPAID' } });
    expect(unpaid.totals.hasUnpaidAbsence).toBe(true);
    expect(unpaid.totals.unpaidAbsentDays).toBe(1);
    expect(unpaid.totals.hoursWorked).toBe(88);
    expect(unpaid.issues).toEqual([]);

    const paid = aggregateHours(days, RANGE, { absences: { '2024-11-07': 'PAID' } });
    expect(paid.totals.hasUnpaidAbsence).toBe(false);
    expect(paid.totals.unpaidAbsentDays).toBe(0);
    expect(paid.issues).toEqual([]);
  });

  it('counts only the unpaid days when paid leave is mixed in', () => {
    const days = fullAttendance({ '2024-11-07': 'skip', '2024-11-08': 'skip' });
    const r = aggregateHours(days, RANGE, {
      absences: { '2024-11-07': 'UNPAID', '2024-11-08': 'PAID' },
    });
    expect(r.totals.hoursWorked).toBe(80);
    expect(r.totals.hasUnpaidAbsence).toBe(true);
    expect(r.totals.unpaidAbsentDays).toBe(1);
  });

  it('carries lateness and overtime into the week they happened in', () => {
    const days = fullAttendance({
      '2024-11-04': ['08:15', '17:30'],
      '2024-11-05': ['08:00', '19:00'],
    });
    const r = aggregateHours(days, RANGE);
    expect(r.totals.isLateAnyDay).toBe(true);
    expect(r.totals.lateMinutes).toBe(5);
    expect(r.totals.overtimeHours).toBe(2);
    expect(r.totals.hoursWorked).toBe(96);
    expect(r.weeks[1]).toEqual({
      weekStart: '2024-11-04',
      daysWorked: 5,
      hoursWorked: 40,
      overtimeHours: 2,
      lateMinutes: 5,
      undertimeMinutes: 0,
    });
    expect(r.totals.hasUnpaidAbsence).toBe(false);
    expect(r.issues).toEqual([]);
  });

  it('groups weeks by the configured first day of the week', () => {
    const r = aggregateHours(fullAttendance(), RANGE, { policy: { weekStartsOn: 0 } });
    expect(r.weeks.map((w) => w.weekStart)).toEqual(['2024-10-27', '2024-11-03', '2024-11-10']);
  });
});
