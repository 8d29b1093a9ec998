import { format, isValid, parse, parseISO } from 'date-fns';
import { ErrorCode, PayrollError } from './errors';

export const ISO_DATE = 'yyyy-MM-dd';
export const ROW_DATE = 'MM/dd/yyyy'; // 考勤导出里的日期格式

/** yyyy-MM-dd -> 本地零点的 Date；非法返回 null */
export function parseISODate(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const d = parseISO(value);
  return isValid(d) ? d : null;
}

/** MM/dd/yyyy -> yyyy-MM-dd；非法返回 null */
export function rowDateToISO(value: string): string | null {
  const s = value.trim();
  if (!/^\d{1,2}\/\d{1,2}\/\d{4}$/.test(s)) return null;
  const d = parse(s, 'M/d/yyyy', new Date(2000, 0, 1));
  return isValid(d) ? toISODate(d) : null;
}

export const toISODate = (d: Date): string => format(d, ISO_DATE);

export function requireISODate(value: string, field: string): Date {
  const d = parseISODate(value);
  if (!d) {
    throw new PayrollError({
      code: ErrorCode.INVALID_CALENDAR_DATE,
      message: `${field} must be a yyyy-MM-dd date, got "${value}"`,
      details: { field, value },
    });
  }
  return d;
}
