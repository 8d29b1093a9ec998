import { freeze } from 'immer';
import { type TimeOfDay, UNPARSED, type Unparsed } from './types';

const HHMM = /^(\d{2})(\d{2})$/;
const HMM = /^(\d)(\d{2})$/;
const COLON = /^(\d{1,2}):(\d{2})(?:\s*([AaPp][Mm]))?$/;

function makeTime(hour: number, minute: number): TimeOfDay | Unparsed {
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) return UNPARSED;
  return freeze({ hour, minute });
}

/**
 * 考勤导出里的时间格式混杂：0800 / 800 / 8:00 / 8:00 AM / 17:00。
 * 无 AM/PM 后缀且小时在 1..7 时按下午处理（下午班惯例），需与历史数据保持一致。
 */
export function parseClockTime(raw: string | null | undefined): TimeOfDay | Unparsed {
  const s = (raw ?? '').trim();
  if (!s) return UNPARSED;

  let m = HHMM.exec(s);
  if (m) return makeTime(Number(m[1]), Number(m[2]));

  m = HMM.exec(s);
  if (m) return makeTime(Number(m[1]), Number(m[2]));

  m = COLON.exec(s);
  if (!m) return UNPARSED;

  const hour = Number(m[1]);
  const minute = Number(m[2]);
  const suffix = m[3]?.toUpperCase();

  if (suffix) {
    if (hour < 1 || hour > 12) return UNPARSED;
    const h12 = hour % 12;
    return makeTime(suffix === 'PM' ? h12 + 12 : h12, minute);
  }

  if (hour >= 1 && hour <= 7) return makeTime(hour + 12, minute);
  return makeTime(hour, minute);
}

export const isTimeOfDay = (v: TimeOfDay | Unparsed | null): v is TimeOfDay =>
  v !== null && v !== UNPARSED;

export const minutesOfDay = (t: TimeOfDay): number => t.hour * 60 + t.minute;

const pad2 = (n: number) => String(n).padStart(2, '0');

/** HH:mm */
export const formatTimeOfDay = (t: TimeOfDay): string => `${pad2(t.hour)}:${pad2(t.minute)}`;

/** h:mm AM */
export function format12Hour(t: TimeOfDay): string {
  const suffix = t.hour < 12 ? 'AM' : 'PM';
  const h = t.hour % 12 === 0 ? 12 : t.hour % 12;
  return `${h}:${pad2(t.minute)} ${suffix}`;
}
