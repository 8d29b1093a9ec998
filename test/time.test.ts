import { describe, it, expect } from 'vitest';
import { UNPARSED, format12Hour, formatTimeOfDay, minutesOfDay, parseClockTime } from '../src';

describe('parseClockTime', () => {
  it('reads 4-digit and 3-digit forms as-is', () => {
    expect(parseClockTime('0800')).toEqual({ hour: 8, minute: 0 });
    expect(parseClockTime('1730')).toEqual({ hour: 17, minute: 30 });
    expect(parseClockTime('800')).toEqual({ hour: 8, minute: 0 });
    // 数字格式不走下午猜测
    expect(parseClockTime('530')).toEqual({ hour: 5, minute: 30 });
  });

  it('reads H:MM / HH:MM with the afternoon rule for hours 1..7', () => {
    expect(parseClockTime('8:00')).toEqual({ hour: 8, minute: 0 });
    expect(parseClockTime('17:00')).toEqual({ hour: 17, minute: 0 });
    expect(parseClockTime('5:30')).toEqual({ hour: 17, minute: 30 });
    expect(parseClockTime('1:05')).toEqual({ hour: 13, minute: 5 });
    expect(parseClockTime('0:30')).toEqual({ hour: 0, minute: 30 });
    expect(parseClockTime('12:00')).toEqual({ hour: 12, minute: 0 });
  });

  it('honours AM/PM in any case, with or without a space', () => {
    expect(parseClockTime('8:00 AM')).toEqual({ hour: 8, minute: 0 });
    expect(parseClockTime('5:30PM')).toEqual({ hour: 17, minute: 30 });
    expect(parseClockTime('5:30 am')).toEqual({ hour: 5, minute: 30 });
    expect(parseClockTime('12:00 AM')).toEqual({ hour: 0, minute: 0 });
    expect(parseClockTime('12:15 pm')).toEqual({ hour: 12, minute: 15 });
  });

  it('trims surrounding whitespace', () => {
    expect(parseClockTime('  0915 ')).toEqual({ hour: 9, minute: 15 });
  });

  it('returns UNPARSED instead of guessing', () => {
    expect(parseClockTime('')).toBe(UNPARSED);
    expect(parseClockTime('   ')).toBe(UNPARSED);
    expect(parseClockTime(null)).toBe(UNPARSED);
    expect(parseClockTime('abc')).toBe(UNPARSED);
    expect(parseClockTime('2460')).toBe(UNPARSED);
    expect(parseClockTime('0860')).toBe(UNPARSED);
    expect(parseClockTime('25:00')).toBe(UNPARSED);
    expect(parseClockTime('13:00 PM')).toBe(UNPARSED);
    expect(parseClockTime('0:15 AM')).toBe(UNPARSED);
    expect(parseClockTime('8:5')).toBe(UNPARSED);
    expect(parseClockTime('08000')).toBe(UNPARSED);
  });

  it('produces frozen values', () => {
    expect(Object.isFrozen(parseClockTime('0800'))).toBe(true);
  });
});

describe('time formatting', () => {
  it('minutesOfDay', () => {
    expect(minutesOfDay({ hour: 8, minute: 15 })).toBe(495);
    expect(minutesOfDay({ hour: 0, minute: 0 })).toBe(0);
  });

  it('formatTimeOfDay pads to HH:mm', () => {
    expect(formatTimeOfDay({ hour: 8, minute: 5 })).toBe('08:05');
    expect(formatTimeOfDay({ hour: 17, minute: 30 })).toBe('17:30');
  });

  it('format12Hour', () => {
    expect(format12Hour({ hour: 0, minute: 0 })).toBe('12:00 AM');
    expect(format12Hour({ hour: 8, minute: 5 })).toBe('8:05 AM');
    expect(format12Hour({ hour: 12, minute: 0 })).toBe('12:00 PM');
    expect(format12Hour({ hour: 17, minute: 30 })).toBe('5:30 PM');
  });
});
