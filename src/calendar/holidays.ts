import { z } from 'zod';
import { freeze } from 'immer';
import { parseISODate } from '../core/dates';
import { max0, round2 } from '../core/number';
import type { PayPeriod } from '../core/types';
import { loadTable } from '../core/loadTable';
import holidaysJson from './holidays.json';

export type HolidayType = 'REGULAR' | 'SPECIAL_NON_WORKING';

export const HolidaySchema = z.object({
  date: z.string().refine((s) => parseISODate(s) !== null, { message: 'expected yyyy-MM-dd' }),
  name: z.string().min(1),
  type: z.enum(['REGULAR', 'SPECIAL_NON_WORKING']),
});
export type Holiday = z.infer<typeof HolidaySchema>;

export interface HolidayCalendar {
  holidayOn(date: string): Holiday | undefined;
  isHoliday(date: string): boolean;
  holidaysBetween(startDate: string, endDate: string): Holiday[];
}

export function createHolidayCalendar(entries: readonly Holiday[]): HolidayCalendar {
  const byDate = new Map<string, Holiday>();
  for (const h of entries) {
    // 同一天既有 regular 又有 special 时按 regular 算
    const prev = byDate.get(h.date);
    if (!prev || (prev.type !== 'REGULAR' && h.type === 'REGULAR')) byDate.set(h.date, freeze(h));
  }
  const sorted = Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));

  return {
    holidayOn: (date) => byDate.get(date),
    isHoliday: (date) => byDate.has(date),
    holidaysBetween: (startDate, endDate) =>
      sorted.filter((h) => h.date >= startDate && h.date <= endDate),
  };
}

const bundledCalendar = createHolidayCalendar(loadTable(z.array(HolidaySchema), holidaysJson));

/** 内置 2024–2025 菲律宾法定假日 */
export const defaultHolidayCalendar = (): HolidayCalendar => bundledCalendar;

export type HolidayPayRates = Record<HolidayType, number>; // 日薪倍数

export const defaultHolidayPayRates: HolidayPayRates = {
  REGULAR: 1.0,
  SPECIAL_NON_WORKING: 0.3,
};

/** cutoff 内每个假日按日薪乘倍率累加 */
export function holidayPayForPeriod(
  period: PayPeriod,
  dailyRate: number,
  calendar: HolidayCalendar,
  rates: HolidayPayRates = defaultHolidayPayRates,
): number {
  const rate = max0(dailyRate);
  let pay = 0;
  for (const h of calendar.holidaysBetween(period.startDate, period.endDate)) {
    pay += rate * rates[h.type];
  }
  return round2(pay);
}
