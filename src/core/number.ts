export type Peso = number; // 金额统一用比索（两位小数）
export type Hours = number;
export type Minutes = number;

export const num = (v: unknown): number => (Number.isFinite(Number(v)) ? Number(v) : 0);

export const max0 = (x: number): number => (x > 0 ? x : 0);

/** 四舍五入到两位小数（远离零），金额与工时共用 */
export function round2(n: number): number {
  const sign = n < 0 ? -1 : 1;
  return (sign * Math.round((Math.abs(n) + Number.EPSILON) * 100)) / 100;
}

export const minutesToHours = (m: Minutes): Hours => m / 60;

export function sumBy<T>(arr: readonly T[], pick: (x: T) => number): number {
  let s = 0;
  for (const it of arr) s += pick(it) || 0;
  return s;
}

