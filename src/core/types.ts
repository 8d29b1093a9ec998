import type { Hours, Minutes, Peso } from './number';

export type PeriodType = 'MID_MONTH' | 'END_MONTH';

export type TimeOfDay = Readonly<{
  hour: number; // 0..23
  minute: number; // 0..59
}>;

export const UNPARSED = 'UNPARSED' as const;
export type Unparsed = typeof UNPARSED;

export type AttendanceDay = Readonly<{
  employeeId: string;
  date: string; // yyyy-MM-dd
  timeIn: TimeOfDay | null;
  timeOut: TimeOfDay | null;
}>;

/** OK：正常；INCOMPLETE：缺少打卡；OVERNIGHT：下班早于上班（不支持跨夜） */
export type DailyStatus = 'OK' | 'INCOMPLETE' | 'OVERNIGHT';

export interface DailyResult {
  status: DailyStatus;
  hoursWorked: Hours; // regular 部分，封顶 regularHoursPerDay
  lateMinutes: Minutes;
  undertimeMinutes: Minutes;
  overtimeHours: Hours;
  isLate: boolean;
  isUndertime: boolean;
}

export interface PeriodTotals {
  hoursWorked: Hours;
  overtimeHours: Hours;
  lateMinutes: Minutes;
  undertimeMinutes: Minutes;
  isLateAnyDay: boolean;
  hasUnpaidAbsence: boolean;
  unpaidAbsentDays: number; // 缺席且分类为 UNPAID 的工作日数
  daysWorked: number;
  expectedHours: Hours;
}

export type PayPeriod = Readonly<{
  startDate: string; // yyyy-MM-dd
  endDate: string;
  payDate: string;
  periodType: PeriodType;
}>;

export interface EmployeeRateProfile {
  employeeId: string;
  monthlyBasicSalary: Peso;
  semiMonthlyRate: Peso;
  hourlyRate: Peso;
  dailyRate: Peso;
}

export interface DeductionResult {
  socialInsurance: Peso;
  healthInsurance: Peso;
  housingFund: Peso;
  incomeTax: Peso;
  total: Peso;
}

export interface PayrollResult {
  employeeId: string;
  period: PayPeriod;
  basePay: Peso;
  overtimePay: Peso;
  holidayPay: Peso;
  lateDeduction: Peso;
  undertimeDeduction: Peso;
  absenceDeduction: Peso;
  grossPay: Peso;
  deductions: DeductionResult;
  netPay: Peso;
}

/** 外部请假/缺勤系统给出的分类，按 yyyy-MM-dd 索引 */
export type AbsenceType = 'UNPAID' | 'PAID';
export type AbsenceClassification = Readonly<Record<string, AbsenceType>>;
