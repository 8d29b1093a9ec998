export * from './core/types';
export * from './core/errors';
export type { Peso, Hours, Minutes } from './core/number';
export { round2 } from './core/number';
export {
  parseClockTime,
  isTimeOfDay,
  minutesOfDay,
  formatTimeOfDay,
  format12Hour,
} from './core/time';
export { resolveDailyAttendance, policyMinutes } from './core/daily';
export { parseISODate, rowDateToISO, toISODate } from './core/dates';
export { loadTable } from './core/loadTable';
export {
  PERIOD_TYPES,
  isPeriodType,
  adjustForWeekend,
  getPayDate,
  getCutoffRange,
  createPayPeriod,
  getPayPeriod,
  payPeriodContaining,
  currentPayPeriod,
  isDateInPeriod,
  listWorkingDays,
  countWorkingDays,
  formatPayPeriod,
  normalizePeriodType,
} from './core/payPeriod';

export * from './config/policy';

export { socialInsurance } from './deductions/sss';
export { healthInsurance } from './deductions/philhealth';
export { housingFund } from './deductions/pagibig';
export { incomeTax, taxableIncome, type MonthlyContributions } from './deductions/withholdingTax';
export * from './deductions/tables';
export * from './deductions/engine';

export * from './calendar/holidays';

export * from './input/records';
export * from './logging/logger';

export * from './summarize/aggregateHours';
export * from './orchestrator/computePayroll';
export * from './orchestrator/runPayroll';
