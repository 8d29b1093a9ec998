import { round2 } from '../core/number';
import { sssTable, type StepTable } from './tables';

/**
 * SSS 月缴额：按月薪落在哪一档取固定金额（阶梯函数，单调不减）。
 * compensation <= 0 时为 0。
 */
export function socialInsurance(monthlyCompensation: number, table: StepTable = sssTable): number {
  if (!(monthlyCompensation > 0)) return 0;
  const bracket =
    table.brackets.find((b) => b.below === null || monthlyCompensation < b.below) ??
    table.brackets[table.brackets.length - 1];
  return round2(bracket.contribution);
}
