import { max0, round2 } from '../core/number';
import { withholdingTaxTable, type TaxTable } from './tables';

export type MonthlyContributions = {
  socialInsurance: number;
  healthInsurance: number;
  housingFund: number;
};

export function taxableIncome(monthlyGross: number, contributions: MonthlyContributions): number {
  const { socialInsurance, healthInsurance, housingFund } = contributions;
  return max0(monthlyGross - (socialInsurance + healthInsurance + housingFund));
}

/** 累进税：base + rate * (income - over)，超额部分不为负 */
export function incomeTax(taxable: number, table: TaxTable = withholdingTaxTable): number {
  if (!(taxable > 0)) return 0;
  const bracket =
    table.brackets.find((b) => b.upTo === null || taxable <= b.upTo) ??
    table.brackets[table.brackets.length - 1];
  return round2(bracket.base + bracket.rate * max0(taxable - bracket.over));
}
