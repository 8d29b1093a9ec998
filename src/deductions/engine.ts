import {
  defaultDeductionSchedule,
  type DeductionSchedule,
  type DeductionTiming,
} from '../config/policy';
import { max0, num, round2 } from '../core/number';
import type { DeductionResult, PeriodType } from '../core/types';
import { housingFund } from './pagibig';
import { healthInsurance } from './philhealth';
import { socialInsurance } from './sss';
import {
  pagIbigConfig,
  philHealthConfig,
  sssTable,
  withholdingTaxTable,
  type RateCapConfig,
  type StepTable,
  type TaxTable,
  type TieredRateConfig,
} from './tables';
import { incomeTax, taxableIncome } from './withholdingTax';

export type DeductionKind = keyof DeductionSchedule;

export const DEDUCTION_KINDS: readonly DeductionKind[] = [
  'socialInsurance',
  'healthInsurance',
  'housingFund',
  'incomeTax',
];

export type MonthlyAmounts = Record<DeductionKind, number>;

export interface DeductionCalculator {
  kind: DeductionKind;
  name: string;
  /**
   * 月额。`prior` 是排在前面的 calculator 已经算出的月额（所得税依赖前三项）。
   */
  monthly(monthlyGross: number, prior: Readonly<MonthlyAmounts>): number;
}

export type DeductionTables = {
  sss: StepTable;
  philHealth: RateCapConfig;
  pagIbig: TieredRateConfig;
  withholdingTax: TaxTable;
};

export const defaultDeductionTables: DeductionTables = {
  sss: sssTable,
  philHealth: philHealthConfig,
  pagIbig: pagIbigConfig,
  withholdingTax: withholdingTaxTable,
};

/** 按给定表构建四个 calculator；顺序固定，所得税放最后 */
export function createDeductionCalculators(
  tables: Partial<DeductionTables> = {},
): DeductionCalculator[] {
  const t = { ...defaultDeductionTables, ...tables };
  return [
    {
      kind: 'socialInsurance',
      name: t.sss.name,
      monthly: (gross) => socialInsurance(gross, t.sss),
    },
    {
      kind: 'healthInsurance',
      name: t.philHealth.name,
      monthly: (gross) => healthInsurance(gross, t.philHealth),
    },
    {
      kind: 'housingFund',
      name: t.pagIbig.name,
      monthly: (gross) => housingFund(gross, t.pagIbig),
    },
    {
      kind: 'incomeTax',
      name: t.withholdingTax.name,
      monthly: (gross, prior) => incomeTax(taxableIncome(gross, prior), t.withholdingTax),
    },
  ];
}

export const defaultDeductionCalculators: readonly DeductionCalculator[] =
  createDeductionCalculators();

export type DeductionOptions = {
  calculators?: readonly DeductionCalculator[];
  schedule?: Partial<DeductionSchedule>;
};

/** 当前半月应扣的比例：命中 1，BOTH 各扣一半，否则 0 */
export function shareForPeriod(timing: DeductionTiming, periodType: PeriodType): number {
  if (timing === 'BOTH') return 0.5;
  return timing === periodType ? 1 : 0;
}

const zeroAmounts = (): MonthlyAmounts => ({
  socialInsurance: 0,
  healthInsurance: 0,
  housingFund: 0,
  incomeTax: 0,
});

/** 依次执行所有 calculator，同 kind 的金额累加 */
export function calculateMonthlyAmounts(
  monthlyGross: number,
  calculators: readonly DeductionCalculator[] = defaultDeductionCalculators,
): MonthlyAmounts {
  const gross = max0(num(monthlyGross));
  const amounts = zeroAmounts();
  for (const calc of calculators) {
    amounts[calc.kind] = round2(amounts[calc.kind] + max0(calc.monthly(gross, { ...amounts })));
  }
  return amounts;
}

export function calculateDeductions(
  monthlyGross: number,
  periodType: PeriodType,
  opts: DeductionOptions = {},
): DeductionResult {
  const schedule = { ...defaultDeductionSchedule, ...opts.schedule };
  const monthly = calculateMonthlyAmounts(monthlyGross, opts.calculators);

  const applied = zeroAmounts();
  for (const kind of DEDUCTION_KINDS) {
    applied[kind] = round2(monthly[kind] * shareForPeriod(schedule[kind], periodType));
  }

  return {
    ...applied,
    total: round2(
      applied.socialInsurance + applied.healthInsurance + applied.housingFund + applied.incomeTax,
    ),
  };
}
