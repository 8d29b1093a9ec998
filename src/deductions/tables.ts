import { z } from 'zod';
import { ErrorCode, PayrollError } from '../core/errors';
import { loadTable } from '../core/loadTable';
import sssJson from './tables/sss.json';
import philHealthJson from './tables/philhealth.json';
import pagIbigJson from './tables/pagibig.json';
import taxJson from './tables/withholding-tax.json';

const nonNegative = z.number().finite().nonnegative();

/** below 为开区间上限：compensation < below 时适用；最后一档 below = null */
export const StepTableSchema = z.object({
  name: z.string(),
  brackets: z
    .array(z.object({ below: nonNegative.nullable(), contribution: nonNegative }))
    .min(1),
});
export type StepTable = z.infer<typeof StepTableSchema>;

export const RateCapConfigSchema = z.object({
  name: z.string(),
  rate: nonNegative,
  monthlyCap: nonNegative,
});
export type RateCapConfig = z.infer<typeof RateCapConfigSchema>;

/** upTo 为闭区间上限；zeroBelow 以下不扣，也不适用下限 */
export const TieredRateConfigSchema = z
  .object({
    name: z.string(),
    zeroBelow: nonNegative,
    tiers: z.array(z.object({ upTo: nonNegative.nullable(), rate: nonNegative })).min(1),
    minContribution: nonNegative,
    maxContribution: nonNegative,
  })
  .refine((c) => c.minContribution <= c.maxContribution, {
    message: 'minContribution must not exceed maxContribution',
  });
export type TieredRateConfig = z.infer<typeof TieredRateConfigSchema>;

/** tax = base + rate * max(0, income - over)，income <= upTo 时适用 */
export const TaxTableSchema = z.object({
  name: z.string(),
  brackets: z
    .array(
      z.object({
        upTo: nonNegative.nullable(),
        base: nonNegative,
        rate: nonNegative,
        over: nonNegative,
      }),
    )
    .min(1),
});
export type TaxTable = z.infer<typeof TaxTableSchema>;

/**
 * 阶梯表必须按上限升序，且只有最后一档可以不设上限。
 * 违反即数据错误，加载时直接抛。
 */
function assertAscending(name: string, limits: Array<number | null>) {
  limits.forEach((limit, i) => {
    const isLast = i === limits.length - 1;
    const prev = i > 0 ? limits[i - 1] : null;
    const broken =
      (limit === null && !isLast) || (limit !== null && prev !== null && limit <= prev);
    if (broken) {
      throw new PayrollError({
        code: ErrorCode.INVALID_TABLE,
        message: `[${name}] bracket ${i} is out of order`,
        details: { limits },
      });
    }
  });
}

export function loadStepTable(raw: unknown): StepTable {
  const table = loadTable(StepTableSchema, raw);
  assertAscending(table.name, table.brackets.map((b) => b.below));
  return table;
}

export function loadTieredRateConfig(raw: unknown): TieredRateConfig {
  const config = loadTable(TieredRateConfigSchema, raw);
  assertAscending(config.name, config.tiers.map((t) => t.upTo));
  return config;
}

export function loadTaxTable(raw: unknown): TaxTable {
  const table = loadTable(TaxTableSchema, raw);
  assertAscending(table.name, table.brackets.map((b) => b.upTo));
  return table;
}

export const sssTable: StepTable = loadStepTable(sssJson);
export const philHealthConfig: RateCapConfig = loadTable(RateCapConfigSchema, philHealthJson);
export const pagIbigConfig: TieredRateConfig = loadTieredRateConfig(pagIbigJson);
export const withholdingTaxTable: TaxTable = loadTaxTable(taxJson);
