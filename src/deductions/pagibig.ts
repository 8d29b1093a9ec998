import { round2 } from '../core/number';
import { pagIbigConfig, type TieredRateConfig } from './tables';

/**
 * Pag-IBIG：先按档位费率计算，再夹到 [min, max]。
 * 现行配置 min = max = 100，所以进入非零档之后结果恒为 100。
 */
export function housingFund(
  monthlyCompensation: number,
  config: TieredRateConfig = pagIbigConfig,
): number {
  if (!(monthlyCompensation > 0) || monthlyCompensation < config.zeroBelow) return 0;
  const tier =
    config.tiers.find((t) => t.upTo === null || monthlyCompensation <= t.upTo) ??
    config.tiers[config.tiers.length - 1];
  const raw = monthlyCompensation * tier.rate;
  return round2(Math.min(Math.max(raw, config.minContribution), config.maxContribution));
}
