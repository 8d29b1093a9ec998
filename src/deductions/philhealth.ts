import { round2 } from '../core/number';
import { philHealthConfig, type RateCapConfig } from './tables';

/** 始终返回月额；半月分摊由调用方显式除以 2 */
export function healthInsurance(
  monthlyCompensation: number,
  config: RateCapConfig = philHealthConfig,
): number {
  if (!(monthlyCompensation > 0)) return 0;
  return round2(Math.min(monthlyCompensation * config.rate, config.monthlyCap));
}
