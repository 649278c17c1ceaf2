import type { StratumTable } from '../design/index.js';
import {
  buildResult,
  normalize,
  varianceBound,
  type AllocationOptions,
  type AllocationResult,
} from './common.js';

/**
 * Neyman allocation: nh ∝ Nh·Sh, which gives the smallest variance of the
 * estimated mean for a fixed n. n = (Σ Wh·Sh)² / (V + (1/N)·Σ Wh·Sh²).
 */
export function neymanAllocation(
  table: StratumTable,
  targetVariance: number,
  options: AllocationOptions = {}
): AllocationResult {
  const weightedStdDev = table.strata.reduce((sum, s) => sum + s.weight * s.stdDev, 0);
  const numerator = weightedStdDev ** 2;
  const denominator = varianceBound(table, targetVariance);
  const n = numerator / denominator;

  const weights = normalize(table.strata.map(s => s.populationSize * s.stdDev));

  return buildResult('neyman', table, n, weights, options);
}
