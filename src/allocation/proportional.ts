import type { StratumTable } from '../design/index.js';
import {
  buildResult,
  varianceBound,
  weightedVariance,
  type AllocationOptions,
  type AllocationResult,
} from './common.js';

/**
 * Proportional allocation: nh = n·Wh, with
 * n = Σ Wh·Sh² / (V + (1/N)·Σ Wh·Sh²).
 */
export function proportionalAllocation(
  table: StratumTable,
  targetVariance: number,
  options: AllocationOptions = {}
): AllocationResult {
  const numerator = weightedVariance(table);
  const denominator = varianceBound(table, targetVariance);
  const n = numerator / denominator;

  return buildResult('proportional', table, n, table.strata.map(s => s.weight), options);
}
