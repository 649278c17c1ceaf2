import type { Stratum, StratumTable } from '../design/index.js';
import {
  buildResult,
  normalize,
  varianceBound,
  type AllocationOptions,
  type AllocationResult,
} from './common.js';

/** Per-unit resource the optimum allocation minimizes */
export type OptimumResource = 'cost' | 'time';

function unitResource(s: Stratum, resource: OptimumResource): number {
  return resource === 'cost' ? s.unitCost : s.unitTime;
}

/**
 * Optimum allocation for a fixed target variance: nh ∝ Nh·Sh/√Rh, where Rh
 * is the per-unit cost or time. Cheaper and more variable strata get more
 * of the sample.
 *
 * n = Σ(Wh·Sh·√Rh) · Σ(Wh·Sh/√Rh) / (V + (1/N)·Σ Wh·Sh²)
 */
export function optimumAllocation(
  table: StratumTable,
  targetVariance: number,
  resource: OptimumResource,
  options: AllocationOptions = {}
): AllocationResult {
  let term1 = 0;
  let term2 = 0;
  for (const s of table.strata) {
    const root = Math.sqrt(unitResource(s, resource));
    term1 += s.weight * s.stdDev * root;
    term2 += s.weight * s.stdDev / root;
  }

  const numerator = term1 * term2;
  const denominator = varianceBound(table, targetVariance);
  const n = numerator / denominator;

  const weights = normalize(
    table.strata.map(s => (s.populationSize * s.stdDev) / Math.sqrt(unitResource(s, resource)))
  );

  const method = resource === 'cost' ? 'cost-optimum' : 'time-optimum';
  return buildResult(method, table, n, weights, options);
}

export function costOptimumAllocation(
  table: StratumTable,
  targetVariance: number,
  options: AllocationOptions = {}
): AllocationResult {
  return optimumAllocation(table, targetVariance, 'cost', options);
}

export function timeOptimumAllocation(
  table: StratumTable,
  targetVariance: number,
  options: AllocationOptions = {}
): AllocationResult {
  return optimumAllocation(table, targetVariance, 'time', options);
}
