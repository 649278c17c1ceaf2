import type { StratumTable } from '../design/index.js';
import { DegenerateVarianceError } from '../errors/index.js';

export type AllocationMethod = 'proportional' | 'neyman' | 'cost-optimum' | 'time-optimum';

/**
 * `independent` rounds each stratum on its own, so counts may not add up to
 * the total. `largest-remainder` floors every stratum and hands out the
 * missing units by largest fractional part.
 */
export type RoundingMode = 'independent' | 'largest-remainder';

export interface AllocationOptions {
  rounding?: RoundingMode;
}

export interface StratumAllocation {
  stratumId: string;
  /** Share of the sample assigned to this stratum */
  allocationWeight: number;
  /** n · allocationWeight before rounding */
  exact: number;
  count: number;
}

export interface AllocationResult {
  method: AllocationMethod;
  rounding: RoundingMode;
  /** n before rounding up */
  continuousSampleSize: number;
  totalSampleSize: number;
  allocations: StratumAllocation[];
  /** Sum of per-stratum counts; can differ from totalSampleSize under independent rounding */
  allocatedTotal: number;
  expectedCost: number;
  expectedTime: number;
}

/** Σ Wh·Sh² */
export function weightedVariance(table: StratumTable): number {
  return table.strata.reduce((sum, s) => sum + s.weight * s.stdDev ** 2, 0);
}

/**
 * V + (1/N)·Σ Wh·Sh², the variance bound with the finite population
 * correction. Every method divides by this.
 */
export function varianceBound(table: StratumTable, targetVariance: number): number {
  const denominator = targetVariance + weightedVariance(table) / table.totalPopulation;
  if (!Number.isFinite(denominator) || denominator <= 0) {
    throw new DegenerateVarianceError(
      `Variance bound must be positive (got ${denominator} for target variance ${targetVariance})`,
      denominator
    );
  }
  return denominator;
}

/** Round half to even; 2.5 -> 2, 3.5 -> 4. */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

function largestRemainder(exact: readonly number[], total: number): number[] {
  const counts = exact.map(x => Math.floor(x));
  let remaining = total - counts.reduce((a, b) => a + b, 0);

  // Highest fraction first, stratum order breaks ties
  const order = exact
    .map((x, i) => ({ i, fraction: x - Math.floor(x) }))
    .sort((a, b) => {
      if (b.fraction !== a.fraction) return b.fraction - a.fraction;
      return a.i - b.i;
    });

  for (const { i } of order) {
    if (remaining <= 0) break;
    counts[i] += 1;
    remaining -= 1;
  }

  return counts;
}

/**
 * Normalizes raw per-stratum scores into allocation weights. When every
 * score is zero (all Sh = 0) there is nothing to allocate and every
 * weight is zero.
 */
export function normalize(scores: readonly number[]): number[] {
  const total = scores.reduce((a, b) => a + b, 0);
  if (total === 0) {
    return scores.map(() => 0);
  }
  return scores.map(s => s / total);
}

export function buildResult(
  method: AllocationMethod,
  table: StratumTable,
  n: number,
  weights: readonly number[],
  options: AllocationOptions = {}
): AllocationResult {
  const rounding = options.rounding ?? 'independent';
  const totalSampleSize = Math.ceil(n);
  const exact = weights.map(w => n * w);
  const counts = rounding === 'largest-remainder'
    ? largestRemainder(exact, totalSampleSize)
    : exact.map(roundHalfEven);

  const allocations = table.strata.map((s, i) => ({
    stratumId: s.id,
    allocationWeight: weights[i],
    exact: exact[i],
    count: counts[i],
  }));

  let expectedCost = 0;
  let expectedTime = 0;
  table.strata.forEach((s, i) => {
    expectedCost += counts[i] * s.unitCost;
    expectedTime += counts[i] * s.unitTime;
  });

  return {
    method,
    rounding,
    continuousSampleSize: n,
    totalSampleSize,
    allocations,
    allocatedTotal: counts.reduce((a, b) => a + b, 0),
    expectedCost,
    expectedTime,
  };
}
