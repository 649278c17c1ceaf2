export { proportionalAllocation } from './proportional.js';
export { neymanAllocation } from './neyman.js';
export {
  optimumAllocation,
  costOptimumAllocation,
  timeOptimumAllocation,
} from './optimum.js';
export type { OptimumResource } from './optimum.js';
export {
  roundHalfEven,
  varianceBound,
  weightedVariance,
} from './common.js';
export type {
  AllocationMethod,
  AllocationOptions,
  AllocationResult,
  RoundingMode,
  StratumAllocation,
} from './common.js';

import type { SurveyDesign } from '../design/index.js';
import { InvalidParameterError } from '../errors/index.js';
import type { AllocationMethod, AllocationOptions, AllocationResult } from './common.js';
import { proportionalAllocation } from './proportional.js';
import { neymanAllocation } from './neyman.js';
import { costOptimumAllocation, timeOptimumAllocation } from './optimum.js';

export const ALLOCATION_METHODS: readonly AllocationMethod[] = Object.freeze([
  'proportional',
  'neyman',
  'cost-optimum',
  'time-optimum',
]);

export const DEFAULT_METHODS: readonly AllocationMethod[] = Object.freeze([
  'proportional',
  'neyman',
  'cost-optimum',
]);

export function isAllocationMethod(value: string): value is AllocationMethod {
  return (ALLOCATION_METHODS as readonly string[]).includes(value);
}

export function allocate(
  design: SurveyDesign,
  method: AllocationMethod,
  options: AllocationOptions = {}
): AllocationResult {
  const { table, parameters } = design;

  switch (method) {
    case 'proportional':
      return proportionalAllocation(table, parameters.targetVariance, options);
    case 'neyman':
      return neymanAllocation(table, parameters.targetVariance, options);
    case 'cost-optimum':
      return costOptimumAllocation(table, parameters.targetVariance, options);
    case 'time-optimum':
      return timeOptimumAllocation(table, parameters.targetVariance, options);
  }
}

/**
 * Runs each requested method against the same design. Results come back in
 * the order the methods were given.
 */
export function allocateAll(
  design: SurveyDesign,
  methods: readonly AllocationMethod[] = DEFAULT_METHODS,
  options: AllocationOptions = {}
): AllocationResult[] {
  if (methods.length === 0) {
    throw new InvalidParameterError('At least one allocation method is required', 'methods');
  }
  if (new Set(methods).size !== methods.length) {
    throw new InvalidParameterError(`Duplicate allocation method in: ${methods.join(', ')}`, 'methods');
  }
  return methods.map(m => allocate(design, m, options));
}
