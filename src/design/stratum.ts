import { InvalidParameterError } from '../errors/index.js';

export interface StratumInput {
  id: string;
  /** Nh: units in the stratum */
  populationSize: number;
  /** Sh: within-stratum standard deviation */
  stdDev: number;
  /** Ch: cost of sampling one unit */
  unitCost: number;
  /** Th: time to sample one unit */
  unitTime: number;
}

export interface Stratum extends Readonly<StratumInput> {
  /** Wh = Nh / N */
  readonly weight: number;
}

export interface StratumTable {
  readonly strata: readonly Stratum[];
  readonly totalPopulation: number;
}

function validateStratum(s: StratumInput): void {
  const label = `stratum ${s.id}`;

  if (!Number.isInteger(s.populationSize) || s.populationSize <= 0) {
    throw new InvalidParameterError(
      `Invalid populationSize for ${label}: ${s.populationSize}. Must be a positive integer.`,
      'populationSize'
    );
  }
  if (!Number.isFinite(s.stdDev) || s.stdDev < 0) {
    throw new InvalidParameterError(
      `Invalid stdDev for ${label}: ${s.stdDev}. Must be a non-negative number.`,
      'stdDev'
    );
  }
  if (!Number.isFinite(s.unitCost) || s.unitCost <= 0) {
    throw new InvalidParameterError(
      `Invalid unitCost for ${label}: ${s.unitCost}. Must be a positive number.`,
      'unitCost'
    );
  }
  if (!Number.isFinite(s.unitTime) || s.unitTime <= 0) {
    throw new InvalidParameterError(
      `Invalid unitTime for ${label}: ${s.unitTime}. Must be a positive number.`,
      'unitTime'
    );
  }
}

/**
 * Validates the strata and derives each stratum's population weight.
 * The returned table and every stratum in it are frozen.
 */
export function buildStratumTable(inputs: readonly StratumInput[]): StratumTable {
  if (inputs.length === 0) {
    throw new InvalidParameterError('At least one stratum is required', 'strata');
  }

  const seen = new Set<string>();
  for (const s of inputs) {
    if (s.id.trim() === '') {
      throw new InvalidParameterError('Stratum id must not be empty', 'id');
    }
    if (seen.has(s.id)) {
      throw new InvalidParameterError(`Duplicate stratum id: ${s.id}`, 'id');
    }
    seen.add(s.id);
    validateStratum(s);
  }

  const totalPopulation = inputs.reduce((sum, s) => sum + s.populationSize, 0);

  const strata = inputs.map(s => Object.freeze({
    id: s.id,
    populationSize: s.populationSize,
    stdDev: s.stdDev,
    unitCost: s.unitCost,
    unitTime: s.unitTime,
    weight: s.populationSize / totalPopulation,
  }));

  return Object.freeze({ strata: Object.freeze(strata), totalPopulation });
}

/**
 * Returns a new table with one stratum's fields replaced. Weights are
 * recomputed since the population total may change.
 */
export function replaceStratum(
  table: StratumTable,
  id: string,
  patch: Partial<Omit<StratumInput, 'id'>>
): StratumTable {
  if (!table.strata.some(s => s.id === id)) {
    throw new InvalidParameterError(`Unknown stratum id: ${id}`, 'id');
  }

  return buildStratumTable(table.strata.map(s => {
    const input: StratumInput = {
      id: s.id,
      populationSize: s.populationSize,
      stdDev: s.stdDev,
      unitCost: s.unitCost,
      unitTime: s.unitTime,
    };
    return s.id === id ? { ...input, ...patch } : input;
  }));
}
