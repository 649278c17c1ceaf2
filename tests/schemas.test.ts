import { describe, it, expect } from 'vitest';
import { parseSurveyConfig, StratumConfigSchema } from '../src/schemas/survey.js';

const stratum = { id: 'north', population_size: 500, std_dev: 3, unit_cost: 2, unit_time: 1 };

describe('Survey schema', () => {
  it('validates a minimal survey and fills defaults', () => {
    const config = parseSurveyConfig({
      precision: { margin_of_error: 1 },
      strata: [stratum],
    });
    expect(config.version).toBe('1.0.0');
    expect(config.allocation).toEqual({
      methods: ['proportional', 'neyman', 'cost-optimum'],
      rounding: 'independent',
    });
    expect(config.precision.confidence_z).toBeUndefined();
  });

  it('reads numeric stratum ids as strings', () => {
    expect(StratumConfigSchema.parse({ ...stratum, id: 3 }).id).toBe('3');
  });

  it('rejects a survey without strata', () => {
    expect(() => parseSurveyConfig({ precision: { margin_of_error: 1 }, strata: [] })).toThrow();
  });

  it('rejects a non-integer population size', () => {
    expect(() => StratumConfigSchema.parse({ ...stratum, population_size: 10.5 })).toThrow();
  });

  it('rejects a zero unit cost', () => {
    expect(() => StratumConfigSchema.parse({ ...stratum, unit_cost: 0 })).toThrow();
  });

  it('rejects both confidence_z and confidence_level', () => {
    expect(() => parseSurveyConfig({
      precision: { margin_of_error: 1, confidence_z: 1.96, confidence_level: 0.95 },
      strata: [stratum],
    })).toThrow();
  });

  it('rejects an unknown allocation method', () => {
    expect(() => parseSurveyConfig({
      precision: { margin_of_error: 1 },
      allocation: { methods: ['random'] },
      strata: [stratum],
    })).toThrow();
  });
});
