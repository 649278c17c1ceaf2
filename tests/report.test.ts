import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { renderReport, formatRow } from '../src/report/index.js';
import { allocateAll } from '../src/allocation/index.js';
import { createSurveyDesign } from '../src/design/index.js';
import { FOUR_STRATA, PRECISION } from './fixtures/strata.js';

const plain = new Chalk({ level: 0 });
const design = createSurveyDesign(FOUR_STRATA, PRECISION);

describe('formatRow', () => {
  it('left-aligns the first column and right-aligns the rest', () => {
    expect(formatRow(['1', '40.0%', '315'])).toBe('  1              40.0%       315');
  });
});

describe('renderReport', () => {
  const lines = renderReport(design, allocateAll(design), plain).split('\n');

  it('starts with the survey parameters', () => {
    expect(lines.slice(0, 7)).toEqual([
      'Stratified Sampling Allocation Report',
      '',
      'Parameters:',
      '  Population (N): 10000',
      '  Target error (E): 1.50',
      '  Confidence (Z): 1.96',
      '  Target variance (V): 0.5857',
    ]);
  });

  it('lists the proportional allocation per stratum', () => {
    const start = lines.indexOf('1. Proportional Allocation (Total n = 787)');
    expect(start).toBeGreaterThan(0);
    expect(lines.slice(start + 1, start + 8)).toEqual([
      formatRow(['Stratum', 'Share', 'n_h']),
      formatRow(['1', '40.0%', '315']),
      formatRow(['2', '30.0%', '236']),
      formatRow(['3', '20.0%', '157']),
      formatRow(['4', '10.0%', '79']),
      '  Expected cost: 4722.00',
      '  Expected time: 1180.50',
    ]);
  });

  it('shows unit cost and the rounding gap for cost-optimum', () => {
    const start = lines.indexOf('3. Optimum Allocation (Cost) (Total n = 645)');
    expect(start).toBeGreaterThan(0);
    expect(lines.slice(start + 1, start + 10)).toEqual([
      '   *Optimized for variable cost (Ch)*',
      formatRow(['Stratum', 'Ch', 'Share', 'n_h']),
      formatRow(['1', '4', '25.5%', '165']),
      formatRow(['2', '6', '31.3%', '202']),
      formatRow(['3', '8', '27.1%', '175']),
      formatRow(['4', '10', '16.1%', '104']),
      '  Allocated total: 646 (rounded per stratum)',
      '  Expected cost: 4312.00',
      '  Expected time: 1078.00',
    ]);
  });

  it('omits the rounding gap line when counts add up', () => {
    const start = lines.indexOf('2. Neyman Allocation (Total n = 630)');
    expect(lines[start + 6]).toBe('  Expected cost: 4410.00');
  });

  it('shows unit time for time-optimum', () => {
    const report = renderReport(design, allocateAll(design, ['time-optimum']), plain).split('\n');
    expect(report).toContain('1. Optimum Allocation (Time) (Total n = 645)');
    expect(report).toContain(formatRow(['2', '1.5', '31.3%', '202']));
  });
});
