import chalk, { type ChalkInstance } from 'chalk';
import type { SurveyDesign } from '../design/index.js';
import type { AllocationMethod, AllocationResult } from '../allocation/index.js';

const METHOD_TITLES: Record<AllocationMethod, string> = {
  'proportional': 'Proportional Allocation',
  'neyman': 'Neyman Allocation',
  'cost-optimum': 'Optimum Allocation (Cost)',
  'time-optimum': 'Optimum Allocation (Time)',
};

const RULE = '-'.repeat(41);

export function formatRow(cells: readonly string[]): string {
  const [first, ...rest] = cells;
  return '  ' + first.padEnd(10) + rest.map(c => c.padStart(10)).join('');
}

function formatPercent(share: number): string {
  return `${(share * 100).toFixed(1)}%`;
}

function renderMethod(
  design: SurveyDesign,
  result: AllocationResult,
  index: number,
  palette: ChalkInstance
): string[] {
  const lines: string[] = [];
  const resourceColumn = result.method === 'cost-optimum' ? 'Ch'
    : result.method === 'time-optimum' ? 'Th'
    : undefined;

  lines.push(palette.cyan(`${index}. ${METHOD_TITLES[result.method]} (Total n = ${result.totalSampleSize})`));
  if (resourceColumn) {
    lines.push(palette.dim(`   *Optimized for variable ${resourceColumn === 'Ch' ? 'cost' : 'time'} (${resourceColumn})*`));
  }

  const header = resourceColumn
    ? ['Stratum', resourceColumn, 'Share', 'n_h']
    : ['Stratum', 'Share', 'n_h'];
  lines.push(palette.bold(formatRow(header)));

  design.table.strata.forEach((s, i) => {
    const a = result.allocations[i];
    const cells = resourceColumn
      ? [s.id, String(resourceColumn === 'Ch' ? s.unitCost : s.unitTime), formatPercent(a.allocationWeight), String(a.count)]
      : [s.id, formatPercent(a.allocationWeight), String(a.count)];
    lines.push(formatRow(cells));
  });

  if (result.allocatedTotal !== result.totalSampleSize) {
    lines.push(palette.yellow(`  Allocated total: ${result.allocatedTotal} (rounded per stratum)`));
  }
  lines.push(`  Expected cost: ${result.expectedCost.toFixed(2)}`);
  lines.push(`  Expected time: ${result.expectedTime.toFixed(2)}`);

  return lines;
}

/**
 * Plain-text allocation report. Pass `new Chalk({ level: 0 })` as the
 * palette for uncolored output.
 */
export function renderReport(
  design: SurveyDesign,
  results: readonly AllocationResult[],
  palette: ChalkInstance = chalk
): string {
  const p = design.parameters;
  const lines: string[] = [
    palette.bold('Stratified Sampling Allocation Report'),
    '',
    palette.cyan('Parameters:'),
    `  Population (N): ${p.totalPopulation}`,
    `  Target error (E): ${p.marginOfError.toFixed(2)}`,
    `  Confidence (Z): ${p.confidenceZ.toFixed(2)}`,
    `  Target variance (V): ${p.targetVariance.toFixed(4)}`,
  ];

  results.forEach((result, i) => {
    lines.push('', RULE, ...renderMethod(design, result, i + 1, palette));
  });

  lines.push('');
  return lines.join('\n');
}
