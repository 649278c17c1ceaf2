import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { resolve } from 'path';
import { DEFAULT_SURVEY_FILE, loadSurveyConfig, resolveSurvey } from '../survey/index.js';
import {
  allocateAll,
  isAllocationMethod,
  type AllocationMethod,
  type AllocationResult,
} from '../allocation/index.js';
import type { SurveyDesign } from '../design/index.js';
import { renderReport } from '../report/index.js';
import { exitCodeFor, formatError, InvalidParameterError } from '../errors/index.js';

interface AllocateOptions {
  margin?: number;
  z?: number;
  confidence?: number;
  method?: string[];
  reconcile?: boolean;
  json?: boolean;
}

function parsePositive(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError(`must be a positive number (got "${value}")`);
  }
  return n;
}

function parseLevel(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0 || n >= 1) {
    throw new InvalidArgumentError(`must be between 0 and 1 (got "${value}")`);
  }
  return n;
}

function parseMethods(names: string[] | undefined): AllocationMethod[] | undefined {
  if (!names) return undefined;
  return names.map(name => {
    if (!isAllocationMethod(name)) {
      throw new InvalidParameterError(`Unknown allocation method: ${name}`, 'methods');
    }
    return name;
  });
}

function toJsonReport(design: SurveyDesign, results: readonly AllocationResult[]): unknown {
  return {
    parameters: design.parameters,
    strata: design.table.strata,
    results,
  };
}

export function createAllocateCommand(): Command {
  return new Command('allocate')
    .description('Compute sample sizes and stratum allocations for a survey design')
    .argument('[file]', 'Survey design file (YAML or JSON)', DEFAULT_SURVEY_FILE)
    .option('--margin <error>', 'Margin of error E, overrides the file', parsePositive)
    .option('--z <score>', 'Confidence z-score Z, overrides the file', parsePositive)
    .option('--confidence <level>', 'Confidence level (e.g. 0.95) looked up as Z', parseLevel)
    .option('--method <names...>', 'Methods to run (proportional, neyman, cost-optimum, time-optimum)')
    .option('--reconcile', 'Reconcile rounded counts to the total by largest remainder')
    .option('--json', 'Output as JSON')
    .action((file: string, options: AllocateOptions) => {
      try {
        const config = loadSurveyConfig(resolve(process.cwd(), file));
        const { design, methods, rounding } = resolveSurvey(config, {
          marginOfError: options.margin,
          confidenceZ: options.z,
          confidenceLevel: options.confidence,
          methods: parseMethods(options.method),
          rounding: options.reconcile ? 'largest-remainder' : undefined,
        });

        const results = allocateAll(design, methods, { rounding });

        if (options.json) {
          console.log(JSON.stringify(toJsonReport(design, results), null, 2));
        } else {
          console.log(renderReport(design, results));
        }
      } catch (error) {
        if (error instanceof Error) {
          console.error(chalk.red(formatError(error, options.json ? 'json' : 'text')));
          process.exit(exitCodeFor(error));
        }
        throw error;
      }
    });
}
