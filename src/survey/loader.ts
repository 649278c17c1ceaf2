import { readFileSync, existsSync } from 'fs';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { parseSurveyConfig, type SurveyConfig } from '../schemas/survey.js';
import { createSurveyDesign, zForConfidence, type SurveyDesign } from '../design/index.js';
import type { AllocationMethod, RoundingMode } from '../allocation/index.js';
import { ConfigError, ParseError } from '../errors/index.js';

export const DEFAULT_SURVEY_FILE = 'survey.yaml';
const DEFAULT_CONFIDENCE_LEVEL = 0.95;

export interface DesignOverrides {
  marginOfError?: number;
  confidenceZ?: number;
  confidenceLevel?: number;
  methods?: AllocationMethod[];
  rounding?: RoundingMode;
}

export interface ResolvedSurvey {
  design: SurveyDesign;
  methods: AllocationMethod[];
  rounding: RoundingMode;
}

function describeIssues(err: ZodError): string {
  return err.issues
    .map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ');
}

/**
 * Reads a survey design file. JSON files load through the same YAML parser.
 */
export function loadSurveyConfig(filePath: string): SurveyConfig {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Survey file not found: ${filePath}`);
  }

  const content = readFileSync(filePath, 'utf-8');
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new ParseError(error.message, filePath);
    }
    throw error;
  }

  try {
    return parseSurveyConfig(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`Invalid survey file ${filePath}: ${describeIssues(error)}`);
    }
    throw error;
  }
}

function resolveConfidenceZ(config: SurveyConfig, overrides: DesignOverrides): number {
  if (overrides.confidenceZ !== undefined) return overrides.confidenceZ;
  if (overrides.confidenceLevel !== undefined) return zForConfidence(overrides.confidenceLevel);
  if (config.precision.confidence_z !== undefined) return config.precision.confidence_z;
  return zForConfidence(config.precision.confidence_level ?? DEFAULT_CONFIDENCE_LEVEL);
}

/**
 * Builds the survey design from a parsed file, letting command-line values
 * take precedence over the file's.
 */
export function resolveSurvey(config: SurveyConfig, overrides: DesignOverrides = {}): ResolvedSurvey {
  const design = createSurveyDesign(
    config.strata.map(s => ({
      id: s.id,
      populationSize: s.population_size,
      stdDev: s.std_dev,
      unitCost: s.unit_cost,
      unitTime: s.unit_time,
    })),
    {
      marginOfError: overrides.marginOfError ?? config.precision.margin_of_error,
      confidenceZ: resolveConfidenceZ(config, overrides),
    }
  );

  return {
    design,
    methods: overrides.methods ?? config.allocation.methods,
    rounding: overrides.rounding ?? config.allocation.rounding,
  };
}
