export { buildStratumTable, replaceStratum } from './stratum.js';
export type { Stratum, StratumInput, StratumTable } from './stratum.js';
export {
  createSurveyParameters,
  targetVariance,
  zForConfidence,
  SUPPORTED_CONFIDENCE_LEVELS,
} from './parameters.js';
export type { Precision, SurveyParameters } from './parameters.js';

import { buildStratumTable, type StratumInput, type StratumTable } from './stratum.js';
import { createSurveyParameters, type Precision, type SurveyParameters } from './parameters.js';

export interface SurveyDesign {
  readonly table: StratumTable;
  readonly parameters: SurveyParameters;
}

export function createSurveyDesign(strata: readonly StratumInput[], precision: Precision): SurveyDesign {
  const table = buildStratumTable(strata);
  const parameters = createSurveyParameters(precision, table.totalPopulation);
  return Object.freeze({ table, parameters });
}
