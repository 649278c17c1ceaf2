import { InvalidParameterError } from '../errors/index.js';

export interface Precision {
  /** E: largest acceptable absolute error of the estimated mean */
  marginOfError: number;
  /** Z: standard normal quantile for the confidence level */
  confidenceZ: number;
}

export interface SurveyParameters extends Readonly<Precision> {
  readonly totalPopulation: number;
  /** V = (E / Z)^2 */
  readonly targetVariance: number;
}

// Two-sided z-scores for the confidence levels surveys are usually planned at
const Z_SCORES: ReadonlyMap<number, number> = new Map([
  [0.80, 1.2816],
  [0.85, 1.4395],
  [0.90, 1.6449],
  [0.95, 1.96],
  [0.98, 2.3263],
  [0.99, 2.5758],
  [0.995, 2.807],
  [0.999, 3.2905],
]);

export const SUPPORTED_CONFIDENCE_LEVELS: readonly number[] = Object.freeze([...Z_SCORES.keys()]);

export function zForConfidence(level: number): number {
  const z = Z_SCORES.get(level);
  if (z === undefined) {
    throw new InvalidParameterError(
      `Unsupported confidence level: ${level}. Use one of ${SUPPORTED_CONFIDENCE_LEVELS.join(', ')}.`,
      'confidenceLevel'
    );
  }
  return z;
}

export function targetVariance(marginOfError: number, confidenceZ: number): number {
  if (!Number.isFinite(marginOfError) || marginOfError <= 0) {
    throw new InvalidParameterError(
      `Invalid marginOfError: ${marginOfError}. Must be a positive number.`,
      'marginOfError'
    );
  }
  if (!Number.isFinite(confidenceZ) || confidenceZ <= 0) {
    throw new InvalidParameterError(
      `Invalid confidenceZ: ${confidenceZ}. Must be a positive number.`,
      'confidenceZ'
    );
  }
  return (marginOfError / confidenceZ) ** 2;
}

export function createSurveyParameters(precision: Precision, totalPopulation: number): SurveyParameters {
  return Object.freeze({
    totalPopulation,
    marginOfError: precision.marginOfError,
    confidenceZ: precision.confidenceZ,
    targetVariance: targetVariance(precision.marginOfError, precision.confidenceZ),
  });
}
