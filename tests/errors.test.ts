import { describe, it, expect } from 'vitest';
import {
  StratallocError, ConfigError, ParseError, InvalidParameterError, DegenerateVarianceError,
  exitCodeFor, formatError
} from '../src/errors/index.js';

describe('Error Classes', () => {
  it('ConfigError has correct exit code', () => {
    const err = new ConfigError('Survey file not found');
    expect(exitCodeFor(err)).toBe(10);
    expect(err.code).toBe('CONFIG_ERROR');
  });

  it('ParseError has correct exit code', () => {
    const err = new ParseError('bad indentation', 'survey.yaml');
    expect(exitCodeFor(err)).toBe(30);
  });

  it('InvalidParameterError has correct exit code', () => {
    const err = new InvalidParameterError('Invalid marginOfError: 0', 'marginOfError');
    expect(exitCodeFor(err)).toBe(40);
    expect(err).toBeInstanceOf(StratallocError);
  });

  it('DegenerateVarianceError has correct exit code', () => {
    const err = new DegenerateVarianceError('Variance bound must be positive', -0.95);
    expect(exitCodeFor(err)).toBe(50);
    expect(err.denominator).toBe(-0.95);
  });

  it('falls back to 1 for unknown errors', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor(new StratallocError('boom', 'X'))).toBe(1);
  });

  it('formats errors for JSON output', () => {
    const err = new InvalidParameterError('Invalid unitCost for stratum 2: 0', 'unitCost');
    const formatted = formatError(err, 'json');
    expect(JSON.parse(formatted)).toEqual({
      error: 'InvalidParameterError',
      message: 'Invalid unitCost for stratum 2: 0',
      exitCode: 40,
      parameter: 'unitCost',
    });
  });

  it('includes the file for parse errors', () => {
    const formatted = formatError(new ParseError('bad mapping', 'survey.yaml'), 'json');
    expect(JSON.parse(formatted)).toMatchObject({ error: 'ParseError', file: 'survey.yaml', exitCode: 30 });
  });

  it('formats errors for text output', () => {
    const err = new ConfigError('Bad config');
    expect(formatError(err, 'text')).toBe('Error [ConfigError]: Bad config');
  });
});
