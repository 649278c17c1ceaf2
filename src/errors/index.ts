export class StratallocError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'StratallocError';
  }
}

/**
 * A survey input that no allocation can be computed from: a non-positive
 * margin or z-score, a stratum with Nh <= 0, Sh < 0, Ch <= 0 or Th <= 0.
 */
export class InvalidParameterError extends StratallocError {
  constructor(message: string, public readonly parameter?: string) {
    super(message, 'INVALID_PARAMETER');
    this.name = 'InvalidParameterError';
  }
}

/**
 * The variance bound V + (1/N)·Σ Wh·Sh² came out non-positive, so the
 * sample size it divides into is undefined.
 */
export class DegenerateVarianceError extends StratallocError {
  constructor(message: string, public readonly denominator: number) {
    super(message, 'DEGENERATE_VARIANCE');
    this.name = 'DegenerateVarianceError';
  }
}

export class ConfigError extends StratallocError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class ParseError extends StratallocError {
  constructor(message: string, public readonly file?: string) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

// Exit code mapping
const EXIT_CODES: Record<string, number> = {
  ConfigError: 10,
  ParseError: 30,
  InvalidParameterError: 40,
  DegenerateVarianceError: 50,
  StratallocError: 1,
};

export function exitCodeFor(err: Error): number {
  return EXIT_CODES[err.name] ?? 1;
}

export function formatError(err: Error, format: 'json' | 'text' = 'text'): string {
  const exitCode = exitCodeFor(err);

  if (format === 'json') {
    return JSON.stringify({
      error: err.name,
      message: err.message,
      exitCode,
      ...(err instanceof ParseError && err.file ? { file: err.file } : {}),
      ...(err instanceof InvalidParameterError && err.parameter ? { parameter: err.parameter } : {}),
    }, null, 2);
  }

  return `Error [${err.name}]: ${err.message}`;
}
