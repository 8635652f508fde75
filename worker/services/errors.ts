export type GenerationErrorCode =
  | 'INVALID_DISTRIBUTION'
  | 'INVALID_RANGE'
  | 'INSUFFICIENT_POPULATION'
  | 'INVALID_CONFIG';

export class GenerationError extends Error {
  code: GenerationErrorCode;

  constructor(code: GenerationErrorCode, message: string) {
    super(message);
    this.name = 'GenerationError';
    this.code = code;
  }
}

/** Malformed weights or probabilities. */
export class InvalidDistributionError extends GenerationError {
  constructor(message: string) {
    super('INVALID_DISTRIBUTION', message);
    this.name = 'InvalidDistributionError';
  }
}

/** Inverted or empty sampling range, or a draw outside [0, 1). */
export class InvalidRangeError extends GenerationError {
  constructor(message: string) {
    super('INVALID_RANGE', message);
    this.name = 'InvalidRangeError';
  }
}

export class InsufficientPopulationError extends GenerationError {
  requested: number;
  available: number;

  constructor(requested: number, available: number) {
    super('INSUFFICIENT_POPULATION', `Cannot sample ${requested} items from a population of ${available}.`);
    this.name = 'InsufficientPopulationError';
    this.requested = requested;
    this.available = available;
  }
}

export class ConfigError extends GenerationError {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('INVALID_CONFIG', issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
