export class ValidationError extends Error {
  code = 'VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class AdvisoryError extends Error {
  code = 'ADVISORY_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'AdvisoryError';
  }
}

export class CoachingPersistenceError extends Error {
  code = 'COACHING_PERSISTENCE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'CoachingPersistenceError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidSessionTransitionError extends Error {
  code = 'INVALID_SESSION_TRANSITION';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'InvalidSessionTransitionError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
