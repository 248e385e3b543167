/**
 * Error taxonomy for the failover engine
 */

/** Required configuration missing or invalid - fatal before any cycle runs */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Metrics source unreachable, timed out, or returned unusable data */
export class MetricsUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MetricsUnavailableError';
  }
}

/** Connection scorer failed; score-based trigger is skipped for the cycle */
export class ScorerUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScorerUnavailableError';
  }
}

/** Persisted state could not be parsed */
export class StateCorruptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateCorruptionError';
  }
}

/** State lock could not be acquired before its timeout */
export class StateLockError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateLockError';
  }
}

/**
 * Errors raised by fs are not `instanceof Error` when they cross a realm boundary (e.g. a Jest sandbox),
 * so system error codes and messages are read structurally
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
