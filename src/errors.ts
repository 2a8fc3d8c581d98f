import type { Failure, FailureKind, Result } from './types.js';

const MESSAGES: Record<FailureKind, string> = {
  IndexOutOfRange: 'Invalid function index',
  InputParseError: 'Input error',
  NoMinimumInRange: 'There seems to be no minimum on the given interval',
  IterationLimitExceeded: 'Iteration limit reached',
  InvalidConfiguration: 'Missing or invalid environment variables',
};

export function failure(
  kind: FailureKind,
  details?: Record<string, string | number>,
  message: string = MESSAGES[kind],
): Failure {
  return details === undefined ? { kind, message } : { kind, message, details };
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(f: Failure): Result<T> {
  return { ok: false, failure: f };
}

/**
 * Carries a Failure across a boundary that only speaks exceptions.
 */
export class MinimizerError extends Error {
  readonly failure: Failure;

  constructor(f: Failure) {
    super(f.message);
    this.name = 'MinimizerError';
    this.failure = f;
  }

  get kind(): FailureKind {
    return this.failure.kind;
  }
}
