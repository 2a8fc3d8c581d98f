export type FailureKind =
  | 'IndexOutOfRange'
  | 'InputParseError'
  | 'NoMinimumInRange'
  | 'IterationLimitExceeded'
  | 'InvalidConfiguration';

export interface Failure {
  kind: FailureKind;
  message: string;
  details?: Record<string, string | number>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; failure: Failure };

/**
 * A real function of one variable the search can evaluate.
 */
export interface Differentiable {
  value(x: number): number;
  /** Forward-difference slope with step 10^(-precisionDigits) / 10 */
  derivative(x: number, precisionDigits: number): number;
  getName(): string;
}

export interface MinimumResult {
  x: number;
  iterations: number;
}

export type SearchOutcome = Result<MinimumResult>;

export interface SearchStep {
  iteration: number;
  a: number;
  b: number;
}

export interface GoldenSectionOptions {
  maxIter?: number;
  onStep?: (step: SearchStep) => void;
}
