import type { Differentiable, MinimumResult, SearchOutcome } from './types.js';
import { goldenSectionSearch, ITERATION_LIMIT } from './optimizer.js';
import { fail, failure } from './errors.js';
import { formatBounds, formatPrecision, formatSolution } from './format.js';

export interface SearchProblemOptions {
  left?: number;
  right?: number;
  precision?: number;
}

/**
 * Interval minimum search
 *
 * Holds the interval [left; right], the precision in decimal digits and the
 * tolerance ε = 10^(-precision) derived from it, plus the outcome of the
 * last search. The derivative step used by the bracketing check is tied
 * to the same precision digits.
 *
 * Negative precision is accepted and simply yields ε > 1.
 */
export class SearchProblem {
  static readonly ITERATION_LIMIT = ITERATION_LIMIT;

  private left = -1;
  private right = 1;
  private precision = 5;
  private epsilon = Math.pow(10, -5);
  private result: MinimumResult | null = null;

  constructor(options: SearchProblemOptions = {}) {
    this.setBounds(options.left ?? -1, options.right ?? 1);
    this.setPrecision(options.precision ?? 5);
  }

  getLeft(): number {
    return this.left;
  }

  getRight(): number {
    return this.right;
  }

  getPrecision(): number {
    return this.precision;
  }

  getEpsilon(): number {
    return this.epsilon;
  }

  /**
   * Iterations used by the last successful search, 0 when there is none
   */
  getIterations(): number {
    return this.result?.iterations ?? 0;
  }

  hasResult(): boolean {
    return this.result !== null;
  }

  getResult(): MinimumResult | null {
    return this.result;
  }

  setBounds(a: number, b: number): void {
    this.left = a < b ? a : b;
    this.right = a < b ? b : a;
    this.result = null;
  }

  setPrecision(digits: number): void {
    this.precision = digits;
    this.epsilon = Math.pow(10, -digits);
    this.result = null;
  }

  /**
   * Necessary condition for an interior minimum: the function falls at the
   * left end and rises at the right end. Only meaningful for unimodal
   * functions; with several extrema in range it can reject a valid
   * interval or accept one that holds a maximum too.
   */
  hasMinimumCandidate(fn: Differentiable): boolean {
    return fn.derivative(this.left, this.precision) < 0
      && fn.derivative(this.right, this.precision) > 0;
  }

  findMinimum(fn: Differentiable): SearchOutcome {
    this.result = null;

    if (!this.hasMinimumCandidate(fn)) {
      return fail(failure('NoMinimumInRange', { left: this.left, right: this.right }));
    }

    const outcome = goldenSectionSearch(
      (x) => fn.value(x),
      this.left,
      this.right,
      this.epsilon,
    );

    if (outcome.ok) {
      this.result = outcome.value;
    }
    return outcome;
  }

  getBoundsString(): string {
    return formatBounds(this.left, this.right, this.precision);
  }

  getPrecisionString(): string {
    return formatPrecision(this.precision, this.epsilon);
  }

  /**
   * Null until a search succeeds
   */
  getSolutionString(): string | null {
    return this.result === null ? null : formatSolution(this.result, this.precision);
  }
}
