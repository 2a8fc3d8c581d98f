import type { GoldenSectionOptions, SearchOutcome } from './types.js';
import { fail, failure, ok } from './errors.js';

export const ITERATION_LIMIT = 10000;

const INV_PHI = 2 / (1 + Math.sqrt(5)); // 1/φ ≈ 0.618034

/**
 * Golden-section search for the minimum of a unimodal function on [left, right].
 *
 * Two interior points split the bracket in the golden ratio, so after each
 * shrink one of them is reused and only one new evaluation is needed per
 * iteration. Stops once the bracket is narrower than `epsilon` and returns
 * its midpoint.
 *
 * Nothing checks that a minimum is actually bracketed: on a monotone
 * function the bracket just collapses onto an endpoint.
 */
export function goldenSectionSearch(
  fn: (x: number) => number,
  left: number,
  right: number,
  epsilon: number,
  options: GoldenSectionOptions = {}
): SearchOutcome {
  const { maxIter = ITERATION_LIMIT, onStep } = options;

  let a = left;
  let b = right;
  let x1 = b - (b - a) * INV_PHI;
  let x2 = a + (b - a) * INV_PHI;
  let y1 = fn(x1);
  let y2 = fn(x2);

  let iterations = 0;
  while (iterations < maxIter) {
    ++iterations;

    if (y1 >= y2) {
      // Minimum is right of x1
      a = x1;
      x1 = x2;
      y1 = y2;
      x2 = a + (b - a) * INV_PHI;
      y2 = fn(x2);
    } else {
      // Minimum is left of x2
      b = x2;
      x2 = x1;
      y2 = y1;
      x1 = b - (b - a) * INV_PHI;
      y1 = fn(x1);
    }

    onStep?.({ iteration: iterations, a, b });

    if (Math.abs(b - a) < epsilon) {
      return ok({ x: (a + b) / 2, iterations });
    }
  }

  return fail(failure('IterationLimitExceeded', { iterations: maxIter }));
}
