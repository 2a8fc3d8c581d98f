import type { Failure, MinimumResult } from './types.js';

// toFixed() only takes 0..100 fraction digits
function fractionDigits(digits: number): number {
  if (!Number.isFinite(digits)) return 0;
  return Math.min(100, Math.max(0, Math.trunc(digits)));
}

/**
 * Interval as `[left;right]` in fixed notation
 */
export function formatBounds(left: number, right: number, digits: number): string {
  const d = fractionDigits(digits);
  return `[${left.toFixed(d)};${right.toFixed(d)}]`;
}

export function formatPrecision(digits: number, epsilon: number): string {
  return `${digits} digits (${epsilon.toFixed(fractionDigits(digits))})`;
}

// Values that round to zero print without a sign
const NEGATIVE_ZERO = /^-0(\.0+)?$/;

export function formatSolution(result: MinimumResult, digits: number): string {
  const fixed = result.x.toFixed(fractionDigits(digits));
  const x = NEGATIVE_ZERO.test(fixed) ? fixed.slice(1) : fixed;
  return `${x} (found in ${result.iterations} iterations)`;
}

export function formatFailure(f: Failure): string {
  return `* ${f.message}`;
}
