import type { Differentiable } from './types.js';

/**
 * Named real function of one variable.
 *
 * Subclasses supply the rule in `evaluate`; the derivative is never stored
 * but estimated on demand by a forward difference
 *
 *   f'(x) ≈ (f(x + dx) − f(x)) / dx,   dx = 10^(-precisionDigits) / 10
 *
 * so its error is proportional to dx. Large digit counts shrink dx into
 * floating-point cancellation; there is no adaptive step.
 */
export abstract class RealFunction implements Differentiable {
  private readonly name: string;

  protected constructor(label: string) {
    this.name = `y = ${label}`;
  }

  protected abstract evaluate(x: number): number;

  value(x: number): number {
    return this.evaluate(x);
  }

  derivative(x: number, precisionDigits: number): number {
    const dx = Math.pow(10, -precisionDigits) / 10;
    return (this.evaluate(x + dx) - this.evaluate(x)) / dx;
  }

  getName(): string {
    return this.name;
  }
}

/**
 * y = x^2
 */
export class Square extends RealFunction {
  constructor() {
    super('x^2');
  }

  protected evaluate(x: number): number {
    return x * x;
  }
}

/**
 * y = sin(x)
 */
export class Sine extends RealFunction {
  constructor() {
    super('sin(x)');
  }

  protected evaluate(x: number): number {
    return Math.sin(x);
  }
}

class RuleFunction extends RealFunction {
  constructor(label: string, private readonly rule: (x: number) => number) {
    super(label);
  }

  protected evaluate(x: number): number {
    return this.rule(x);
  }
}

/**
 * Wrap a pure rule as a RealFunction without declaring a subclass.
 * The rule must be total and deterministic on the intervals searched.
 */
export function defineFunction(label: string, rule: (x: number) => number): RealFunction {
  return new RuleFunction(label, rule);
}
