import type { Differentiable, Result } from './types.js';
import { Square, Sine } from './functions.js';
import { fail, failure, ok } from './errors.js';

/**
 * Ordered, fixed set of functions addressed by 0-based index.
 */
export class FunctionRegistry {
  private readonly functions: readonly Differentiable[];

  constructor(functions: readonly Differentiable[]) {
    if (functions.length === 0) {
      throw new Error('Registry needs at least one function');
    }
    this.functions = [...functions];
  }

  get(index: number): Result<Differentiable> {
    if (!Number.isInteger(index) || index < 0 || index >= this.functions.length) {
      return fail(failure('IndexOutOfRange', { index, size: this.functions.length }));
    }
    return ok(this.functions[index]);
  }

  size(): number {
    return this.functions.length;
  }

  entries(): readonly Differentiable[] {
    return this.functions;
  }
}

/**
 * Registry with y = x^2 and y = sin(x), in that order
 */
export function createDefaultRegistry(): FunctionRegistry {
  return new FunctionRegistry([new Square(), new Sine()]);
}
