import type { Differentiable, Result } from './types.js';
import type { SearchProblem } from './problem.js';
import { fail, failure, ok } from './errors.js';

export const Command = {
  Quit: 0,
  Function: 1,
  Interval: 2,
  Precision: 3,
  Solve: 4,
} as const;

export type Command = (typeof Command)[keyof typeof Command];

export const COMMAND_PROMPT = 'Command:> ';
export const PAUSE_PROMPT = 'Press <Enter>...';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

export function parseNumber(text: string): Result<number> {
  const trimmed = text.trim();
  if (!DECIMAL.test(trimmed)) {
    return fail(failure('InputParseError', { input: text }));
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    return fail(failure('InputParseError', { input: text }));
  }
  return ok(value);
}

export function parseInteger(text: string): Result<number> {
  const trimmed = text.trim();
  if (!INTEGER.test(trimmed)) {
    return fail(failure('InputParseError', { input: text }));
  }
  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    return fail(failure('InputParseError', { input: text }));
  }
  return ok(value);
}

export function isCommand(value: number): value is Command {
  return Number.isInteger(value) && value >= Command.Quit && value <= Command.Solve;
}

export function mainMenu(selected: Differentiable, problem: SearchProblem): string[] {
  return [
    `${Command.Quit}] Quit`,
    `${Command.Function}] Select function (selected: ${selected.getName()})`,
    `${Command.Interval}] Select interval (selected: ${problem.getBoundsString()})`,
    `${Command.Precision}] Select precision (selected: ${problem.getPrecisionString()})`,
    `${Command.Solve}] Find minimum`,
  ];
}

/**
 * Entry 0 goes back; function i is listed as i + 1.
 */
export function functionMenu(functions: readonly Differentiable[]): string[] {
  return ['0] Back', ...functions.map((fn, i) => `${i + 1}] ${fn.getName()}`)];
}
