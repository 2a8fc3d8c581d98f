import type { Logger } from 'pino';
import type { Differentiable, Result } from './types.js';
import type { FunctionRegistry } from './registry.js';
import type { SearchProblem } from './problem.js';
import { ok } from './errors.js';
import { formatFailure, formatSolution } from './format.js';
import {
  Command,
  COMMAND_PROMPT,
  PAUSE_PROMPT,
  functionMenu,
  isCommand,
  mainMenu,
  parseInteger,
  parseNumber,
} from './menu.js';
import { childLogger } from './logger.js';

/**
 * Line-oriented console the session talks to
 */
export interface Terminal {
  /** Show `prompt` and read one line; null once input is exhausted */
  ask(prompt: string): Promise<string | null>;
  print(line: string): void;
  error(line: string): void;
}

export interface SessionOptions {
  registry: FunctionRegistry;
  problem: SearchProblem;
  terminal: Terminal;
  functionIndex?: number;
}

/**
 * Interactive menu loop over one registry and one search problem.
 *
 * Every action reports its failures on the terminal and returns to the
 * menu. Actions resolve to false when input ran out mid-action.
 */
export class Session {
  private readonly registry: FunctionRegistry;
  private readonly problem: SearchProblem;
  private readonly terminal: Terminal;
  private readonly log: Logger;
  private current: number;

  private constructor(options: SessionOptions, current: number) {
    this.registry = options.registry;
    this.problem = options.problem;
    this.terminal = options.terminal;
    this.current = current;
    this.log = childLogger('session');
  }

  static create(options: SessionOptions): Result<Session> {
    const index = options.functionIndex ?? 0;
    const selected = options.registry.get(index);
    if (!selected.ok) {
      return selected;
    }
    return ok(new Session(options, index));
  }

  getSelected(): Differentiable {
    return this.registry.entries()[this.current];
  }

  async run(): Promise<void> {
    for (;;) {
      const command = await this.readCommand();
      if (command === null || command === Command.Quit) {
        this.log.debug('session finished');
        return;
      }

      this.log.debug({ command }, 'command');
      if (!(await this.dispatch(command))) {
        return;
      }
      if ((await this.terminal.ask(PAUSE_PROMPT)) === null) {
        return;
      }
    }
  }

  private dispatch(command: Exclude<Command, typeof Command.Quit>): Promise<boolean> {
    switch (command) {
      case Command.Function:
        return this.selectFunction();
      case Command.Interval:
        return this.selectRange();
      case Command.Precision:
        return this.selectPrecision();
      case Command.Solve:
        this.solve();
        return Promise.resolve(true);
    }
  }

  private async readCommand(): Promise<Command | null> {
    for (const line of mainMenu(this.getSelected(), this.problem)) {
      this.terminal.print(line);
    }
    for (;;) {
      const input = await this.terminal.ask(COMMAND_PROMPT);
      if (input === null) return null;

      const parsed = parseInteger(input);
      if (!parsed.ok) {
        this.terminal.error(formatFailure(parsed.failure));
        continue;
      }
      if (isCommand(parsed.value)) {
        return parsed.value;
      }
    }
  }

  private async selectFunction(): Promise<boolean> {
    for (const line of functionMenu(this.registry.entries())) {
      this.terminal.print(line);
    }

    let choice: number;
    for (;;) {
      const input = await this.terminal.ask(COMMAND_PROMPT);
      if (input === null) return false;

      const parsed = parseInteger(input);
      if (!parsed.ok) {
        this.terminal.error(formatFailure(parsed.failure));
        continue;
      }
      if (parsed.value >= 0 && parsed.value <= this.registry.size()) {
        choice = parsed.value;
        break;
      }
    }

    if (choice === 0) {
      this.terminal.print('Cancelled');
      return true;
    }

    const selected = this.registry.get(choice - 1);
    if (!selected.ok) {
      this.terminal.error(formatFailure(selected.failure));
      return true;
    }
    this.current = choice - 1;
    this.log.debug({ function: selected.value.getName() }, 'function selected');
    this.terminal.print(`Selected ${selected.value.getName()}`);
    return true;
  }

  /**
   * Empty answers keep the current bound.
   */
  private async selectRange(): Promise<boolean> {
    this.terminal.print('An empty line keeps the previous value (in parentheses)');

    const left = await this.readBound('Left', this.problem.getLeft());
    if (left === null) return false;
    if (!left.ok) {
      this.terminal.error(formatFailure(left.failure));
      return true;
    }

    const right = await this.readBound('Right', this.problem.getRight());
    if (right === null) return false;
    if (!right.ok) {
      this.terminal.error(formatFailure(right.failure));
      return true;
    }

    this.problem.setBounds(left.value, right.value);
    this.log.debug({ left: this.problem.getLeft(), right: this.problem.getRight() }, 'interval set');
    this.terminal.print(`Interval set to ${this.problem.getBoundsString()}`);
    return true;
  }

  private async readBound(side: 'Left' | 'Right', current: number): Promise<Result<number> | null> {
    const input = await this.terminal.ask(`${side} bound (${current}): `);
    if (input === null) return null;
    if (input.trim().length === 0) return ok(current);
    return parseNumber(input);
  }

  private async selectPrecision(): Promise<boolean> {
    const input = await this.terminal.ask('Enter precision (digits after the decimal point): ');
    if (input === null) return false;

    const parsed = parseInteger(input);
    if (!parsed.ok) {
      this.terminal.error(formatFailure(parsed.failure));
      return true;
    }

    this.problem.setPrecision(parsed.value);
    this.log.debug({ precision: parsed.value }, 'precision set');
    this.terminal.print(`Precision set to ${this.problem.getPrecisionString()}`);
    return true;
  }

  private solve(): void {
    const fn = this.getSelected();
    const outcome = this.problem.findMinimum(fn);

    if (!outcome.ok) {
      this.log.warn({ function: fn.getName(), failure: outcome.failure }, 'search failed');
      this.terminal.error(formatFailure(outcome.failure));
      return;
    }

    this.log.info({ function: fn.getName(), ...outcome.value }, 'minimum found');
    this.terminal.print(`Minimum: ${formatSolution(outcome.value, this.problem.getPrecision())}`);
  }
}
