import { beforeAll, describe, it, expect } from 'vitest';
import {
  SearchProblem,
  Session,
  createDefaultRegistry,
  type Terminal,
} from '../src/index.js';
import { logger } from '../src/logger.js';

// ── helpers ──────────────────────────────────────────────────

function scripted(lines: string[]) {
  const queue = [...lines];
  const out: string[] = [];
  const err: string[] = [];
  const prompts: string[] = [];

  const terminal: Terminal = {
    async ask(prompt) {
      prompts.push(prompt);
      return queue.shift() ?? null;
    },
    print(line) {
      out.push(line);
    },
    error(line) {
      err.push(line);
    },
  };

  return { terminal, out, err, prompts, queue };
}

async function runScript(lines: string[], problem = new SearchProblem()) {
  const io = scripted(lines);
  const session = Session.create({ registry: createDefaultRegistry(), problem, terminal: io.terminal });
  if (!session.ok) throw new Error(session.failure.message);
  await session.value.run();
  return { ...io, problem, session: session.value };
}

const MAIN_MENU = [
  '0] Quit',
  '1] Select function (selected: y = x^2)',
  '2] Select interval (selected: [-1.00000;1.00000])',
  '3] Select precision (selected: 5 digits (0.00001))',
  '4] Find minimum',
];

beforeAll(() => {
  logger.level = 'silent';
});

describe('Session.create', () => {
  it('should start on the requested function', () => {
    const session = Session.create({
      registry: createDefaultRegistry(),
      problem: new SearchProblem(),
      terminal: scripted([]).terminal,
      functionIndex: 1,
    });

    expect(session.ok && session.value.getSelected().getName()).toBe('y = sin(x)');
  });

  it('should refuse an unknown function index', () => {
    const session = Session.create({
      registry: createDefaultRegistry(),
      problem: new SearchProblem(),
      terminal: scripted([]).terminal,
      functionIndex: 2,
    });

    expect(session.ok).toBe(false);
    if (session.ok) return;
    expect(session.failure.kind).toBe('IndexOutOfRange');
  });
});

describe('Session.run', () => {
  it('should solve with the defaults and quit', async () => {
    const { out, err, prompts } = await runScript(['4', '', '0']);

    expect(out).toEqual([...MAIN_MENU, 'Minimum: 0.00000 (found in 26 iterations)', ...MAIN_MENU]);
    expect(err).toEqual([]);
    expect(prompts).toEqual(['Command:> ', 'Press <Enter>...', 'Command:> ']);
  });

  it('should report a missing minimum and keep going', async () => {
    const { out, err } = await runScript([
      '1', '2', '',
      '2', '0', '3.14159', '',
      '4', '',
      '0',
    ]);

    expect(out).toContain('Selected y = sin(x)');
    expect(out).toContain('Interval set to [0.00000;3.14159]');
    expect(out).toContain('1] Select function (selected: y = sin(x))');
    expect(out).toContain('2] Select interval (selected: [0.00000;3.14159])');
    expect(err).toEqual(['* There seems to be no minimum on the given interval']);
  });

  it('should find the minimum of sin on [1.6; 4.8]', async () => {
    const { out, err } = await runScript([
      '1', '2', '',
      '2', '1.6', '4.8', '',
      '4', '',
      '0',
    ]);

    expect(out).toContain('Minimum: 4.71239 (found in 27 iterations)');
    expect(err).toEqual([]);
  });

  it('should set the precision', async () => {
    const { out, err, prompts, problem } = await runScript(['abc', '9', '3', '3', '', '0']);

    expect(err).toEqual(['* Input error']);
    expect(prompts).toEqual([
      'Command:> ',
      'Command:> ',
      'Command:> ',
      'Enter precision (digits after the decimal point): ',
      'Press <Enter>...',
      'Command:> ',
    ]);
    expect(out).toContain('Precision set to 3 digits (0.001)');
    expect(out).toContain('3] Select precision (selected: 3 digits (0.001))');
    expect(problem.getEpsilon()).toBe(Math.pow(10, -3));
  });

  it('should keep a bound on an empty answer and order the interval', async () => {
    const { out, prompts, problem } = await runScript(['2', '', '-3', '', '0']);

    expect(prompts.slice(1, 3)).toEqual(['Left bound (-1): ', 'Right bound (1): ']);
    expect(out).toContain('An empty line keeps the previous value (in parentheses)');
    expect(out).toContain('Interval set to [-3.00000;-1.00000]');
    expect([problem.getLeft(), problem.getRight()]).toEqual([-3, -1]);
  });

  it('should leave the interval alone when a bound does not parse', async () => {
    const { err, prompts, problem } = await runScript(['2', 'x', '', '0']);

    expect(err).toEqual(['* Input error']);
    expect(prompts).toEqual(['Command:> ', 'Left bound (-1): ', 'Press <Enter>...', 'Command:> ']);
    expect([problem.getLeft(), problem.getRight()]).toEqual([-1, 1]);
  });

  it('should cancel function selection on 0 and re-prompt out of range', async () => {
    const { out, prompts, session } = await runScript(['1', '5', '0', '', '0']);

    expect(out.slice(5, 9)).toEqual(['0] Back', '1] y = x^2', '2] y = sin(x)', 'Cancelled']);
    expect(prompts.slice(0, 3)).toEqual(['Command:> ', 'Command:> ', 'Command:> ']);
    expect(session.getSelected().getName()).toBe('y = x^2');
  });

  it('should stop when input ends in the middle of an action', async () => {
    const { prompts, problem } = await runScript(['2']);

    expect(prompts).toEqual(['Command:> ', 'Left bound (-1): ']);
    expect(problem.getLeft()).toBe(-1);
  });

  it('should stop when input ends at the menu', async () => {
    const { out, prompts } = await runScript([]);

    expect(out).toEqual(MAIN_MENU);
    expect(prompts).toEqual(['Command:> ']);
  });
});
