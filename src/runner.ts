import type { Terminal } from './app.js';
import { Session } from './app.js';
import { loadConfig } from './config.js';
import { MinimizerError } from './errors.js';
import { logger } from './logger.js';
import { SearchProblem } from './problem.js';
import { createDefaultRegistry } from './registry.js';
import { createConsoleTerminal } from './terminal.js';

export const EXIT_OK = 0;
export const EXIT_EXPECTED_ERROR = 1;
export const EXIT_UNEXPECTED_ERROR = 2;

export interface CliStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  errors?: NodeJS.WritableStream;
  /** Replaces the readline terminal over input/output/errors */
  terminal?: Terminal;
}

async function startSession(env: Record<string, string | undefined>, streams: CliStreams): Promise<void> {
  const config = loadConfig(env);
  logger.level = config.logLevel;

  const { terminal, close } = streams.terminal
    ? { terminal: streams.terminal, close: () => undefined }
    : createConsoleTerminal(
      streams.input ?? process.stdin,
      streams.output ?? process.stdout,
      streams.errors ?? process.stderr,
    );

  try {
    const session = Session.create({
      registry: createDefaultRegistry(),
      problem: new SearchProblem({ left: config.left, right: config.right, precision: config.precision }),
      terminal,
      functionIndex: config.functionIndex,
    });
    if (!session.ok) {
      throw new MinimizerError(session.failure);
    }
    await session.value.run();
  } finally {
    close();
  }
}

/**
 * Run one interactive session and resolve to the process exit status:
 * 0 on a normal end, 1 on a MinimizerError, 2 on anything else.
 */
export async function runCli(
  env: Record<string, string | undefined> = process.env,
  streams: CliStreams = {},
): Promise<number> {
  const errors = streams.errors ?? process.stderr;

  try {
    await startSession(env, streams);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof MinimizerError) {
      errors.write(`* ${error.message}\n`);
      logger.error({ failure: error.failure }, 'stopped on error');
      return EXIT_EXPECTED_ERROR;
    }
    errors.write('* Unknown error\n');
    logger.fatal({ err: error }, 'unexpected error');
    return EXIT_UNEXPECTED_ERROR;
  }
}
