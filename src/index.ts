// Functions
export { RealFunction, Square, Sine, defineFunction } from './functions.js';
export { FunctionRegistry, createDefaultRegistry } from './registry.js';

// Search
export { SearchProblem, type SearchProblemOptions } from './problem.js';
export { goldenSectionSearch, ITERATION_LIMIT } from './optimizer.js';

// Presentation
export { formatBounds, formatPrecision, formatSolution, formatFailure } from './format.js';

// Errors
export { MinimizerError, failure, ok, fail } from './errors.js';

// Interactive layer
export { Session, type Terminal, type SessionOptions } from './app.js';
export { createConsoleTerminal } from './terminal.js';
export {
  runCli,
  EXIT_OK,
  EXIT_EXPECTED_ERROR,
  EXIT_UNEXPECTED_ERROR,
  type CliStreams,
} from './runner.js';
export { Command, parseNumber, parseInteger, mainMenu, functionMenu } from './menu.js';
export { loadConfig, type MinimizerConfig } from './config.js';

// Types
export type {
  Differentiable,
  Failure,
  FailureKind,
  Result,
  MinimumResult,
  SearchOutcome,
  SearchStep,
  GoldenSectionOptions,
} from './types.js';
