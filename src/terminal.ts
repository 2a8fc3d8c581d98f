import * as readline from 'node:readline';
import type { Terminal } from './app.js';

/**
 * Terminal over plain streams. Prompts go to `output` without a newline;
 * input is consumed line by line until the stream ends.
 */
export function createConsoleTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
  errors: NodeJS.WritableStream = process.stderr,
): { terminal: Terminal; close: () => void } {
  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  const terminal: Terminal = {
    async ask(prompt) {
      output.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    print(line) {
      output.write(`${line}\n`);
    },
    error(line) {
      errors.write(`${line}\n`);
    },
  };

  return { terminal, close: () => rl.close() };
}
