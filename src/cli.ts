#!/usr/bin/env node
import { EXIT_UNEXPECTED_ERROR, runCli } from './runner.js';

runCli().then(
  (code) => {
    process.exitCode = code;
  },
  () => {
    process.exitCode = EXIT_UNEXPECTED_ERROR;
  },
);
