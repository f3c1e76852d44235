#!/usr/bin/env node
import { formatError } from '../lib/errors/index.js';
import { runCli } from './program.js';

runCli(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(formatError(err));
    process.exitCode = 1;
  },
);
