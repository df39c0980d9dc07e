#!/usr/bin/env node

import { EXIT_ERROR, run } from './cli.ts';

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = EXIT_ERROR;
  },
);
