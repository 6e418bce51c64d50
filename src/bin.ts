#!/usr/bin/env node
import { PREFIX, run } from './cli';

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`${PREFIX} Unexpected error:`, error);
    process.exitCode = 1;
  },
);
