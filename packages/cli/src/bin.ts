#!/usr/bin/env node
import { createProgram } from './cli';

createProgram({
  write: (text) => process.stdout.write(text),
  warn: (text) => process.stderr.write(text)
})
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
