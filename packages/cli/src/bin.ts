#!/usr/bin/env node
import { loadLoggingFromEnv } from '@trackline/engine';
import { createProgram } from './cli.js';

loadLoggingFromEnv();

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 2;
  });
