#!/usr/bin/env node
import chalk from 'chalk';
import { createProgram } from './index.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(chalk.red(`error: ${err instanceof Error ? err.message : String(err)}`));
    process.exitCode = 1;
  });
