#!/usr/bin/env node

import chalk from 'chalk';
import { describeError } from './lib/errors';
import { createProgram } from './program';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const report = describeError(error);
    console.error(chalk.red('❌ Error:'), report.message);
    process.exitCode = report.exitCode;
  });
