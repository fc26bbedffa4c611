#!/usr/bin/env node

/**
 * CLI entrypoint. Command logic lives in ./cli/commands.
 */
import chalk from 'chalk';

import { runCli } from './cli/program.js';
import { handleError } from './cli/utils/errors.js';
import { setLogger } from './lib/utils/debug.js';

setLogger((message) => console.error(chalk.yellow(message)));

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.exitCode = handleError(err);
  },
);
