import chalk from 'chalk';

import {
  AuthorityError,
  InvalidArgumentError,
  LifecycleError,
  OperationCancelledError,
  ValidationTimeoutError,
} from '../../lib/errors/lifecycle-errors.js';
import { errorMessage } from '../../lib/utils/fs.js';

export const EXIT_CODE = {
  OK: 0,
  UNEXPECTED: 1,
  INVALID_ARGUMENTS: 2,
  CONFIGURATION: 3,
  VALIDATION_TIMEOUT: 4,
  AUTHORITY: 5,
  DNS_PROVIDER: 6,
  IO: 7,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof OperationCancelledError) return EXIT_CODE.CANCELLED;
  if (error instanceof InvalidArgumentError) return EXIT_CODE.INVALID_ARGUMENTS;
  if (!(error instanceof LifecycleError)) return EXIT_CODE.UNEXPECTED;

  switch (error.category) {
    case 'configuration':
      return EXIT_CODE.CONFIGURATION;
    case 'validation':
      return EXIT_CODE.VALIDATION_TIMEOUT;
    case 'authority':
      return EXIT_CODE.AUTHORITY;
    case 'dns':
      return EXIT_CODE.DNS_PROVIDER;
    case 'io':
      return EXIT_CODE.IO;
    default:
      return EXIT_CODE.UNEXPECTED;
  }
}

/** Print a command failure to stderr and return the exit code for it. */
export function handleError(error: unknown): ExitCode {
  const code = exitCodeFor(error);

  if (error instanceof ValidationTimeoutError) {
    console.error(chalk.red('Error:'), error.message);
    console.error(chalk.gray('The TXT record may need more time to propagate; try --propagation-seconds.'));
  } else if (error instanceof AuthorityError && error.problemType) {
    console.error(chalk.red('Error:'), error.message);
    console.error(chalk.gray(`Problem type: ${error.problemType}`));
  } else if (error instanceof OperationCancelledError) {
    console.error(chalk.yellow('Cancelled'));
  } else {
    console.error(chalk.red('Error:'), errorMessage(error));
  }

  return code;
}
