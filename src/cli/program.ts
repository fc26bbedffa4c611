import { Command, CommanderError } from 'commander';

import type { Env } from '../lib/config.js';
import { getPackageInfo } from '../lib/utils/user-agent.js';
import { handleCredentialsCommand } from './commands/credentials.js';
import { handleIssueCommand } from './commands/issue.js';
import { handleRenewCommand } from './commands/renew.js';
import { createLifecycle, type LifecycleFactory } from './context.js';
import { EXIT_CODE, handleError } from './utils/errors.js';

/** What commands need from the outside world; tests substitute these. */
export interface CommandDependencies {
  env: Env;
  createLifecycle: LifecycleFactory;
  isInteractive: () => boolean;
}

export interface CliOutcome {
  exitCode: number;
}

function defaultDependencies(): CommandDependencies {
  return {
    env: process.env,
    createLifecycle,
    isInteractive: () => process.stdin.isTTY === true,
  };
}

/** Build the Commander program for the certkeeper CLI. */
export function createCli(
  deps: Partial<CommandDependencies> = {},
  outcome: CliOutcome = { exitCode: EXIT_CODE.OK },
): Command {
  const resolved: CommandDependencies = { ...defaultDependencies(), ...deps };
  const program = new Command();

  program
    .name('certkeeper')
    .description('Obtain and renew TLS certificates over ACME with DNS-01 validation')
    .version(getPackageInfo().version)
    .exitOverride();

  async function run(action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (e) {
      outcome.exitCode = handleError(e);
    }
  }

  program
    .command('issue')
    .description('Issue a certificate for <domain> and write its paths into the env file')
    .argument('<domain>', 'Domain name (a leading *. requests a wildcard)')
    .argument('<email>', 'Contact email for the ACME account')
    .option('--agree-tos', "Accept the certificate authority's terms of service")
    .option('--staging', "Use Let's Encrypt staging environment")
    .option('--directory <url>', 'Custom ACME directory URL')
    .option('--provider <id>', 'DNS provider id')
    .option('--propagation-seconds <n>', 'Wait after publishing the TXT record')
    .option('--timeout-seconds <n>', 'Validation deadline')
    .option('--env-file <path>', 'Configuration file to update')
    .option('--no-apply', 'Do not update the configuration file')
    .action(async (domain: string, email: string, opts) => {
      await run(() =>
        handleIssueCommand(
          domain,
          email,
          {
            agreeTos: opts.agreeTos,
            staging: opts.staging,
            directory: opts.directory,
            provider: opts.provider,
            propagationSeconds: opts.propagationSeconds,
            timeoutSeconds: opts.timeoutSeconds,
            envFile: opts.envFile,
            apply: opts.apply,
          },
          resolved,
        ),
      );
    });

  program
    .command('renew')
    .description('Renew the certificate for <domain> when it is due and update the env file')
    .argument('<domain>', 'Domain name')
    .option('--force', 'Renew even if the certificate is not due')
    .option('--threshold-days <n>', 'Renew when fewer days than this remain')
    .option('--staging', "Use Let's Encrypt staging environment")
    .option('--directory <url>', 'Custom ACME directory URL')
    .option('--provider <id>', 'DNS provider id')
    .option('--propagation-seconds <n>', 'Wait after publishing the TXT record')
    .option('--timeout-seconds <n>', 'Validation deadline')
    .option('--env-file <path>', 'Configuration file to update')
    .option('--no-apply', 'Do not update the configuration file')
    .action(async (domain: string, opts) => {
      await run(() =>
        handleRenewCommand(
          domain,
          {
            force: opts.force,
            thresholdDays: opts.thresholdDays,
            staging: opts.staging,
            directory: opts.directory,
            provider: opts.provider,
            propagationSeconds: opts.propagationSeconds,
            timeoutSeconds: opts.timeoutSeconds,
            envFile: opts.envFile,
            apply: opts.apply,
          },
          resolved,
        ),
      );
    });

  program
    .command('credentials')
    .description('Store the API token of a DNS provider')
    .argument('<provider>', 'DNS provider id, e.g. cloudflare')
    .option('--token <token>', 'API token (prompted for on a terminal when omitted)')
    .option('--overwrite', 'Replace stored credentials')
    .action(async (provider: string, opts) => {
      await run(() => handleCredentialsCommand(provider, { token: opts.token, overwrite: opts.overwrite }, resolved));
    });

  return program;
}

/**
 * Parse arguments and run the selected command. Returns the process exit
 * code instead of exiting.
 */
export async function runCli(argv: string[], deps: Partial<CommandDependencies> = {}): Promise<number> {
  const outcome: CliOutcome = { exitCode: EXIT_CODE.OK };
  const program = createCli(deps, outcome);

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return EXIT_CODE.OK;
      }
      return EXIT_CODE.INVALID_ARGUMENTS;
    }
    throw err;
  }

  return outcome.exitCode;
}
