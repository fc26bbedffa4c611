import { password } from '@inquirer/prompts';

import { resolveConfig } from '../../lib/config.js';
import { CredentialStore } from '../../lib/credentials/credential-store.js';
import { InvalidArgumentError } from '../../lib/errors/lifecycle-errors.js';
import type { CommandDependencies } from '../program.js';
import { success } from '../logger.js';

export interface CredentialsCommandOptions {
  token?: string;
  overwrite?: boolean;
}

/** Store a DNS provider API token; prompts only on an interactive terminal. */
export async function handleCredentialsCommand(
  providerId: string,
  options: CredentialsCommandOptions,
  deps: CommandDependencies,
): Promise<void> {
  const config = resolveConfig({}, deps.env);
  const store = new CredentialStore(config.credentialsDir);

  let token = options.token;
  if (token === undefined) {
    if (!deps.isInteractive()) {
      throw new InvalidArgumentError(`No token given for ${providerId}: pass --token when not running in a terminal`, {
        providerId,
      });
    }
    token = await password({ message: `API token for ${providerId}:`, mask: '*' });
  }

  const path = await store.save(providerId, token, { overwrite: options.overwrite === true });
  success(`Saved ${providerId} credentials to ${path}`);
}
