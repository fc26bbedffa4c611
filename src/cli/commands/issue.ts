import { resolveConfig } from '../../lib/config.js';
import type { CertificateRecord } from '../../lib/core/certificate-repository.js';
import type { CommandDependencies } from '../program.js';
import { StepProgress, printRecord, printSyncResult, printSyncSkipped, section } from '../logger.js';
import { withInterruptSignal } from '../utils/signals.js';
import { overridesFrom, type CommonOptions } from '../utils/options.js';
import type { Lifecycle } from '../context.js';

export interface IssueCommandOptions extends CommonOptions {
  agreeTos?: boolean;
}

/** Write the record into the env file unless --no-apply was given. */
export async function applyRecord(lifecycle: Lifecycle, record: CertificateRecord, apply: boolean): Promise<void> {
  if (!apply) {
    printSyncSkipped(lifecycle.synchronizer.path);
    return;
  }
  printSyncResult(await lifecycle.synchronizer.apply(record));
}

/** Issue a certificate for one domain, then apply it to the env file. */
export async function handleIssueCommand(
  domain: string,
  email: string,
  options: IssueCommandOptions,
  deps: CommandDependencies,
): Promise<void> {
  const config = resolveConfig(overridesFrom(options), deps.env);
  const lifecycle = deps.createLifecycle(config);

  section('Issuing certificate', {
    Domain: domain,
    Contact: email,
    Directory: config.directoryUrl,
    'DNS provider': lifecycle.challenges.id,
  });

  const progress = new StepProgress(
    `Validating ${domain} (waits ${Math.round(config.propagationDelayMs / 1000)}s for DNS propagation)`,
  );
  let record: CertificateRecord;
  try {
    record = await withInterruptSignal((signal) =>
      lifecycle.client.issue(domain, email, options.agreeTos === true, { signal }),
    );
    progress.done(`Certificate issued for ${record.domain}`);
  } catch (err) {
    progress.failed(`Issuance for ${domain} failed`);
    throw err;
  }

  printRecord(record);
  await applyRecord(lifecycle, record, options.apply);
}
