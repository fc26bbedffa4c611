import { resolveConfig } from '../../lib/config.js';
import type { CertificateRecord } from '../../lib/core/certificate-repository.js';
import { NotDueForRenewalError } from '../../lib/errors/lifecycle-errors.js';
import type { CommandDependencies } from '../program.js';
import { StepProgress, notice, printRecord, section } from '../logger.js';
import { withInterruptSignal } from '../utils/signals.js';
import { overridesFrom, parseNumberFlag, type CommonOptions } from '../utils/options.js';
import { applyRecord } from './issue.js';

export interface RenewCommandOptions extends CommonOptions {
  force?: boolean;
  thresholdDays?: string;
}

/**
 * Renew a stored certificate. A certificate that is not due yet is reported
 * and counts as success, so the command can run from a scheduler.
 */
export async function handleRenewCommand(
  domain: string,
  options: RenewCommandOptions,
  deps: CommandDependencies,
): Promise<void> {
  const overrides = overridesFrom(options);
  if (options.thresholdDays !== undefined) {
    overrides.renewalThresholdDays = parseNumberFlag('--threshold-days', options.thresholdDays);
  }
  const config = resolveConfig(overrides, deps.env);
  const lifecycle = deps.createLifecycle(config);

  section('Renewing certificate', {
    Domain: domain,
    Threshold: `${config.renewalThresholdDays} days`,
  });

  const progress = new StepProgress(`Checking ${domain}`);
  let record: CertificateRecord;
  try {
    record = await withInterruptSignal((signal) =>
      lifecycle.client.renew(domain, { force: options.force === true, signal }),
    );
    progress.done(`Certificate renewed for ${record.domain}`);
  } catch (err) {
    if (err instanceof NotDueForRenewalError) {
      progress.stop();
      notice(err.message);
      return;
    }
    progress.failed(`Renewal for ${domain} failed`);
    throw err;
  }

  printRecord(record);
  await applyRecord(lifecycle, record, options.apply);
}
