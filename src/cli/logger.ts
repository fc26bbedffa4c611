/**
 * Terminal output of the certkeeper commands. Results go to stdout; the
 * progress spinner is drawn by ora on stderr and degrades to plain lines when
 * stderr is not a TTY.
 */
import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';

import type { CertificateRecord } from '../lib/core/certificate-repository.js';
import type { SyncResult } from '../lib/sync/config-synchronizer.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Spinner for one long-running step; ends with `done` or `failed`. */
export class StepProgress {
  private readonly spinner: Ora;

  constructor(text: string) {
    this.spinner = ora(text).start();
  }

  done(text: string): void {
    this.spinner.succeed(chalk.green(text));
  }

  failed(text: string): void {
    this.spinner.fail(chalk.red(text));
  }

  stop(): void {
    this.spinner.stop();
  }
}

function field(label: string, value: string): void {
  console.log(`  ${chalk.gray(`${label}:`)} ${value}`);
}

/** Bold title followed by aligned label/value lines */
export function section(title: string, fields: Record<string, string>): void {
  console.log(`\n${chalk.bold.blue(title)}`);
  for (const [label, value] of Object.entries(fields)) {
    field(label, value);
  }
}

export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${chalk.green(message)}`);
}

export function notice(message: string): void {
  console.log(`${chalk.cyan('ℹ')} ${chalk.cyan(message)}`);
}

function detail(message: string): void {
  console.log(`${chalk.cyan('ℹ')} ${chalk.gray(message)}`);
}

export function printRecord(record: CertificateRecord, now: Date = new Date()): void {
  const days = Math.floor((record.expiresAt.getTime() - now.getTime()) / DAY_MS);
  field('Certificate', record.chainPath);
  field('Private key', record.keyPath);
  field('Expires', `${record.expiresAt.toISOString()} (${days} days)`);
}

export function printSyncResult(result: SyncResult): void {
  if (!result.changed) {
    detail(`${result.path} already up to date`);
    return;
  }
  success(`Updated ${result.path}`);
  if (result.updated.length > 0) detail(`changed: ${result.updated.join(', ')}`);
  if (result.appended.length > 0) detail(`added: ${result.appended.join(', ')}`);
}

export function printSyncSkipped(path: string): void {
  detail(`Skipped updating ${path} (--no-apply)`);
}
