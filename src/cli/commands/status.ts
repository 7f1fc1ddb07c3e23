import chalk from 'chalk';
import type { CertificateStatus } from '../../index.js';
import { render } from '../logger.js';
import { createManager, type GlobalOptions } from '../utils/context.js';

export interface StatusCommandOptions extends GlobalOptions {
  domain?: string;
}

/** One table row per certificate: domain, expiry, days left, state. */
export function formatStatusRow(status: CertificateStatus): string {
  const state = status.isValid ? (status.daysLeft <= 30 ? 'renewal due' : 'valid') : 'expired';
  const source = status.selfSigned ? ' (self-signed)' : '';
  return [
    status.domain.padEnd(32),
    status.expiryDate.toISOString().slice(0, 10).padEnd(12),
    String(status.daysLeft).padStart(5),
    `  ${state}${source}`,
  ].join('');
}

/** Show the status of one or all stored certificates. */
export async function handleStatusCommand(options: StatusCommandOptions): Promise<void> {
  const manager = createManager(options);

  if (options.domain) {
    // fails with CertificateNotFound before printing anything
    const status = await manager.status(options.domain);
    render.status(status);
    return;
  }

  const all = await manager.statusAll();
  if (all.length === 0) {
    render.info('No stored certificates');
    return;
  }
  render.line(chalk.bold(`${'DOMAIN'.padEnd(32)}${'EXPIRES'.padEnd(12)}${'DAYS'.padStart(5)}  STATE`));
  for (const status of all) {
    render.line(formatStatusRow(status));
  }
}
