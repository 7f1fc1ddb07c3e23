import type { LifecycleResult } from '../../index.js';
import { createSpinner, render } from '../logger.js';
import { createManager, type GlobalOptions } from '../utils/context.js';
import { printResult } from './install.js';

export interface RenewCommandOptions extends GlobalOptions {
  domain?: string;
  /** Renew every stored certificate regardless of expiry */
  all?: boolean;
}

function report(domain: string, result: LifecycleResult): void {
  if (!result.record) {
    render.info(`${domain}: ${result.daysLeft} days left, renewal not due`);
    return;
  }
  printResult(result);
}

/**
 * Renew one stored certificate, or check every stored certificate. With no
 * flags this is the command the scheduled task runs.
 */
export async function handleRenewCommand(options: RenewCommandOptions): Promise<void> {
  const manager = createManager(options);

  if (options.domain) {
    const spinner = createSpinner().start(`Checking ${options.domain}`);
    try {
      const result = await manager.renew({ domains: options.domain, force: options.all });
      spinner.succeed(result.record ? `Renewed ${options.domain}` : `Checked ${options.domain}`);
      report(options.domain, result);
    } catch (e) {
      spinner.fail(`Renewal failed for ${options.domain}`);
      throw e;
    }
    return;
  }

  const outcomes = await manager.renewAll(options.all === true);
  if (outcomes.length === 0) {
    render.info('No stored certificates');
    return;
  }

  let failed = 0;
  for (const { domainSet, result, error } of outcomes) {
    if (result) {
      report(domainSet.primary, result);
    } else {
      failed++;
      render.error(`${domainSet.primary}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  if (failed > 0) {
    throw new Error(`${failed} of ${outcomes.length} renewals failed`);
  }
  render.success('Renewal check complete');
}
