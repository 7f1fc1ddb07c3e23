import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';
import { setLogSink, type CertificateStatus, type LogLevel } from '../index.js';

export interface SpinnerHandle {
  start(text: string): SpinnerHandle;
  succeed(text?: string): SpinnerHandle;
  fail(text?: string): SpinnerHandle;
  warn(text?: string): SpinnerHandle;
  stop(): void;
}

/**
 * Chainable ora wrapper. Without a TTY (cron, CI) it prints nothing until a
 * final state is reached.
 */
export function createSpinner(): SpinnerHandle {
  let spinner: Ora | undefined;

  return {
    start(text: string) {
      if (!spinner) spinner = ora({ text, isEnabled: process.stdout.isTTY === true }).start();
      else spinner.text = text;
      return this;
    },
    succeed(text?: string) {
      spinner?.succeed(text && chalk.green(text));
      return this;
    },
    fail(text?: string) {
      spinner?.fail(text && chalk.red(text));
      return this;
    },
    warn(text?: string) {
      spinner?.warn(text && chalk.yellow(text));
      return this;
    },
    stop() {
      spinner?.stop();
    },
  };
}

export const symbols = {
  success: chalk.green('✔'),
  fail: chalk.red('✖'),
  warn: chalk.yellow('⚠'),
  info: chalk.cyan('ℹ'),
};

export function heading(title: string) {
  console.log('\n' + chalk.bold.blue(title));
}

export function kv(label: string, value: string) {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

export const render = {
  line(msg = '') {
    console.log(msg);
  },
  success(msg: string) {
    console.log(symbols.success + ' ' + chalk.green(msg));
  },
  info(msg: string) {
    console.log(symbols.info + ' ' + chalk.cyan(msg));
  },
  error(msg: string) {
    console.log(symbols.fail + ' ' + chalk.red(msg));
  },
  list(values: string[]) {
    values.forEach((v) => console.log('  - ' + chalk.white(v)));
  },
  /** Unmissable notice that a self-signed certificate was installed. */
  fallback(domain: string, reason?: string) {
    const bar = chalk.yellow('!'.repeat(60));
    console.log(bar);
    console.log(chalk.bold.yellow(`SELF-SIGNED FALLBACK: ${domain}`));
    console.log(chalk.yellow('Browsers will not trust this certificate.'));
    if (reason) console.log(chalk.yellow(`Reason: ${reason}`));
    console.log(bar);
  },
  /** Detailed status block for one certificate. */
  status(status: CertificateStatus) {
    heading(status.domain);
    if (status.domains.length > 1) kv('Domains', status.domains.join(', '));
    kv('Certificate', status.certPath);
    kv('Private key', status.keyPath);
    kv('Issuer', status.selfSigned ? `${status.issuer} (self-signed)` : status.issuer);
    kv('Expires', status.expiryDate.toISOString());
    kv('Days left', String(status.daysLeft));
    kv('State', status.isValid ? chalk.green('valid') : chalk.red('expired'));
  },
};

/** Route library warnings and errors to the terminal. */
export function attachLogSink(): void {
  setLogSink((level: LogLevel, _namespace: string, message: string) => {
    if (level === 'error') console.error(symbols.fail + ' ' + chalk.red(message));
    else if (level === 'warn') console.error(symbols.warn + ' ' + chalk.yellow(message));
  });
}
