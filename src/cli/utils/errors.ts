import chalk from 'chalk';
import { isLifecycleError, isWebServerApplyError } from '../../index.js';

const HINTS: Record<string, string> = {
  INVALID_DOMAIN_FORMAT: 'Separate domains with commas; a wildcard must start with "*.".',
  CONFLICTING_CHALLENGE_INTENT: 'Pass only one of --webroot, --standalone or --dns.',
  WILDCARD_REQUIRES_DNS: 'Wildcard certificates are issued with --dns only.',
  WILDCARD_UNSUPPORTED_FOR_METHOD: 'Wildcard certificates are issued with --dns only.',
  CERTIFICATE_NOT_FOUND: 'Run "certsmith install" for this domain first.',
  STORAGE_FAILED: 'Check permissions of the certificate and account directories.',
  CONFIGURATION_INVALID: 'The certificate was saved; fix the server configuration and reload manually.',
  RELOAD_FAILED: 'The certificate was saved and configured; reload the server manually.',
  WEBSERVER_CONFIGURE_FAILED: 'The certificate was saved; check the server configuration directory.',
  SCHEDULER_FAILED: 'Check that crontab (or schtasks on Windows) is available.',
};

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (isLifecycleError(error)) {
    console.error(chalk.red('Error:'), error.message);
    if (isWebServerApplyError(error) && error.certificate) {
      console.error(
        chalk.yellow(`Certificate for ${error.certificate.domainSet.primary} was issued but is not live.`),
      );
    }
    const hint = HINTS[error.code];
    if (hint) console.error(chalk.gray(hint));
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
