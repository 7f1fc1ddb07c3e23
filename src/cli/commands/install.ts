import { input, select } from '@inquirer/prompts';
import {
  isWebServerKind,
  type ChallengeIntent,
  type LifecycleResult,
  type WebServerKind,
} from '../../index.js';
import { createSpinner, heading, kv, render } from '../logger.js';
import { createManager, type GlobalOptions, type WebServerOptions } from '../utils/context.js';

/** Flags accepted by `certsmith install`. */
export interface InstallCommandOptions extends GlobalOptions, WebServerOptions {
  domain?: string;
  email?: string;
  webroot?: string;
  standalone?: boolean;
  dns?: boolean;
  server?: string;
  /** Allow prompting for missing values */
  interactive?: boolean;
}

function parseServer(value: string | undefined): WebServerKind | undefined {
  if (value === undefined || value === 'none') return undefined;
  if (!isWebServerKind(value)) {
    throw new Error(`Unknown web server "${value}" (expected nginx, apache or iis)`);
  }
  return value;
}

export function printResult(result: LifecycleResult): void {
  if (!result.record || !result.paths) return;
  if (result.fallback) {
    render.fallback(result.domainSet.primary, result.fallbackReason?.message);
  }
  if (result.dnsRecords) {
    heading('DNS-01 records');
    render.list(result.dnsRecords.map((name) => `${name} TXT`));
  }
  heading('Certificate');
  kv('Domains', result.record.domains.join(', '));
  kv('Source', result.record.source === 'acme' ? 'certificate authority' : 'self-signed');
  kv('Expires', result.record.expiresAt.toISOString());
  kv('Directory', result.paths.dir);
  kv('Web server', result.configured ? 'configured and reloaded' : 'not configured');
}

/** Obtain a certificate for a domain set and deploy it. */
export async function handleInstallCommand(options: InstallCommandOptions): Promise<void> {
  const interactive = options.interactive ?? process.stdin.isTTY === true;

  let domain = options.domain;
  if (!domain) {
    if (!interactive) throw new Error('--domain is required');
    domain = await input({ message: 'Domains (comma separated):' });
  }

  let email = options.email ?? process.env.CERTSMITH_EMAIL;
  if (!email && interactive) {
    email = await input({ message: 'Contact email for the ACME account (empty for self-signed):' });
  }

  let server = parseServer(options.server);
  if (options.server === undefined && interactive) {
    server = parseServer(
      await select({
        message: 'Web server to configure:',
        choices: [
          { name: 'None', value: 'none' },
          { name: 'nginx', value: 'nginx' },
          { name: 'Apache', value: 'apache' },
          { name: 'IIS', value: 'iis' },
        ],
      }),
    );
  }

  const intent: ChallengeIntent = {
    ...(options.standalone && { standalone: true }),
    ...(options.webroot && { webroot: options.webroot }),
    ...(options.dns && { dns: true }),
  };

  const spinner = createSpinner().start(`Installing certificate for ${domain}`);
  const manager = createManager(options, {
    onTransition: ({ to }) => {
      spinner.start(`${domain}: ${to}`);
    },
  });

  try {
    const result = await manager.install({
      domains: domain,
      email: email || undefined,
      intent,
      webServer: server,
    });
    if (result.fallback) spinner.warn(`Installed a self-signed certificate for ${domain}`);
    else spinner.succeed(`Installed certificate for ${domain}`);
    printResult(result);
  } catch (e) {
    spinner.fail(`Install failed for ${domain}`);
    throw e;
  }
}
