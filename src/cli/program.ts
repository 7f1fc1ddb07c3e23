import { Command } from 'commander';
import { version } from '../../package.json';
import { handleError } from './utils/errors.js';
import { attachLogSink } from './logger.js';
import { handleInstallCommand } from './commands/install.js';
import { handleRenewCommand } from './commands/renew.js';
import { handleStatusCommand } from './commands/status.js';
import { handleScheduleInstall, handleScheduleList, handleScheduleRemove } from './commands/schedule.js';

function withGlobalOptions(command: Command): Command {
  return command
    .option('--cert-dir <path>', 'Certificate storage root')
    .option('--account-dir <path>', 'Account storage root')
    .option('--directory <url|name>', 'ACME directory URL or name (letsencrypt, google, buypass, zerossl)')
    .option('--staging', 'Use the staging environment of the directory')
    .option('--key-algo <algo>', 'Certificate key algorithm (ec-p256, rsa-2048, ...)');
}

/** Build a Commander program instance for the certsmith CLI. */
export function createCli(): Command {
  const program = new Command();

  program.name('certsmith').description('Certificate lifecycle manager').version(version);

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env.CERTSMITH_CLI_TEST) {
    program.exitOverride();
  }

  function exitOnError() {
    if (process.env.CERTSMITH_CLI_TEST) return;
    process.exit(1);
  }

  async function run(work: () => Promise<void>) {
    try {
      await work();
    } catch (e) {
      handleError(e);
      exitOnError();
    }
  }

  withGlobalOptions(
    program
      .command('install')
      .description('Obtain a certificate for one or more domains and deploy it')
      .option('-d, --domain <domains>', 'Comma separated domains; the first is the primary')
      .option('-e, --email <email>', 'Contact email for the ACME account')
      .option('--webroot <path>', 'Validate with HTTP-01 files below this document root')
      .option('--standalone', 'Validate with a built-in TLS-ALPN-01 server')
      .option('--dns', 'Validate with DNS-01 TXT records (required for wildcards)')
      .option('--server <kind>', 'Web server to configure: nginx, apache, iis or none')
      .option('--nginx-conf-dir <path>', 'nginx configuration directory')
      .option('--apache-conf-dir <path>', 'Apache configuration directory')
      .option('--iis-site <name>', 'IIS site receiving the https bindings')
      .option('--iis-app-pool <name>', 'IIS application pool to recycle')
      .option('--http-port <port>', 'Port of the built-in HTTP-01 server')
      .option('--tls-port <port>', 'Port of the built-in TLS-ALPN-01 server')
      .option('--no-interactive', 'Never prompt for missing values'),
  ).action((opts) =>
    run(() =>
      handleInstallCommand({
        domain: opts.domain,
        email: opts.email,
        webroot: opts.webroot,
        standalone: opts.standalone,
        dns: opts.dns,
        server: opts.server,
        nginxConfDir: opts.nginxConfDir,
        apacheConfDir: opts.apacheConfDir,
        iisSite: opts.iisSite,
        iisAppPool: opts.iisAppPool,
        httpPort: opts.httpPort,
        tlsPort: opts.tlsPort,
        interactive: opts.interactive === false ? false : undefined,
        certDir: opts.certDir,
        accountDir: opts.accountDir,
        directory: opts.directory,
        staging: opts.staging,
        keyAlgo: opts.keyAlgo,
      }),
    ),
  );

  withGlobalOptions(
    program
      .command('renew')
      .description('Renew certificates with 30 days or fewer left')
      .option('-d, --domain <domain>', 'Only this certificate')
      .option('--all', 'Renew regardless of remaining validity'),
  ).action((opts) =>
    run(() =>
      handleRenewCommand({
        domain: opts.domain,
        all: opts.all,
        certDir: opts.certDir,
        accountDir: opts.accountDir,
        directory: opts.directory,
        staging: opts.staging,
        keyAlgo: opts.keyAlgo,
      }),
    ),
  );

  withGlobalOptions(
    program
      .command('status')
      .description('Show stored certificates and their expiry')
      .option('-d, --domain <domain>', 'Only this certificate'),
  ).action((opts) =>
    run(() =>
      handleStatusCommand({
        domain: opts.domain,
        certDir: opts.certDir,
        accountDir: opts.accountDir,
      }),
    ),
  );

  const schedule = program.command('schedule').description('Manage the recurring renewal task');
  withGlobalOptions(
    schedule
      .command('install')
      .description('Register a daily "certsmith renew" run')
      .option('--name <name>', 'Task name')
      .option('--cron <expression>', 'Schedule as "M H * * *"')
      .option('--executable <path>', 'Executable to run instead of node and this CLI'),
  ).action((opts) =>
    run(() =>
      handleScheduleInstall({
        name: opts.name,
        cron: opts.cron,
        executable: opts.executable,
        certDir: opts.certDir,
        accountDir: opts.accountDir,
        directory: opts.directory,
        staging: opts.staging,
        keyAlgo: opts.keyAlgo,
      }),
    ),
  );
  schedule
    .command('remove')
    .description('Remove the renewal task')
    .option('--name <name>', 'Task name')
    .action((opts) => run(() => handleScheduleRemove({ name: opts.name })));
  schedule
    .command('list')
    .description('List renewal tasks')
    .action(() => run(() => handleScheduleList()));

  return program;
}

/** Parse arguments and run the selected command. */
export async function runCli(argv: string[]): Promise<Command> {
  attachLogSink();
  const program = createCli();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    // help and version output end the run without an error
    if (!process.env.CERTSMITH_CLI_TEST || (code !== 'commander.helpDisplayed' && code !== 'commander.version')) {
      throw err;
    }
  }
  return program;
}
