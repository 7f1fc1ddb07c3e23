import { jest, describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { join } from 'path';

// Mock command handlers BEFORE importing the program factory
jest.mock('../../src/cli/commands/install.js', () => ({
  handleInstallCommand: jest.fn(async () => undefined),
}));
jest.mock('../../src/cli/commands/renew.js', () => ({
  handleRenewCommand: jest.fn(async () => undefined),
}));
jest.mock('../../src/cli/commands/schedule.js', () => ({
  handleScheduleInstall: jest.fn(async () => undefined),
  handleScheduleRemove: jest.fn(async () => undefined),
  handleScheduleList: jest.fn(async () => undefined),
}));

import { runCli } from '../../src/cli/program.js';
import { handleInstallCommand } from '../../src/cli/commands/install.js';
import { handleRenewCommand } from '../../src/cli/commands/renew.js';
import { handleScheduleInstall } from '../../src/cli/commands/schedule.js';
import { formatStatusRow } from '../../src/cli/commands/status.js';
import { renewTaskCommand, webServerFactory } from '../../src/cli/utils/context.js';
import { WildcardRequiresDnsError, setLogSink, type CertificateStatus } from '../../src/index.js';
import { makeTempDir } from '../test-utils.js';

const handleInstall = jest.mocked(handleInstallCommand);
const handleRenew = jest.mocked(handleRenewCommand);
const handleSchedule = jest.mocked(handleScheduleInstall);

describe('certsmith CLI', () => {
  beforeEach(() => {
    process.env.CERTSMITH_CLI_TEST = '1';
    jest.clearAllMocks();
  });

  afterEach(() => {
    delete process.env.CERTSMITH_CLI_TEST;
    setLogSink(undefined);
    jest.restoreAllMocks();
  });

  test('registers core commands', async () => {
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const program = await runCli(['--help']);
    expect(program.commands.map((c) => c.name())).toEqual(['install', 'renew', 'status', 'schedule']);
  });

  test('passes install options through without prompting', async () => {
    await runCli([
      'install',
      '--domain',
      'example.com,www.example.com',
      '--email',
      'admin@example.com',
      '--webroot',
      '/var/www/html',
      '--server',
      'nginx',
      '--staging',
      '--cert-dir',
      './tmp-certs',
      '--no-interactive',
    ]);

    expect(handleInstall).toHaveBeenCalledTimes(1);
    expect(handleInstall.mock.calls[0][0]).toMatchObject({
      domain: 'example.com,www.example.com',
      email: 'admin@example.com',
      webroot: '/var/www/html',
      server: 'nginx',
      staging: true,
      certDir: './tmp-certs',
      interactive: false,
    });
  });

  test('leaves prompting to the terminal check by default', async () => {
    await runCli(['install', '--domain', 'example.com', '--dns']);
    expect(handleInstall.mock.calls[0][0]).toMatchObject({ domain: 'example.com', dns: true, interactive: undefined });
  });

  test('forwards renew flags', async () => {
    await runCli(['renew', '--all', '--domain', 'example.com']);
    expect(handleRenew).toHaveBeenCalledWith(expect.objectContaining({ all: true, domain: 'example.com' }));
  });

  test('forwards schedule install flags', async () => {
    await runCli(['schedule', 'install', '--cron', '0 3 * * *', '--name', 'nightly', '--cert-dir', '/srv/certs']);
    expect(handleSchedule).toHaveBeenCalledWith(
      expect.objectContaining({ name: 'nightly', cron: '0 3 * * *', executable: undefined, certDir: '/srv/certs' }),
    );
  });

  test('reports command failures with a hint', async () => {
    const errors = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    handleInstall.mockRejectedValueOnce(WildcardRequiresDnsError.of(['*.example.com'], 'webroot'));

    await runCli(['install', '--domain', '*.example.com']);

    expect(errors).toHaveBeenCalledWith(
      expect.stringContaining('Error:'),
      'Wildcard certificates require DNS validation (requested: webroot)',
    );
    expect(errors).toHaveBeenCalledWith(expect.stringContaining('Wildcard certificates are issued with --dns only.'));
  });

  test('status reports an empty store', async () => {
    const tmp = await makeTempDir();
    const logs = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      await runCli(['status', '--cert-dir', join(tmp.path, 'certs')]);
      expect(logs).toHaveBeenCalledWith(expect.stringContaining('No stored certificates'));
    } finally {
      await tmp.cleanup();
    }
  });
});

describe('formatStatusRow', () => {
  const base: CertificateStatus = {
    domain: 'example.com',
    domains: ['example.com'],
    certPath: '/certs/example.com/cert.pem',
    keyPath: '/certs/example.com/key.pem',
    chainPath: '/certs/example.com/chain.pem',
    expiryDate: new Date('2030-04-01T00:00:00Z'),
    isValid: true,
    daysLeft: 75,
    issuer: 'CN=Test Issuing CA',
    selfSigned: false,
    metadata: undefined,
  };

  test('aligns domain, expiry and days left', () => {
    expect(formatStatusRow(base)).toBe(`${'example.com'.padEnd(32)}2030-04-01     75  valid`);
  });

  test('flags due, expired and self-signed certificates', () => {
    expect(formatStatusRow({ ...base, daysLeft: 12 }).endsWith('  renewal due')).toBe(true);
    expect(formatStatusRow({ ...base, isValid: false, daysLeft: -3 }).endsWith('   -3  expired')).toBe(true);
    expect(formatStatusRow({ ...base, selfSigned: true }).endsWith('  valid (self-signed)')).toBe(true);
  });
});

describe('renewTaskCommand', () => {
  const env = { CERTSMITH_HOME: '/srv/certsmith', CERTSMITH_KEY_ALGO: 'ec-p384' };

  test('runs the CLI script through node with the resolved store roots', () => {
    expect(renewTaskCommand({}, env, '/opt/certsmith/dist/src/cli.js')).toEqual({
      program: process.execPath,
      args: [
        '/opt/certsmith/dist/src/cli.js',
        'renew',
        '--cert-dir',
        join('/srv/certsmith', 'certs'),
        '--account-dir',
        join('/srv/certsmith', 'accounts'),
        '--directory',
        'https://acme-v02.api.letsencrypt.org/directory',
        '--key-algo',
        'ec-p384',
      ],
    });
  });

  test('applies flags over the environment and runs an explicit executable directly', () => {
    expect(
      renewTaskCommand(
        { executable: '/usr/local/bin/certsmith', certDir: '/data/certs', staging: true },
        env,
        '/opt/certsmith/dist/src/cli.js',
      ),
    ).toEqual({
      program: '/usr/local/bin/certsmith',
      args: [
        'renew',
        '--cert-dir',
        '/data/certs',
        '--account-dir',
        join('/srv/certsmith', 'accounts'),
        '--directory',
        'https://acme-staging-v02.api.letsencrypt.org/directory',
        '--key-algo',
        'ec-p384',
      ],
    });
  });
});

describe('webServerFactory', () => {
  test('deploys where the install did unless a flag names another place', () => {
    expect(webServerFactory({})('nginx', { confDir: '/srv/nginx' }).settings).toEqual({ confDir: '/srv/nginx' });
    expect(webServerFactory({ nginxConfDir: '/opt/nginx' })('nginx', { confDir: '/srv/nginx' }).settings).toEqual({
      confDir: '/opt/nginx',
    });
    expect(webServerFactory({ iisSite: 'Shop' })('iis', { site: 'Old', appPool: 'ShopPool' }).settings).toEqual({
      site: 'Shop',
      appPool: 'ShopPool',
    });
  });
});
