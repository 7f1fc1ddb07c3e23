import { describe, it, expect } from '@jest/globals';
import { join } from 'path';
import { defaultHome, directories, loadConfig, resolveDirectoryUrl } from '../../src/index.js';

describe('loadConfig', () => {
  it('derives defaults from the state root', () => {
    const config = loadConfig({ CERTSMITH_HOME: '/srv/certsmith' });
    expect(config).toEqual({
      certDir: join('/srv/certsmith', 'certs'),
      accountDir: join('/srv/certsmith', 'accounts'),
      keyAlgorithm: { kind: 'rsa', modulusLength: 2048, hash: 'SHA-256' },
      directoryUrl: 'https://acme-v02.api.letsencrypt.org/directory',
      httpPort: 80,
      tlsPort: 443,
      obtainTimeoutMs: undefined,
      email: undefined,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      CERTSMITH_HOME: '/srv/certsmith',
      CERTSMITH_CERT_DIR: '/etc/ssl/certsmith',
      CERTSMITH_KEY_ALGO: 'ec-p384',
      CERTSMITH_STAGING: 'true',
      CERTSMITH_HTTP_PORT: '8080',
      CERTSMITH_OBTAIN_TIMEOUT_MS: '120000',
      CERTSMITH_EMAIL: 'admin@example.com',
    });
    expect(config).toMatchObject({
      certDir: '/etc/ssl/certsmith',
      accountDir: join('/srv/certsmith', 'accounts'),
      keyAlgorithm: { kind: 'ec', namedCurve: 'P-384' },
      directoryUrl: 'https://acme-staging-v02.api.letsencrypt.org/directory',
      httpPort: 8080,
      tlsPort: 443,
      obtainTimeoutMs: 120000,
      email: 'admin@example.com',
    });
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ CERTSMITH_HOME: '/x', CERTSMITH_HTTP_PORT: 'eighty' })).toThrow(
      'CERTSMITH_HTTP_PORT must be a non-negative integer, got "eighty"',
    );
  });

  it('falls back to a home directory path', () => {
    expect(defaultHome({ CERTSMITH_HOME: '/opt/state' })).toBe('/opt/state');
    expect(defaultHome({}).endsWith('.certsmith')).toBe(true);
  });
});

describe('resolveDirectoryUrl', () => {
  it('returns URLs unchanged', () => {
    expect(resolveDirectoryUrl('https://acme.test/directory', true)).toBe('https://acme.test/directory');
  });

  it('looks up named authorities', () => {
    expect(resolveDirectoryUrl('google-staging')).toBe(directories.google.staging?.directoryUrl);
    expect(resolveDirectoryUrl('buypass', true)).toBe('https://api.test4.buypass.no/acme/directory');
    expect(resolveDirectoryUrl('zerossl')).toBe('https://acme.zerossl.com/v2/DV90');
  });

  it('rejects unknown names and missing environments', () => {
    expect(() => resolveDirectoryUrl('example-ca')).toThrow('Unknown ACME directory: example-ca');
    expect(() => resolveDirectoryUrl('zerossl-staging')).toThrow('zerossl has no staging directory');
  });
});
