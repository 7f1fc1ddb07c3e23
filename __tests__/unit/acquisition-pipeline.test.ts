import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { stat, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  AcquisitionError,
  AcquisitionPipeline,
  CertificateStore,
  StorageError,
  WildcardUnsupportedForMethodError,
  parseAlgorithm,
  parseCertificate,
  parseDomainSet,
  setLogSink,
  type Account,
  type CertificateMaterial,
  type DnsProvider,
  type ObtainRequest,
  type PipelineConfig,
  type PipelineStep,
} from '../../src/index.js';
import { FakeAcmeCapability, makeTempDir } from '../test-utils.js';

const account: Account = {
  email: 'admin@example.com',
  registrationRef: 'https://acme.test/acct/1',
  privateKeyPem: 'test-account-key',
};

const config: PipelineConfig = { keyAlgorithm: parseAlgorithm('ec-p256') };

describe('AcquisitionPipeline', () => {
  let tmp: Awaited<ReturnType<typeof makeTempDir>>;
  let store: CertificateStore;
  let warnings: string[];

  beforeEach(async () => {
    tmp = await makeTempDir();
    store = new CertificateStore(tmp.path);
    warnings = [];
    setLogSink((level, _namespace, message) => {
      if (level === 'warn') warnings.push(message);
    });
  });

  afterEach(async () => {
    setLogSink(undefined);
    await tmp.cleanup();
  });

  it('persists an authority-issued certificate', async () => {
    const capability = new FakeAcmeCapability();
    const pipeline = new AcquisitionPipeline(store, capability, config);
    const steps: PipelineStep[] = [];

    const { record, paths, fallbackReason } = await pipeline.run(
      { domainSet: parseDomainSet('example.com'), method: 'webroot', account, webroot: '/var/www/html' },
      { onStep: (step) => steps.push(step) },
    );

    expect(steps).toEqual(['keygen', 'request', 'obtain', 'finalize', 'persist']);
    expect(fallbackReason).toBeUndefined();
    expect(record.source).toBe('acme');
    expect(record.domains).toEqual(['example.com']);
    expect(record.certUrl).toBe('https://acme.test/cert/1');
    expect(record.certStableUrl).toBe('https://acme.test/order/1');
    expect(paths.dir).toBe(join(tmp.path, 'example.com'));
    expect(capability.responders).toEqual([{ method: 'webroot', options: { webroot: '/var/www/html' } }]);
    expect(capability.obtained[0].csrPem).toContain('-----BEGIN CERTIFICATE REQUEST-----');
    expect(warnings).toEqual([]);
  });

  it('writes the private key before contacting the authority', async () => {
    let keyPresent = false;
    const capability = new FakeAcmeCapability();
    capability.obtain = async (request: ObtainRequest): Promise<CertificateMaterial> => {
      keyPresent = (await stat(store.paths(request.domainSet).key)).isFile();
      throw new Error('rate limited');
    };

    const pipeline = new AcquisitionPipeline(store, capability, config);
    await pipeline.run({ domainSet: parseDomainSet('example.com'), method: 'standalone', account });
    expect(keyPresent).toBe(true);
  });

  it('falls back to a self-signed certificate when the authority fails', async () => {
    const capability = new FakeAcmeCapability('fail');
    const pipeline = new AcquisitionPipeline(store, capability, config);
    const steps: PipelineStep[] = [];

    const { record, fallbackReason } = await pipeline.run(
      { domainSet: parseDomainSet('example.com,www.example.com'), method: 'webroot', account },
      { onStep: (step) => steps.push(step) },
    );

    expect(steps).toEqual(['keygen', 'request', 'obtain', 'fallback', 'persist']);
    expect(record.source).toBe('self-signed');
    expect(fallbackReason).toBeInstanceOf(AcquisitionError);
    expect(fallbackReason?.step).toBe('obtain');

    const parsed = parseCertificate(record.certificatePem);
    expect(parsed.dnsNames).toEqual(['example.com', 'www.example.com']);
    expect(parsed.selfSigned).toBe(true);
    expect(warnings).toEqual([
      'SELF-SIGNED FALLBACK for example.com: obtain failed: connect ECONNREFUSED acme.test:443',
    ]);
  });

  it('gives the fallback certificate a 90 day validity', async () => {
    const now = new Date('2030-06-01T00:00:00Z');
    const pipeline = new AcquisitionPipeline(store, new FakeAcmeCapability('fail'), config, () => now);

    const { record } = await pipeline.run({ domainSet: parseDomainSet('example.com'), method: 'webroot', account });
    expect(record.expiresAt.toISOString()).toBe('2030-08-30T00:00:00.000Z');
  });

  it('falls back without contacting the authority when no account is known', async () => {
    const capability = new FakeAcmeCapability();
    const pipeline = new AcquisitionPipeline(store, capability, config);

    const { record, fallbackReason } = await pipeline.run({
      domainSet: parseDomainSet('example.com'),
      method: 'webroot',
    });

    expect(record.source).toBe('self-signed');
    expect(fallbackReason?.message).toBe('No ACME account is available (missing contact email)');
    expect(capability.obtained).toHaveLength(0);
  });

  it('surfaces DNS-01 record names and falls back without a DNS provider', async () => {
    const capability = new FakeAcmeCapability();
    const pipeline = new AcquisitionPipeline(store, capability, config);
    let surfaced: string[] = [];

    const { record, fallbackReason } = await pipeline.run(
      { domainSet: parseDomainSet('example.com,*.example.com,www.example.com'), method: 'dns', account },
      { onDnsRecords: (names) => (surfaced = names) },
    );

    expect(surfaced).toEqual(['_acme-challenge.example.com', '_acme-challenge.www.example.com']);
    expect(record.source).toBe('self-signed');
    expect(parseCertificate(record.certificatePem).dnsNames).toEqual([
      'example.com',
      '*.example.com',
      'www.example.com',
    ]);
    expect(fallbackReason?.context).toMatchObject({ recordNames: surfaced });
    expect(capability.obtained).toHaveLength(0);
  });

  it('uses the authority for DNS-01 when a provider is configured', async () => {
    const provider: DnsProvider = { publish: async () => undefined, remove: async () => undefined };
    const capability = new FakeAcmeCapability();
    const pipeline = new AcquisitionPipeline(store, capability, { ...config, dnsProvider: provider });

    const { record } = await pipeline.run({ domainSet: parseDomainSet('*.example.com'), method: 'dns', account });
    expect(record.source).toBe('acme');
    expect(record.domains).toEqual(['*.example.com']);
    expect(capability.responders).toEqual([{ method: 'dns', options: {} }]);
  });

  it('rejects wildcard entries for HTTP and TLS validation', async () => {
    const capability = new FakeAcmeCapability();
    const pipeline = new AcquisitionPipeline(store, capability, config);

    await expect(
      pipeline.run({ domainSet: parseDomainSet('*.example.com'), method: 'webroot', account }),
    ).rejects.toThrow(WildcardUnsupportedForMethodError);
    expect(capability.obtained).toHaveLength(0);
  });

  it('aborts when the certificate directory cannot be created', async () => {
    const blocker = join(tmp.path, 'blocker');
    await writeFile(blocker, '');
    const pipeline = new AcquisitionPipeline(new CertificateStore(blocker), new FakeAcmeCapability(), config);

    await expect(
      pipeline.run({ domainSet: parseDomainSet('example.com'), method: 'webroot', account }),
    ).rejects.toMatchObject({ step: 'mkdir' });
    await expect(
      pipeline.run({ domainSet: parseDomainSet('example.com'), method: 'webroot', account }),
    ).rejects.toThrow(StorageError);
  });

  it('bounds the obtain step with the configured timeout', async () => {
    const capability = new FakeAcmeCapability();
    capability.obtain = () => new Promise<CertificateMaterial>(() => undefined);
    const pipeline = new AcquisitionPipeline(store, capability, { ...config, obtainTimeoutMs: 50 });

    const { record, fallbackReason } = await pipeline.run({
      domainSet: parseDomainSet('example.com'),
      method: 'webroot',
      account,
    });
    expect(record.source).toBe('self-signed');
    expect(fallbackReason?.message).toBe('Certificate authority did not answer within 50ms');
  });

  it('renews through the capability when an existing certificate is given', async () => {
    const capability = new FakeAcmeCapability();
    const pipeline = new AcquisitionPipeline(store, capability, config);

    await pipeline.run({
      domainSet: parseDomainSet('example.com'),
      method: 'webroot',
      account,
      existing: { certificatePem: 'old', certUrl: 'https://acme.test/cert/0' },
    });
    expect(capability.obtained).toHaveLength(0);
    expect(capability.renewed[0].existing).toEqual({ certificatePem: 'old', certUrl: 'https://acme.test/cert/0' });
  });
});
