/**
 * Acquisition Pipeline
 *
 *   keygen -> request -> obtain -> finalize
 *                          \
 *                           -> fallback (self-signed)
 *
 * The key is written before any remote call. Filesystem failures abort;
 * failures of the remote sub-step degrade to a self-signed certificate
 * with the same names, logged under SELF-SIGNED FALLBACK.
 */

import type { Account } from '../accounts/account-store.js';
import type { AcmeCapability, CertificateMaterial } from '../acme/capability.js';
import { CHALLENGE_METHOD, type ChallengeMethod } from '../challenges/strategy.js';
import type { LifecycleConfig } from '../config/config.js';
import { FALLBACK_VALIDITY_DAYS } from '../constants/defaults.js';
import { createSelfSignedCertificate, parseCertificate } from '../crypto/certificate.js';
import { createCertificateRequest } from '../crypto/csr.js';
import { exportPrivateKeyPem, generateKeyPair } from '../crypto/keys.js';
import { describeAlgorithm } from '../crypto/algorithms.js';
import { dnsChallengeRecordName, isWildcard, type DomainSet } from '../domain/domain-set.js';
import {
  AcquisitionError,
  WildcardUnsupportedForMethodError,
} from '../errors/lifecycle-errors.js';
import { createLogger } from '../logger.js';
import type { CertificateStore } from '../storage/certificate-store.js';
import type { CertificatePaths, CertificateRecord, RenewalSettings } from '../storage/types.js';

const log = createLogger('pipeline');

export type PipelineStep = 'keygen' | 'request' | 'obtain' | 'finalize' | 'fallback' | 'persist';

export interface AcquisitionRequest {
  domainSet: DomainSet;
  method: ChallengeMethod;
  /** Absent when no contact email is known; the remote step then falls back */
  account?: Account;
  webroot?: string;
  /** Stored alongside the certificate for later renewals */
  renewal?: RenewalSettings;
  /** Currently stored certificate, when renewing */
  existing?: { certificatePem: string; certUrl?: string };
}

export interface AcquisitionHooks {
  onStep?(step: PipelineStep): void;
  /** TXT record names the operator must publish for DNS-01 */
  onDnsRecords?(recordNames: string[]): void;
}

export interface AcquisitionResult {
  record: CertificateRecord;
  paths: CertificatePaths;
  /** Why the authority path was abandoned; set only for fallback records */
  fallbackReason?: AcquisitionError;
}

export type PipelineConfig = Pick<LifecycleConfig, 'keyAlgorithm' | 'obtainTimeoutMs' | 'dnsProvider'>;

/** Every distinct `_acme-challenge.` record a domain set needs. */
export function dnsRecordNames(set: DomainSet): string[] {
  return [...new Set(set.entries.map(dnsChallengeRecordName))];
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number | undefined): Promise<T> {
  if (!timeoutMs) return work;
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(AcquisitionError.timeout(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export class AcquisitionPipeline {
  constructor(
    private readonly store: CertificateStore,
    private readonly capability: AcmeCapability,
    private readonly config: PipelineConfig,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async run(request: AcquisitionRequest, hooks: AcquisitionHooks = {}): Promise<AcquisitionResult> {
    const { domainSet } = request;
    await this.store.prepare(domainSet);

    return this.store.withLock(domainSet, async () => {
      hooks.onStep?.('keygen');
      const algorithm = this.config.keyAlgorithm;
      let keys: CryptoKeyPair;
      let privateKeyPem: string;
      try {
        keys = await generateKeyPair(algorithm);
        privateKeyPem = await exportPrivateKeyPem(keys.privateKey);
      } catch (e) {
        throw AcquisitionError.wrap('keygen', e);
      }
      await this.store.writeKey(domainSet, privateKeyPem);
      log.debug('Generated %s key for %s', describeAlgorithm(algorithm), domainSet.primary);

      let issued: CertificateMaterial | undefined;
      let fallbackReason: AcquisitionError | undefined;
      try {
        hooks.onStep?.('request');
        const csr = await createCertificateRequest(domainSet.entries, algorithm, domainSet.primary, keys).catch(
          (e: unknown) => {
            throw AcquisitionError.wrap('request', e);
          },
        );
        hooks.onStep?.('obtain');
        issued = await this.obtain(request, csr.pem, hooks);
      } catch (e) {
        if (e instanceof WildcardUnsupportedForMethodError) throw e;
        fallbackReason = AcquisitionError.wrap('obtain', e);
      }

      let record: CertificateRecord | undefined;
      if (issued) {
        hooks.onStep?.('finalize');
        try {
          record = this.issuedRecord(request, issued, privateKeyPem);
        } catch (e) {
          fallbackReason = AcquisitionError.wrap('finalize', e);
        }
      }
      if (!record) {
        hooks.onStep?.('fallback');
        record = await this.fallbackRecord(request, keys, privateKeyPem, fallbackReason);
      }

      hooks.onStep?.('persist');
      const paths = await this.store.save(record);
      return { record, paths, ...(fallbackReason && { fallbackReason }) };
    });
  }

  private async obtain(
    request: AcquisitionRequest,
    csrPem: string,
    hooks: AcquisitionHooks,
  ): Promise<CertificateMaterial> {
    const { domainSet, method, account } = request;

    if (method === CHALLENGE_METHOD.DNS) {
      const recordNames = dnsRecordNames(domainSet);
      for (const name of recordNames) {
        log.info('DNS-01 requires a TXT record at %s', name);
      }
      hooks.onDnsRecords?.(recordNames);
      if (!this.config.dnsProvider) {
        throw AcquisitionError.dnsProviderMissing(recordNames);
      }
    } else {
      const wildcard = domainSet.entries.find(isWildcard);
      if (wildcard) {
        throw WildcardUnsupportedForMethodError.of(wildcard, method);
      }
    }

    if (!account) {
      throw AcquisitionError.noAccount();
    }

    this.capability.setChallengeResponder(method, request.webroot ? { webroot: request.webroot } : {});
    const call = request.existing
      ? this.capability.renew({ account, domainSet, csrPem, existing: request.existing })
      : this.capability.obtain({ account, domainSet, csrPem });
    return withTimeout(call, this.config.obtainTimeoutMs);
  }

  private issuedRecord(
    request: AcquisitionRequest,
    material: CertificateMaterial,
    privateKeyPem: string,
  ): CertificateRecord {
    const parsed = parseCertificate(material.certificatePem);
    log.info('Certificate for %s issued by %s', request.domainSet.primary, parsed.issuer);
    return {
      domainSet: request.domainSet,
      domains: parsed.dnsNames.length > 0 ? parsed.dnsNames : [...request.domainSet.entries],
      certificatePem: material.certificatePem,
      privateKeyPem,
      ...(material.chainPem && { chainPem: material.chainPem }),
      expiresAt: parsed.notAfter,
      source: 'acme',
      ...(material.certUrl && { certUrl: material.certUrl }),
      ...(material.certStableUrl && { certStableUrl: material.certStableUrl }),
      ...(request.renewal && { renewal: request.renewal }),
    };
  }

  private async fallbackRecord(
    request: AcquisitionRequest,
    keys: CryptoKeyPair,
    privateKeyPem: string,
    reason: AcquisitionError | undefined,
  ): Promise<CertificateRecord> {
    const { domainSet } = request;
    log.warn(
      'SELF-SIGNED FALLBACK for %s: %s',
      domainSet.primary,
      reason ? reason.message : 'no certificate obtained',
    );

    const now = this.now();
    let certificatePem: string;
    try {
      certificatePem = await createSelfSignedCertificate({
        dnsNames: domainSet.entries,
        keys,
        algorithm: this.config.keyAlgorithm,
        validityDays: FALLBACK_VALIDITY_DAYS,
        commonName: domainSet.primary,
        now,
      });
    } catch (e) {
      throw new AcquisitionError(
        `Self-signed fallback for ${domainSet.primary} failed: ${e instanceof Error ? e.message : String(e)}`,
        'fallback',
        {},
        { cause: e },
      );
    }

    return {
      domainSet,
      domains: [...domainSet.entries],
      certificatePem,
      privateKeyPem,
      expiresAt: parseCertificate(certificatePem).notAfter,
      source: 'self-signed',
      ...(request.renewal && { renewal: request.renewal }),
    };
  }
}
