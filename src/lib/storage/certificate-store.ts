/**
 * On-disk certificate storage
 *
 * Layout per domain set (directory named by `directoryName`):
 *
 *   cert.pem        leaf certificate
 *   key.pem         private key (0600)
 *   chain.pem       issuer chain, when the authority returned one
 *   fullchain.pem   cert.pem + chain.pem
 *   cert.json       metadata sidecar
 *   domains.txt     newline separated entries (multi-domain sets only)
 *
 * Writes are atomic per file but not across files; re-running an install
 * overwrites the whole set.
 */

import { mkdir, readdir, rm } from 'fs/promises';
import { join } from 'path';
import {
  CERT_DIR_MODE,
  CERT_FILE,
  CHAIN_FILE,
  DOMAINS_FILE,
  FULLCHAIN_FILE,
  KEY_FILE,
  METADATA_FILE,
  PRIVATE_FILE_MODE,
  PUBLIC_FILE_MODE,
  RENEWAL_THRESHOLD_DAYS,
} from '../constants/defaults.js';
import { directoryName, parseDomainSet, type DomainSet } from '../domain/domain-set.js';
import { CertificateNotFoundError, StorageError } from '../errors/lifecycle-errors.js';
import { daysUntil, parseCertificate } from '../crypto/certificate.js';
import { createLogger } from '../logger.js';
import { withDirectoryLock, type DirectoryLockOptions } from './directory-lock.js';
import { isNotFound, readOptionalFile, writeFileAtomic } from './fs-utils.js';
import { isChallengeMethod } from '../challenges/strategy.js';
import { isWebServerKind, isWebServerSettings } from '../webserver/types.js';
import type {
  RenewalSettings,
  CertificateMetadata,
  CertificatePaths,
  CertificateRecord,
  CertificateStatus,
} from './types.js';

const log = createLogger('store');

export interface CertificateStoreOptions {
  /** Clock used for expiry computations */
  now?: () => Date;
  lock?: DirectoryLockOptions;
}

/** Renewal is due once the certificate has 30 days or fewer left. */
export function needsRenewal(status: Pick<CertificateStatus, 'daysLeft'>): boolean {
  return status.daysLeft <= RENEWAL_THRESHOLD_DAYS;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/** Parse cert.json, returning undefined for malformed content. */
export function parseMetadata(raw: string): CertificateMetadata | undefined {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof value !== 'object' || value === null) return undefined;
  const candidate: Partial<Record<keyof CertificateMetadata, unknown>> = value;
  if (
    typeof candidate.domain !== 'string' ||
    !isStringArray(candidate.domains) ||
    (candidate.source !== 'acme' && candidate.source !== 'self-signed') ||
    typeof candidate.expiresAt !== 'string'
  ) {
    return undefined;
  }
  return {
    domain: candidate.domain,
    domains: candidate.domains,
    issuedFor: isStringArray(candidate.issuedFor) ? candidate.issuedFor : candidate.domains,
    source: candidate.source,
    ...(typeof candidate.certUrl === 'string' && { certUrl: candidate.certUrl }),
    ...(typeof candidate.certStableUrl === 'string' && { certStableUrl: candidate.certStableUrl }),
    issuedAt: typeof candidate.issuedAt === 'string' ? candidate.issuedAt : candidate.expiresAt,
    expiresAt: candidate.expiresAt,
    ...(isRenewalSettings(candidate.renewal) && { renewal: candidate.renewal }),
  };
}

function isRenewalSettings(value: unknown): value is RenewalSettings {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Partial<Record<keyof RenewalSettings, unknown>> = value;
  return (
    isChallengeMethod(candidate.challenge) &&
    (candidate.email === undefined || typeof candidate.email === 'string') &&
    (candidate.webroot === undefined || typeof candidate.webroot === 'string') &&
    (candidate.webServer === undefined || isWebServerKind(candidate.webServer)) &&
    (candidate.webServerSettings === undefined || isWebServerSettings(candidate.webServerSettings))
  );
}

function sameEntries(a: DomainSet, b: DomainSet): boolean {
  return a.entries.length === b.entries.length && a.entries.every((d, i) => d === b.entries[i]);
}

export class CertificateStore {
  private readonly now: () => Date;

  constructor(
    readonly root: string,
    private readonly options: CertificateStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  paths(set: DomainSet): CertificatePaths {
    const dir = join(this.root, directoryName(set));
    return {
      dir,
      cert: join(dir, CERT_FILE),
      key: join(dir, KEY_FILE),
      chain: join(dir, CHAIN_FILE),
      fullchain: join(dir, FULLCHAIN_FILE),
      metadata: join(dir, METADATA_FILE),
      domains: join(dir, DOMAINS_FILE),
    };
  }

  /** Create the directory for a domain set. Failure is fatal. */
  async prepare(set: DomainSet): Promise<CertificatePaths> {
    const paths = this.paths(set);
    try {
      await mkdir(paths.dir, { recursive: true, mode: CERT_DIR_MODE });
    } catch (e) {
      throw StorageError.wrap('mkdir', paths.dir, e);
    }
    return paths;
  }

  /** Run `fn` holding the directory lock of a prepared domain set. */
  withLock<T>(set: DomainSet, fn: () => Promise<T>): Promise<T> {
    return withDirectoryLock(this.paths(set).dir, fn, this.options.lock);
  }

  /** Persist a freshly generated private key (owner read/write only). */
  async writeKey(set: DomainSet, privateKeyPem: string): Promise<string> {
    const { key } = this.paths(set);
    try {
      await writeFileAtomic(key, privateKeyPem, PRIVATE_FILE_MODE);
    } catch (e) {
      throw StorageError.wrap('keygen', key, e);
    }
    log.debug('Private key written to %s', key);
    return key;
  }

  /** Write a complete record. Callers hold the directory lock. */
  async save(record: CertificateRecord): Promise<CertificatePaths> {
    const paths = this.paths(record.domainSet);
    const metadata: CertificateMetadata = {
      domain: record.domainSet.primary,
      domains: [...record.domainSet.entries],
      issuedFor: record.domains,
      source: record.source,
      ...(record.certUrl && { certUrl: record.certUrl }),
      ...(record.certStableUrl && { certStableUrl: record.certStableUrl }),
      issuedAt: this.now().toISOString(),
      expiresAt: record.expiresAt.toISOString(),
      ...(record.renewal && { renewal: record.renewal }),
    };

    let current = paths.cert;
    try {
      await writeFileAtomic(paths.cert, record.certificatePem, PUBLIC_FILE_MODE);
      current = paths.key;
      await writeFileAtomic(paths.key, record.privateKeyPem, PRIVATE_FILE_MODE);
      current = paths.chain;
      if (record.chainPem) {
        await writeFileAtomic(paths.chain, record.chainPem, PUBLIC_FILE_MODE);
      } else {
        await rm(paths.chain, { force: true });
      }
      current = paths.fullchain;
      await writeFileAtomic(paths.fullchain, record.certificatePem + (record.chainPem ?? ''), PUBLIC_FILE_MODE);
      current = paths.metadata;
      await writeFileAtomic(paths.metadata, JSON.stringify(metadata, null, 2) + '\n', PUBLIC_FILE_MODE);
      if (record.domainSet.isMultiDomain) {
        current = paths.domains;
        await writeFileAtomic(paths.domains, record.domainSet.entries.join('\n'), PUBLIC_FILE_MODE);
      }
    } catch (e) {
      throw StorageError.wrap('finalize', current, e);
    }

    log.info('Saved %s certificate for %s in %s', record.source, record.domainSet.primary, paths.dir);
    return paths;
  }

  async readMetadata(set: DomainSet): Promise<CertificateMetadata | undefined> {
    const raw = await readOptionalFile(this.paths(set).metadata);
    if (raw === undefined) return undefined;
    const metadata = parseMetadata(raw);
    if (!metadata) log.warn('Ignoring unreadable metadata for %s', set.primary);
    return metadata;
  }

  /** @throws CertificateNotFoundError when no cert.pem exists */
  async readCertificate(set: DomainSet): Promise<string> {
    const { cert } = this.paths(set);
    const pem = await readOptionalFile(cert);
    if (pem === undefined) {
      throw CertificateNotFoundError.at(set.primary, cert);
    }
    return pem;
  }

  /**
   * Expiry introspection for the certificate stored for `set`.
   * @throws CertificateNotFoundError when no cert.pem exists
   */
  async info(set: DomainSet): Promise<CertificateStatus> {
    const paths = this.paths(set);
    const pem = await this.readCertificate(set);
    const parsed = parseCertificate(pem);
    const now = this.now();
    return {
      domain: set.primary,
      domains: parsed.dnsNames,
      certPath: paths.cert,
      keyPath: paths.key,
      chainPath: paths.chain,
      expiryDate: parsed.notAfter,
      isValid: now.getTime() < parsed.notAfter.getTime(),
      daysLeft: daysUntil(parsed.notAfter, now),
      issuer: parsed.issuer,
      selfSigned: parsed.selfSigned,
      metadata: await this.readMetadata(set),
    };
  }

  needsRenewal(status: Pick<CertificateStatus, 'daysLeft'>): boolean {
    return needsRenewal(status);
  }

  /** Every domain set that has a stored certificate. */
  async list(): Promise<DomainSet[]> {
    const entries = await readdir(this.root, { withFileTypes: true }).catch((e: unknown) => {
      if (isNotFound(e)) return [];
      throw e;
    });

    const sets: DomainSet[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name.startsWith('.')) continue;
      const dir = join(this.root, entry.name);
      if ((await readOptionalFile(join(dir, CERT_FILE))) === undefined) continue;

      try {
        sets.push(await this.readDomainSet(dir, entry.name));
      } catch (e) {
        log.warn('Skipping %s: %s', dir, e instanceof Error ? e.message : e);
      }
    }
    return sets.sort((a, b) => a.primary.localeCompare(b.primary));
  }

  /**
   * Find the stored set for user input: an exact match of the entries, or
   * otherwise the set whose primary domain matches.
   */
  async locate(input: string): Promise<DomainSet | undefined> {
    const wanted = parseDomainSet(input);
    const stored = await this.list();
    return stored.find((s) => sameEntries(s, wanted)) ?? stored.find((s) => s.primary === wanted.primary);
  }

  private async readDomainSet(dir: string, name: string): Promise<DomainSet> {
    const list = await readOptionalFile(join(dir, DOMAINS_FILE));
    if (list !== undefined) {
      return parseDomainSet(list.split('\n').filter((line) => line.trim().length > 0));
    }
    const raw = await readOptionalFile(join(dir, METADATA_FILE));
    const metadata = raw === undefined ? undefined : parseMetadata(raw);
    if (metadata && metadata.domains.length > 0) {
      return parseDomainSet(metadata.domains);
    }
    return parseDomainSet(name);
  }
}
