import type { ChallengeMethod } from '../challenges/strategy.js';
import type { DomainSet } from '../domain/domain-set.js';
import type { WebServerKind, WebServerSettings } from '../webserver/types.js';

/** Where a stored certificate came from. */
export type CertificateSource = 'acme' | 'self-signed';

/** Parameters needed to re-run an install for a stored certificate. */
export interface RenewalSettings {
  email?: string;
  challenge: ChallengeMethod;
  webroot?: string;
  webServer?: WebServerKind;
  /** Where the web server configurator deployed to */
  webServerSettings?: WebServerSettings;
}

/**
 * A complete set of certificate material for one domain set.
 * Written as a whole; never partially updated.
 */
export interface CertificateRecord {
  domainSet: DomainSet;
  /** Names the certificate was actually issued for (may differ in order) */
  domains: string[];
  certificatePem: string;
  privateKeyPem: string;
  chainPem?: string;
  expiresAt: Date;
  source: CertificateSource;
  /** Issuing URL reported by the authority */
  certUrl?: string;
  /** Stable URL (the order resource) reported by the authority */
  certStableUrl?: string;
  renewal?: RenewalSettings;
}

/** JSON sidecar stored as cert.json */
export interface CertificateMetadata {
  domain: string;
  /** Requested entries, in request order */
  domains: string[];
  issuedFor: string[];
  source: CertificateSource;
  certUrl?: string;
  certStableUrl?: string;
  issuedAt: string;
  expiresAt: string;
  renewal?: RenewalSettings;
}

export interface CertificatePaths {
  dir: string;
  cert: string;
  key: string;
  chain: string;
  fullchain: string;
  metadata: string;
  domains: string;
}

/** Expiry introspection result for a stored certificate. */
export interface CertificateStatus {
  domain: string;
  /** SAN entries read from the certificate */
  domains: string[];
  certPath: string;
  keyPath: string;
  chainPath: string;
  expiryDate: Date;
  isValid: boolean;
  daysLeft: number;
  issuer: string;
  selfSigned: boolean;
  metadata?: CertificateMetadata;
}
