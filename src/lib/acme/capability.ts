/**
 * ACME capability
 *
 * The lifecycle core talks to a certificate authority only through this
 * interface. Every failure it raises is recoverable: the pipeline degrades
 * to a self-signed certificate instead of aborting.
 */

import type { Account } from '../accounts/account-store.js';
import type { AcmeChallengeType, ChallengeMethod } from '../challenges/strategy.js';
import type { DomainSet } from '../domain/domain-set.js';

/** Certificate material returned by the authority. */
export interface CertificateMaterial {
  /** Leaf certificate (PEM) */
  certificatePem: string;
  /** Issuer chain (PEM), when the authority returned one */
  chainPem?: string;
  /** Issuing URL */
  certUrl?: string;
  /** Stable URL of the order resource */
  certStableUrl?: string;
}

export interface ObtainRequest {
  account: Account;
  domainSet: DomainSet;
  /** PEM-encoded CSR naming every entry of the domain set */
  csrPem: string;
}

export interface RenewRequest extends ObtainRequest {
  existing: Pick<CertificateMaterial, 'certificatePem' | 'certUrl'>;
}

export interface ResponderOptions {
  /** Listening port of a built-in responder */
  port?: number;
  /** Document root for HTTP-01 files */
  webroot?: string;
}

/** Data handed to a responder for one authorization. */
export interface ChallengePreparation {
  /** Identifier under validation (wildcard prefix stripped) */
  identifier: string;
  token: string;
  /** Value to present: key authorization, or its digest for DNS-01 */
  value: string;
}

export interface ChallengeResponder {
  readonly challengeType: AcmeChallengeType;
  present(challenge: ChallengePreparation): Promise<void>;
  cleanup(challenge: ChallengePreparation): Promise<void>;
  /** Stop listeners opened by `present`. */
  close(): Promise<void>;
}

/** Publishes the TXT records of DNS-01 challenges. */
export interface DnsProvider {
  publish(recordName: string, value: string): Promise<void>;
  remove(recordName: string, value: string): Promise<void>;
}

export interface AcmeCapability {
  /** Register (or look up) the account; returns the registration reference. */
  register(account: Account): Promise<string>;
  /** Bind the responder used by the next obtain/renew calls. */
  setChallengeResponder(method: ChallengeMethod, options?: ResponderOptions): void;
  obtain(request: ObtainRequest): Promise<CertificateMaterial>;
  renew(request: RenewRequest): Promise<CertificateMaterial>;
}
