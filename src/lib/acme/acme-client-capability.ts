/**
 * ACME capability backed by acme-client
 *
 * Runs the full order flow (order -> authorizations -> challenge ->
 * finalize -> download) with whichever responder was bound last. The CSR
 * and its key are produced by the pipeline; the engine only signs requests
 * with the account key.
 */

import * as acme from 'acme-client';
import type { Account } from '../accounts/account-store.js';
import { CHALLENGE_METHOD, type ChallengeMethod } from '../challenges/strategy.js';
import { DEFAULT_HTTP_PORT, DEFAULT_TLS_PORT } from '../constants/defaults.js';
import { splitPemBundle } from '../crypto/certificate.js';
import { AcquisitionError } from '../errors/lifecycle-errors.js';
import { createLogger } from '../logger.js';
import type {
  AcmeCapability,
  CertificateMaterial,
  ChallengePreparation,
  ChallengeResponder,
  DnsProvider,
  ObtainRequest,
  RenewRequest,
  ResponderOptions,
} from './capability.js';
import { DnsResponder } from './responders/dns-01.js';
import { StandaloneHttpResponder, WebrootResponder } from './responders/http-01.js';
import { TlsAlpnResponder } from './responders/tls-alpn-01.js';

const log = createLogger('acme');
const engineLog = createLogger('acme:engine');

acme.setLogger((message: string) => engineLog.debug('%s', message));

/** Subset of the acme-client Client used by the capability. */
export type AcmeEngine = Pick<
  acme.Client,
  | 'createAccount'
  | 'getAccountUrl'
  | 'createOrder'
  | 'getAuthorizations'
  | 'getChallengeKeyAuthorization'
  | 'completeChallenge'
  | 'waitForValidStatus'
  | 'finalizeOrder'
  | 'getCertificate'
>;

export type AcmeEngineFactory = (options: acme.ClientOptions) => AcmeEngine;

export interface AcmeClientCapabilityOptions {
  directoryUrl: string;
  httpPort?: number;
  tlsPort?: number;
  dnsProvider?: DnsProvider;
  /** Replaces `new acme.Client(...)`; used by tests. */
  engineFactory?: AcmeEngineFactory;
}

export class AcmeClientCapability implements AcmeCapability {
  private responder?: ChallengeResponder;
  private readonly engineFactory: AcmeEngineFactory;

  constructor(private readonly options: AcmeClientCapabilityOptions) {
    this.engineFactory = options.engineFactory ?? ((opts) => new acme.Client(opts));
  }

  async register(account: Account): Promise<string> {
    const engine = this.engine(account);
    // an existing key yields the existing account
    await engine.createAccount({
      termsOfServiceAgreed: true,
      contact: [`mailto:${account.email}`],
    });
    const url = engine.getAccountUrl();
    log.info('ACME account for %s: %s', account.email, url);
    return url;
  }

  setChallengeResponder(method: ChallengeMethod, options: ResponderOptions = {}): void {
    switch (method) {
      case CHALLENGE_METHOD.WEBROOT:
        this.responder = options.webroot
          ? new WebrootResponder(options.webroot)
          : new StandaloneHttpResponder(options.port ?? this.options.httpPort ?? DEFAULT_HTTP_PORT);
        break;
      case CHALLENGE_METHOD.STANDALONE:
        this.responder = new TlsAlpnResponder(options.port ?? this.options.tlsPort ?? DEFAULT_TLS_PORT);
        break;
      case CHALLENGE_METHOD.DNS:
        this.responder = this.options.dnsProvider ? new DnsResponder(this.options.dnsProvider) : undefined;
        break;
    }
  }

  async obtain(request: ObtainRequest): Promise<CertificateMaterial> {
    const responder = this.responder;
    if (!responder) {
      throw AcquisitionError.noResponder('the current challenge method');
    }

    const engine = this.engine(request.account);
    if (!request.account.registrationRef) {
      await engine.createAccount({
        termsOfServiceAgreed: true,
        contact: [`mailto:${request.account.email}`],
      });
    }

    const order = await engine.createOrder({
      identifiers: request.domainSet.entries.map((value) => ({ type: 'dns', value })),
    });
    log.debug('Order created: %s', order.url);

    const presented: ChallengePreparation[] = [];
    try {
      const authorizations = await engine.getAuthorizations(order);
      for (const authz of authorizations) {
        if (authz.status === 'valid') continue;
        const identifier = authz.identifier.value;
        const challenge = authz.challenges.find((c) => c.type === responder.challengeType);
        if (!challenge) {
          throw AcquisitionError.challengeNotOffered(responder.challengeType, identifier);
        }

        const value = await engine.getChallengeKeyAuthorization(challenge);
        const preparation: ChallengePreparation = { identifier, token: challenge.token, value };
        await responder.present(preparation);
        presented.push(preparation);

        await engine.completeChallenge(challenge);
        await engine.waitForValidStatus(challenge);
        log.debug('%s validated for %s', responder.challengeType, identifier);
      }

      const finalized = await engine.finalizeOrder(order, request.csrPem);
      const bundle = await engine.getCertificate(finalized);
      const [leaf, ...chain] = splitPemBundle(bundle);
      if (!leaf) {
        throw new Error('Authority returned no certificate');
      }

      return {
        certificatePem: leaf,
        ...(chain.length > 0 && { chainPem: chain.join('') }),
        ...(finalized.certificate && { certUrl: finalized.certificate }),
        certStableUrl: finalized.url,
      };
    } finally {
      await this.release(responder, presented);
    }
  }

  /** ACME has no renewal operation: a renewal is a fresh order. */
  renew(request: RenewRequest): Promise<CertificateMaterial> {
    log.debug('Renewing certificate previously issued at %s', request.existing.certUrl ?? 'unknown URL');
    return this.obtain(request);
  }

  private engine(account: Account): AcmeEngine {
    return this.engineFactory({
      directoryUrl: this.options.directoryUrl,
      accountKey: account.privateKeyPem,
      ...(account.registrationRef && { accountUrl: account.registrationRef }),
    });
  }

  private async release(responder: ChallengeResponder, presented: ChallengePreparation[]): Promise<void> {
    for (const preparation of presented) {
      try {
        await responder.cleanup(preparation);
      } catch (e) {
        log.warn('Challenge cleanup for %s failed: %s', preparation.identifier, e instanceof Error ? e.message : e);
      }
    }
    try {
      await responder.close();
    } catch (e) {
      log.warn('Stopping %s responder failed: %s', responder.challengeType, e instanceof Error ? e.message : e);
    }
  }
}
