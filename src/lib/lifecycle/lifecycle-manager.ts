/**
 * Lifecycle Manager
 *
 * Ties the stores, the acquisition pipeline and the web server configurator
 * together behind two top-level transitions:
 *
 *   install: idle -> validating -> obtaining-identity -> acquiring
 *            -> persisting -> configuring -> done
 *   renew:   idle -> checking-expiry -> (done | validating -> ...)
 *
 * Any error moves the run to `failed` and is rethrown. Remote acquisition
 * failures never get here: the pipeline turns them into a fallback.
 */

import { AccountStore, type Account } from '../accounts/account-store.js';
import { AcmeClientCapability } from '../acme/acme-client-capability.js';
import type { AcmeCapability } from '../acme/capability.js';
import {
  intentFor,
  selectChallengeMethod,
  type ChallengeIntent,
  type ChallengeMethod,
} from '../challenges/strategy.js';
import type { LifecycleConfig } from '../config/config.js';
import { joinDomains, parseDomainSet, type DomainSet } from '../domain/domain-set.js';
import { isWebServerApplyError, type AcquisitionError } from '../errors/lifecycle-errors.js';
import { createLogger } from '../logger.js';
import {
  AcquisitionPipeline,
  type AcquisitionRequest,
  type PipelineStep,
} from '../pipeline/acquisition-pipeline.js';
import { CertificateStore, needsRenewal } from '../storage/certificate-store.js';
import type {
  CertificatePaths,
  CertificateRecord,
  CertificateStatus,
  RenewalSettings,
} from '../storage/types.js';
import { applyConfiguration, createConfigurator } from '../webserver/index.js';
import type { WebServerConfigurator, WebServerKind, WebServerSettings } from '../webserver/types.js';

const log = createLogger('lifecycle');

export const LIFECYCLE_STATE = {
  IDLE: 'idle',
  CHECKING_EXPIRY: 'checking-expiry',
  VALIDATING: 'validating',
  OBTAINING_IDENTITY: 'obtaining-identity',
  ACQUIRING: 'acquiring',
  PERSISTING: 'persisting',
  CONFIGURING: 'configuring',
  DONE: 'done',
  FAILED: 'failed',
} as const;

export type LifecycleState = (typeof LIFECYCLE_STATE)[keyof typeof LIFECYCLE_STATE];

export interface LifecycleTransition {
  /** Raw domain input of the run */
  domains: string;
  from: LifecycleState;
  to: LifecycleState;
  error?: unknown;
}

export interface InstallOptions {
  domains: string | readonly string[];
  email?: string;
  intent?: ChallengeIntent;
  /** Overrides the configurator bound at construction */
  webServer?: WebServerKind;
}

export interface RenewOptions {
  domains: string | readonly string[];
  /** Renew regardless of the remaining validity */
  force?: boolean;
}

export interface LifecycleResult {
  domainSet: DomainSet;
  /** Absent when a renewal was not due */
  record?: CertificateRecord;
  paths?: CertificatePaths;
  fallback: boolean;
  fallbackReason?: AcquisitionError;
  configured: boolean;
  /** Days left on the existing certificate, for renewals */
  daysLeft?: number;
  /** DNS-01 TXT record names surfaced during acquisition */
  dnsRecords?: string[];
}

export interface LifecycleManagerOptions {
  config: LifecycleConfig;
  capability?: AcmeCapability;
  /** Configurator used for runs that name no other web server or stored settings */
  configurator?: WebServerConfigurator;
  /**
   * Builds a configurator for a web server named per run or in stored
   * settings; `stored` carries the deployment settings of a renewal.
   */
  configuratorFactory?: (kind: WebServerKind, stored?: WebServerSettings) => WebServerConfigurator;
  onTransition?: (transition: LifecycleTransition) => void;
  now?: () => Date;
}

interface RunParameters {
  intent: ChallengeIntent;
  email?: string;
  webServer?: WebServerKind;
  webServerSettings?: WebServerSettings;
  existing?: AcquisitionRequest['existing'];
}

export class LifecycleManager {
  readonly store: CertificateStore;
  readonly accounts: AccountStore;
  private readonly capability: AcmeCapability;
  private readonly pipeline: AcquisitionPipeline;
  private readonly configuratorFactory: (kind: WebServerKind, stored?: WebServerSettings) => WebServerConfigurator;

  constructor(private readonly options: LifecycleManagerOptions) {
    const { config } = options;
    const now = options.now ?? (() => new Date());
    this.store = new CertificateStore(config.certDir, { now });
    this.accounts = new AccountStore(config.accountDir);
    this.capability =
      options.capability ??
      new AcmeClientCapability({
        directoryUrl: config.directoryUrl,
        httpPort: config.httpPort,
        tlsPort: config.tlsPort,
        dnsProvider: config.dnsProvider,
      });
    this.pipeline = new AcquisitionPipeline(this.store, this.capability, config, now);
    this.configuratorFactory = options.configuratorFactory ?? ((kind, stored) => createConfigurator(kind, {}, stored));
  }

  /** Obtain (or synthesize) a certificate for a domain set and deploy it. */
  install(options: InstallOptions): Promise<LifecycleResult> {
    const run = this.track(options.domains);
    return run.guard(() =>
      this.acquire(run, options.domains, {
        intent: options.intent ?? {},
        email: options.email,
        webServer: options.webServer,
      }),
    );
  }

  /**
   * Renew a stored certificate with its original parameters. Does nothing
   * (and touches no network) while more than 30 days remain, unless forced.
   */
  renew(options: RenewOptions): Promise<LifecycleResult> {
    const run = this.track(options.domains);
    return run.guard(async () => {
      run.to(LIFECYCLE_STATE.CHECKING_EXPIRY);
      const domainSet = await this.resolve(options.domains);
      const status = await this.store.info(domainSet);

      if (!options.force && !needsRenewal(status)) {
        log.info('%s has %d days left, renewal not due', domainSet.primary, status.daysLeft);
        run.to(LIFECYCLE_STATE.DONE);
        return { domainSet, fallback: false, configured: false, daysLeft: status.daysLeft };
      }

      const settings = status.metadata?.renewal;
      const certificatePem = await this.store.readCertificate(domainSet);
      const result = await this.acquire(run, domainSet.entries, {
        intent: settings ? intentFor(settings.challenge, settings.webroot) : {},
        email: settings?.email,
        webServer: settings?.webServer,
        webServerSettings: settings?.webServerSettings,
        existing: {
          certificatePem,
          ...(status.metadata?.certUrl && { certUrl: status.metadata.certUrl }),
        },
      });
      return { ...result, daysLeft: status.daysLeft };
    });
  }

  /** Renew every stored certificate; failures of one set do not stop the rest. */
  async renewAll(force = false): Promise<Array<{ domainSet: DomainSet; result?: LifecycleResult; error?: unknown }>> {
    const outcomes: Array<{ domainSet: DomainSet; result?: LifecycleResult; error?: unknown }> = [];
    for (const domainSet of await this.store.list()) {
      try {
        outcomes.push({ domainSet, result: await this.renew({ domains: domainSet.entries, force }) });
      } catch (error) {
        log.error('Renewal of %s failed: %s', domainSet.primary, error instanceof Error ? error.message : error);
        outcomes.push({ domainSet, error });
      }
    }
    return outcomes;
  }

  /**
   * Expiry status of one stored certificate.
   * @throws CertificateNotFoundError
   */
  async status(domains: string | readonly string[]): Promise<CertificateStatus> {
    return this.store.info(await this.resolve(domains));
  }

  async statusAll(): Promise<CertificateStatus[]> {
    const sets = await this.store.list();
    return Promise.all(sets.map((set) => this.store.info(set)));
  }

  private async acquire(
    run: RunTracker,
    domains: string | readonly string[],
    params: RunParameters,
  ): Promise<LifecycleResult> {
    run.to(LIFECYCLE_STATE.VALIDATING);
    const domainSet = parseDomainSet(domains);
    const method = selectChallengeMethod(domainSet, params.intent);

    run.to(LIFECYCLE_STATE.OBTAINING_IDENTITY);
    const account = await this.identity(params.email ?? this.options.config.email);

    run.to(LIFECYCLE_STATE.ACQUIRING);
    const configurator = this.configuratorFor(params.webServer, params.webServerSettings);
    let dnsRecords: string[] | undefined;
    const { record, paths, fallbackReason } = await this.pipeline.run(
      {
        domainSet,
        method,
        account,
        webroot: params.intent.webroot,
        renewal: this.renewalSettings(method, account, params.intent.webroot, configurator),
        existing: params.existing,
      },
      {
        onStep: (step: PipelineStep) => {
          if (step === 'finalize' || step === 'fallback') run.to(LIFECYCLE_STATE.PERSISTING);
        },
        onDnsRecords: (names) => {
          dnsRecords = names;
        },
      },
    );

    let configured = false;
    if (configurator) {
      run.to(LIFECYCLE_STATE.CONFIGURING);
      try {
        await applyConfiguration(configurator, {
          kind: configurator.kind,
          primary: domainSet.primary,
          domains: joinDomains(domainSet),
          certPath: paths.cert,
          keyPath: paths.key,
          fullchainPath: paths.fullchain,
          ...(record.chainPem && { chainPath: paths.chain }),
          ...(params.intent.webroot && { webroot: params.intent.webroot }),
        });
      } catch (e) {
        // issued but not live: keep the certificate visible to the caller
        if (isWebServerApplyError(e)) e.attachCertificate(record);
        throw e;
      }
      configured = true;
    } else {
      log.warn('No web server selected; %s was not deployed', domainSet.primary);
    }

    run.to(LIFECYCLE_STATE.DONE);
    return {
      domainSet,
      record,
      paths,
      fallback: record.source === 'self-signed',
      ...(fallbackReason && { fallbackReason }),
      configured,
      ...(dnsRecords && { dnsRecords }),
    };
  }

  private async identity(email: string | undefined): Promise<Account | undefined> {
    if (!email) {
      log.warn('No contact email configured; the authority cannot be contacted');
      return undefined;
    }
    const account = await this.accounts.loadOrCreate(email);
    return this.accounts.ensureRegistered(account, this.capability);
  }

  private configuratorFor(
    kind: WebServerKind | undefined,
    stored: WebServerSettings | undefined,
  ): WebServerConfigurator | undefined {
    if (kind && (stored || this.options.configurator?.kind !== kind)) {
      return this.configuratorFactory(kind, stored);
    }
    return this.options.configurator;
  }

  private renewalSettings(
    challenge: ChallengeMethod,
    account: Account | undefined,
    webroot: string | undefined,
    configurator: WebServerConfigurator | undefined,
  ): RenewalSettings {
    return {
      challenge,
      ...(account && { email: account.email }),
      ...(webroot && { webroot }),
      ...(configurator && { webServer: configurator.kind }),
      ...(configurator && hasSettings(configurator.settings) && { webServerSettings: configurator.settings }),
    };
  }

  /** A stored set matching the input, or the parsed input itself. */
  private async resolve(domains: string | readonly string[]): Promise<DomainSet> {
    const wanted = parseDomainSet(domains);
    return (await this.store.locate(wanted.entries.join(','))) ?? wanted;
  }

  private track(domains: string | readonly string[]): RunTracker {
    return new RunTracker(typeof domains === 'string' ? domains : domains.join(','), this.options.onTransition);
  }
}

function hasSettings(settings: WebServerSettings): boolean {
  return Object.values(settings).some((value) => value !== undefined);
}

class RunTracker {
  state: LifecycleState = LIFECYCLE_STATE.IDLE;

  constructor(
    private readonly domains: string,
    private readonly observer?: (transition: LifecycleTransition) => void,
  ) {}

  to(next: LifecycleState, error?: unknown): void {
    const from = this.state;
    this.state = next;
    log.debug('%s: %s -> %s', this.domains, from, next);
    this.observer?.({ domains: this.domains, from, to: next, ...(error !== undefined && { error }) });
  }

  async guard<T>(work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (e) {
      this.to(LIFECYCLE_STATE.FAILED, e);
      throw e;
    }
  }
}
