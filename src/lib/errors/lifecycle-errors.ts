/**
 * Certificate lifecycle errors
 *
 * Each class maps to one entry of the lifecycle error taxonomy. All of them
 * carry a stable `code`, a coarse `type` and a context object so callers can
 * branch on the failure without parsing messages.
 *
 * Failures of a pipeline step additionally carry the step name and the
 * underlying cause.
 */

import type { CertificateRecord } from '../storage/types.js';

/** Pipeline and configurator steps that can fail. */
export type LifecycleStep =
  | 'validate'
  | 'identity'
  | 'mkdir'
  | 'lock'
  | 'keygen'
  | 'request'
  | 'obtain'
  | 'finalize'
  | 'fallback'
  | 'configure'
  | 'test'
  | 'reload';

/**
 * Base class for all lifecycle errors
 */
export abstract class LifecycleError extends Error {
  abstract readonly code: string;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * A domain entry failed syntactic validation
 */
export class InvalidDomainFormatError extends LifecycleError {
  readonly code = 'INVALID_DOMAIN_FORMAT';
  readonly type = 'validation';

  static empty(): InvalidDomainFormatError {
    return new InvalidDomainFormatError('At least one domain is required', { reason: 'empty' });
  }

  static entry(domain: string, reason: string): InvalidDomainFormatError {
    return new InvalidDomainFormatError(`Invalid domain "${domain}": ${reason}`, { domain, reason });
  }
}

/**
 * More than one explicit challenge intent was given
 */
export class ConflictingChallengeIntentError extends LifecycleError {
  readonly code = 'CONFLICTING_CHALLENGE_INTENT';
  readonly type = 'validation';

  static of(intents: string[]): ConflictingChallengeIntentError {
    return new ConflictingChallengeIntentError(
      `Only one challenge method may be requested, got: ${intents.join(', ')}`,
      { intents },
    );
  }
}

/**
 * Wildcard domains were requested without DNS validation
 */
export class WildcardRequiresDnsError extends LifecycleError {
  readonly code = 'WILDCARD_REQUIRES_DNS';
  readonly type = 'validation';

  static of(domains: readonly string[], requested: string): WildcardRequiresDnsError {
    return new WildcardRequiresDnsError(
      `Wildcard certificates require DNS validation (requested: ${requested})`,
      { domains: [...domains], requested },
    );
  }
}

/**
 * A wildcard entry reached an HTTP or TLS based acquisition procedure
 */
export class WildcardUnsupportedForMethodError extends LifecycleError {
  readonly code = 'WILDCARD_UNSUPPORTED_FOR_METHOD';
  readonly type = 'validation';

  static of(domain: string, method: string): WildcardUnsupportedForMethodError {
    return new WildcardUnsupportedForMethodError(
      `Wildcard domain ${domain} cannot be validated with the ${method} method`,
      { domain, method },
    );
  }
}

/**
 * Remote account registration failed (non-fatal)
 */
export class AccountRegistrationError extends LifecycleError {
  readonly code = 'ACCOUNT_REGISTRATION_FAILED';
  readonly type = 'account';

  static of(email: string, cause: unknown): AccountRegistrationError {
    return new AccountRegistrationError(
      `ACME account registration for ${email} failed: ${describeCause(cause)}`,
      { email },
      { cause },
    );
  }
}

/**
 * A remote acquisition step failed; triggers the self-signed fallback
 */
export class AcquisitionError extends LifecycleError {
  readonly code = 'ACQUISITION_FAILED';
  readonly type = 'acquisition';

  constructor(
    message: string,
    public readonly step: LifecycleStep,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, { step, ...context }, options);
  }

  static wrap(step: LifecycleStep, cause: unknown): AcquisitionError {
    if (cause instanceof AcquisitionError) return cause;
    return new AcquisitionError(`${step} failed: ${describeCause(cause)}`, step, {}, { cause });
  }

  static dnsProviderMissing(recordNames: string[]): AcquisitionError {
    return new AcquisitionError('No DNS provider is configured for DNS-01 validation', 'obtain', {
      recordNames,
    });
  }

  static noAccount(): AcquisitionError {
    return new AcquisitionError('No ACME account is available (missing contact email)', 'obtain');
  }

  static noResponder(method: string): AcquisitionError {
    return new AcquisitionError(`No challenge responder is bound for ${method}`, 'obtain', {
      method,
    });
  }

  static challengeNotOffered(challengeType: string, domain: string): AcquisitionError {
    return new AcquisitionError(
      `The authority did not offer a ${challengeType} challenge for ${domain}`,
      'obtain',
      { challengeType, domain },
    );
  }

  static timeout(timeoutMs: number): AcquisitionError {
    return new AcquisitionError(`Certificate authority did not answer within ${timeoutMs}ms`, 'obtain', {
      timeoutMs,
    });
  }
}

/**
 * Fatal filesystem failure (directory creation, key write, lock)
 */
export class StorageError extends LifecycleError {
  readonly code = 'STORAGE_FAILED';
  readonly type = 'storage';

  constructor(
    message: string,
    public readonly step: LifecycleStep,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, { step, ...context }, options);
  }

  static wrap(step: LifecycleStep, path: string, cause: unknown): StorageError {
    if (cause instanceof StorageError) return cause;
    return new StorageError(`${step} failed for ${path}: ${describeCause(cause)}`, step, { path }, { cause });
  }

  static lockTimeout(path: string, timeoutMs: number): StorageError {
    return new StorageError(`Timed out after ${timeoutMs}ms waiting for lock ${path}`, 'lock', {
      path,
      timeoutMs,
    });
  }
}

/**
 * No certificate exists for the requested domain set
 */
export class CertificateNotFoundError extends LifecycleError {
  readonly code = 'CERTIFICATE_NOT_FOUND';
  readonly type = 'storage';

  static at(domain: string, path: string): CertificateNotFoundError {
    return new CertificateNotFoundError(`No certificate found for ${domain} (${path})`, {
      domain,
      path,
    });
  }
}

/**
 * Base class for web server failures raised after a certificate was issued
 *
 * The issued certificate is attached so that the "issued but not live" state
 * stays visible to the caller.
 */
export abstract class WebServerApplyError extends LifecycleError {
  certificate?: CertificateRecord;

  attachCertificate(record: CertificateRecord): this {
    this.certificate = record;
    return this;
  }
}

/**
 * Writing the server configuration failed
 */
export class WebServerError extends WebServerApplyError {
  readonly code = 'WEBSERVER_CONFIGURE_FAILED';
  readonly type = 'webserver';

  static configure(server: string, cause: unknown): WebServerError {
    return new WebServerError(
      `Configuring ${server} failed: ${describeCause(cause)}`,
      { server, step: 'configure' },
      { cause },
    );
  }
}

/**
 * The server's syntax checker rejected the configuration
 */
export class ConfigurationInvalidError extends WebServerApplyError {
  readonly code = 'CONFIGURATION_INVALID';
  readonly type = 'webserver';

  static of(server: string, output: string, cause?: unknown): ConfigurationInvalidError {
    return new ConfigurationInvalidError(
      `${server} configuration test failed${output ? `: ${output}` : ''}`,
      { server, step: 'test', output },
      { cause },
    );
  }
}

/**
 * The reload signal could not be delivered
 */
export class ReloadFailedError extends WebServerApplyError {
  readonly code = 'RELOAD_FAILED';
  readonly type = 'webserver';

  static of(server: string, cause: unknown): ReloadFailedError {
    return new ReloadFailedError(
      `Reloading ${server} failed: ${describeCause(cause)}`,
      { server, step: 'reload' },
      { cause },
    );
  }
}

/**
 * Registering or removing the recurring renewal task failed
 */
export class SchedulerError extends LifecycleError {
  readonly code = 'SCHEDULER_FAILED';
  readonly type = 'scheduler';

  static wrap(action: string, taskName: string, cause: unknown): SchedulerError {
    if (cause instanceof SchedulerError) return cause;
    return new SchedulerError(
      `Could not ${action} scheduled task ${taskName}: ${describeCause(cause)}`,
      { action, taskName },
      { cause },
    );
  }

  static unsupportedSchedule(expression: string): SchedulerError {
    return new SchedulerError(`Only daily schedules ("M H * * *") are supported, got "${expression}"`, {
      expression,
    });
  }
}

/**
 * Type guards for error type checking
 */
export function isLifecycleError(error: unknown): error is LifecycleError {
  return error instanceof LifecycleError;
}

export function isValidationError(error: unknown): error is LifecycleError {
  return error instanceof LifecycleError && error.type === 'validation';
}

export function isWebServerApplyError(error: unknown): error is WebServerApplyError {
  return error instanceof WebServerApplyError;
}

export function isCertificateNotFound(error: unknown): error is CertificateNotFoundError {
  return error instanceof CertificateNotFoundError;
}
