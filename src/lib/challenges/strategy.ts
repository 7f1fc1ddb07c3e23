/**
 * Challenge strategy selection
 *
 * Maps the caller's intent and the domain set to exactly one validation
 * method. Runs before any filesystem or network mutation so that invalid
 * requests fail with no partial effects.
 */

import type { DomainSet } from '../domain/domain-set.js';
import {
  ConflictingChallengeIntentError,
  WildcardRequiresDnsError,
} from '../errors/lifecycle-errors.js';

export const CHALLENGE_METHOD = {
  /** HTTP-01 through a webroot directory (or a built-in HTTP server) */
  WEBROOT: 'webroot' as const,
  /** TLS-ALPN-01 through a built-in TLS server */
  STANDALONE: 'standalone' as const,
  /** DNS-01 through a TXT record */
  DNS: 'dns' as const,
} as const;

export type ChallengeMethod = (typeof CHALLENGE_METHOD)[keyof typeof CHALLENGE_METHOD];

/** ACME challenge type bound to each validation method. */
export const ACME_CHALLENGE_FOR_METHOD: Record<ChallengeMethod, AcmeChallengeType> = {
  webroot: 'http-01',
  standalone: 'tls-alpn-01',
  dns: 'dns-01',
};

export type AcmeChallengeType = 'http-01' | 'tls-alpn-01' | 'dns-01';

/** Explicit intent flags; none set means the webroot default. */
export interface ChallengeIntent {
  standalone?: boolean;
  webroot?: string;
  dns?: boolean;
}

export function isChallengeMethod(value: unknown): value is ChallengeMethod {
  return value === 'webroot' || value === 'standalone' || value === 'dns';
}

function explicitIntents(intent: ChallengeIntent): ChallengeMethod[] {
  const intents: ChallengeMethod[] = [];
  if (intent.standalone) intents.push(CHALLENGE_METHOD.STANDALONE);
  if (intent.webroot) intents.push(CHALLENGE_METHOD.WEBROOT);
  if (intent.dns) intents.push(CHALLENGE_METHOD.DNS);
  return intents;
}

/**
 * Select the validation method for a domain set.
 *
 * @throws ConflictingChallengeIntentError when more than one intent is given
 * @throws WildcardRequiresDnsError when a wildcard set is not validated by DNS
 */
export function selectChallengeMethod(domains: DomainSet, intent: ChallengeIntent = {}): ChallengeMethod {
  const intents = explicitIntents(intent);
  if (intents.length > 1) {
    throw ConflictingChallengeIntentError.of(intents);
  }

  const method = intents[0] ?? CHALLENGE_METHOD.WEBROOT;
  if (domains.hasWildcard && method !== CHALLENGE_METHOD.DNS) {
    throw WildcardRequiresDnsError.of(domains.entries, method);
  }
  return method;
}

/** Rebuild an intent from a stored method (used when renewing). */
export function intentFor(method: ChallengeMethod, webroot?: string): ChallengeIntent {
  switch (method) {
    case CHALLENGE_METHOD.STANDALONE:
      return { standalone: true };
    case CHALLENGE_METHOD.DNS:
      return { dns: true };
    case CHALLENGE_METHOD.WEBROOT:
      return webroot ? { webroot } : {};
  }
}
