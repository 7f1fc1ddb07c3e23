import { DNS01_RECORD_PREFIX, SAN_DIR_SUFFIX } from '../constants/defaults.js';
import { InvalidDomainFormatError } from '../errors/lifecycle-errors.js';

const WILDCARD_PREFIX = '*.';
const MAX_DOMAIN_LENGTH = 253;
const LABEL = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?$/;

/**
 * Validated, ordered set of host patterns requested as one certificate.
 *
 * The first entry is the primary domain: it names the storage directory and
 * becomes the CSR common name.
 */
export interface DomainSet {
  readonly entries: readonly string[];
  readonly primary: string;
  readonly hasWildcard: boolean;
  readonly isMultiDomain: boolean;
}

export function isWildcard(domain: string): boolean {
  return domain.startsWith(WILDCARD_PREFIX);
}

/** Strip a leading `*.` label. */
export function baseDomain(domain: string): string {
  return isWildcard(domain) ? domain.slice(WILDCARD_PREFIX.length) : domain;
}

/**
 * Validate a single entry. Purely syntactic: no DNS lookups.
 * @throws InvalidDomainFormatError
 */
export function validateDomain(domain: string): void {
  if (domain.length === 0) {
    throw InvalidDomainFormatError.entry(domain, 'entry is empty');
  }
  if (/\s/.test(domain)) {
    throw InvalidDomainFormatError.entry(domain, 'whitespace is not allowed');
  }
  const wildcards = domain.split('*').length - 1;
  if (wildcards > 1) {
    throw InvalidDomainFormatError.entry(domain, 'only one wildcard is allowed');
  }
  if (wildcards === 1 && !isWildcard(domain)) {
    throw InvalidDomainFormatError.entry(domain, 'wildcard must be the leftmost full label (*.)');
  }
  if (domain === WILDCARD_PREFIX) {
    throw InvalidDomainFormatError.entry(domain, 'wildcard needs a base domain after *.');
  }

  // The entry names directories and config files, so nothing but DNS labels gets through.
  const host = baseDomain(domain);
  if (host.length > MAX_DOMAIN_LENGTH) {
    throw InvalidDomainFormatError.entry(domain, `longer than ${MAX_DOMAIN_LENGTH} characters`);
  }
  if (!host.split('.').every((label) => LABEL.test(label))) {
    throw InvalidDomainFormatError.entry(domain, 'labels may only contain letters, digits and inner hyphens');
  }
}

/**
 * Build a DomainSet from comma separated input or a list of entries.
 * Entries are trimmed; order is preserved.
 *
 * @example
 * parseDomainSet('example.com, www.example.com').primary // 'example.com'
 */
export function parseDomainSet(input: string | readonly string[]): DomainSet {
  const raw = typeof input === 'string' ? input.split(',') : input.flatMap((d) => d.split(','));
  const entries = raw.map((d) => d.trim());

  if (entries.length === 0 || entries.every((d) => d.length === 0)) {
    throw InvalidDomainFormatError.empty();
  }
  entries.forEach(validateDomain);

  return Object.freeze({
    entries: Object.freeze(entries),
    primary: entries[0],
    hasWildcard: entries.some(isWildcard),
    isMultiDomain: entries.length > 1,
  });
}

/** Storage directory name: the primary domain, suffixed with `_san` for multi-domain sets. */
export function directoryName(set: DomainSet): string {
  return set.isMultiDomain ? `${set.primary}${SAN_DIR_SUFFIX}` : set.primary;
}

/** TXT record name the authority queries for a DNS-01 challenge of `domain`. */
export function dnsChallengeRecordName(domain: string): string {
  return `${DNS01_RECORD_PREFIX}${baseDomain(domain)}`;
}

/** Joined form used by web server `server_name` style directives. */
export function joinDomains(set: DomainSet, separator = ' '): string {
  return set.entries.join(separator);
}
