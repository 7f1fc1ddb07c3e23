/**
 * X.509 certificate synthesis and introspection
 *
 * - self-signed certificates for the fallback path
 * - TLS-ALPN-01 validation certificates (RFC 8737)
 * - parsing of PEM certificates and bundles
 */

import {
  BasicConstraintsExtension,
  ExtendedKeyUsage,
  ExtendedKeyUsageExtension,
  Extension,
  KeyUsageFlags,
  KeyUsagesExtension,
  SubjectAlternativeNameExtension,
  X509Certificate,
  X509CertificateGenerator,
} from '@peculiar/x509';
import { signingAlgorithm, type KeyAlgorithm } from './algorithms.js';
import { provider } from './provider.js';

const DAY_MS = 24 * 60 * 60 * 1_000;

/** id-pe-acmeIdentifier */
const ACME_IDENTIFIER_OID = '1.3.6.1.5.5.7.1.31';

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

export interface SelfSignedOptions {
  dnsNames: readonly string[];
  keys: CryptoKeyPair;
  algorithm: KeyAlgorithm;
  validityDays: number;
  commonName?: string;
  now?: Date;
}

/** Fields read back from an issued or synthesized certificate. */
export interface ParsedCertificate {
  subject: string;
  issuer: string;
  serialNumber: string;
  notBefore: Date;
  notAfter: Date;
  dnsNames: string[];
  selfSigned: boolean;
}

function randomSerialNumber(): string {
  const bytes = provider.getRandomValues(new Uint8Array(16));
  bytes[0] = (bytes[0] & 0x7f) | 0x01; // positive, no leading zero
  return Buffer.from(bytes).toString('hex');
}

/**
 * Self-signed server certificate with the given SANs, valid from `now`
 * for `validityDays`.
 */
export async function createSelfSignedCertificate(options: SelfSignedOptions): Promise<string> {
  const { dnsNames, keys, algorithm, validityDays } = options;
  const now = options.now ?? new Date();
  const commonName = options.commonName ?? dnsNames[0];

  const cert = await X509CertificateGenerator.createSelfSigned({
    serialNumber: randomSerialNumber(),
    name: `CN=${commonName}`,
    notBefore: now,
    notAfter: new Date(now.getTime() + validityDays * DAY_MS),
    keys,
    signingAlgorithm: signingAlgorithm(algorithm),
    extensions: [
      new BasicConstraintsExtension(false, undefined, true),
      new KeyUsagesExtension(KeyUsageFlags.digitalSignature | KeyUsageFlags.keyEncipherment, true),
      new ExtendedKeyUsageExtension([ExtendedKeyUsage.serverAuth]),
      new SubjectAlternativeNameExtension(dnsNames.map((n) => ({ type: 'dns' as const, value: n }))),
    ],
  });

  return `${cert.toString('pem')}\n`;
}

/**
 * Validation certificate for a TLS-ALPN-01 challenge: SAN = the identifier,
 * critical acmeIdentifier extension = SHA-256 of the key authorization.
 */
export async function createAlpnChallengeCertificate(
  identifier: string,
  keyAuthorization: string,
  keys: CryptoKeyPair,
  algorithm: KeyAlgorithm,
): Promise<string> {
  const digest = new Uint8Array(
    await provider.subtle.digest('SHA-256', new TextEncoder().encode(keyAuthorization)),
  );
  // DER OCTET STRING wrapping the 32 byte digest
  const value = new Uint8Array([0x04, digest.length, ...digest]);
  const now = new Date();

  const cert = await X509CertificateGenerator.createSelfSigned({
    serialNumber: randomSerialNumber(),
    name: `CN=${identifier}`,
    notBefore: new Date(now.getTime() - DAY_MS),
    notAfter: new Date(now.getTime() + 7 * DAY_MS),
    keys,
    signingAlgorithm: signingAlgorithm(algorithm),
    extensions: [
      new SubjectAlternativeNameExtension([{ type: 'dns' as const, value: identifier }]),
      new Extension(ACME_IDENTIFIER_OID, true, value),
    ],
  });
  return cert.toString('pem');
}

/** Split a PEM bundle into its certificate blocks, leaf first. */
export function splitPemBundle(bundle: string): string[] {
  return (bundle.match(PEM_CERTIFICATE) ?? []).map((block) => `${block}\n`);
}

/** Parse the first certificate of a PEM document. */
export function parseCertificate(pem: string): ParsedCertificate {
  const [leaf] = splitPemBundle(pem);
  if (!leaf) {
    throw new Error('No PEM certificate block found');
  }
  const cert = new X509Certificate(leaf);
  const san = cert.getExtension(SubjectAlternativeNameExtension);
  const dnsNames = san
    ? san.names
        .toJSON()
        .filter((name) => name.type === 'dns')
        .map((name) => name.value)
    : [];

  return {
    subject: cert.subject,
    issuer: cert.issuer,
    serialNumber: cert.serialNumber,
    notBefore: cert.notBefore,
    notAfter: cert.notAfter,
    dnsNames,
    selfSigned: cert.subject === cert.issuer,
  };
}

/** Whole days until `notAfter`, rounded down. Negative once expired. */
export function daysUntil(notAfter: Date, now: Date = new Date()): number {
  return Math.floor((notAfter.getTime() - now.getTime()) / DAY_MS);
}
