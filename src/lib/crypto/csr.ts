/**
 * Certificate Signing Request generation
 *
 * Every domain set entry becomes a subjectAltName; the common name defaults
 * to the first entry.
 */

import {
  Pkcs10CertificateRequestGenerator,
  SubjectAlternativeNameExtension,
  type Pkcs10CertificateRequestCreateParamsName,
} from '@peculiar/x509';
import { signingAlgorithm, type KeyAlgorithm } from './algorithms.js';
import { generateKeyPair } from './keys.js';
import './provider.js';

export interface CreateCsrResult {
  /** Raw DER bytes of the CSR */
  der: Buffer;
  /** PEM-encoded CSR, as handed to the authority */
  pem: string;
  /** The key pair used (the private key matches the issued certificate) */
  keys: CryptoKeyPair;
}

export async function createCertificateRequest(
  dnsNames: readonly string[],
  algo: KeyAlgorithm,
  commonName: string = dnsNames[0],
  keys?: CryptoKeyPair,
): Promise<CreateCsrResult> {
  if (!dnsNames?.length) {
    throw new Error('dnsNames must contain at least one DNS name');
  }

  const keyPair = keys ?? (await generateKeyPair(algo));
  const name: Pkcs10CertificateRequestCreateParamsName = `CN=${commonName}`;
  const san = new SubjectAlternativeNameExtension(dnsNames.map((n) => ({ type: 'dns' as const, value: n })));

  const csr = await Pkcs10CertificateRequestGenerator.create({
    name,
    keys: keyPair,
    signingAlgorithm: signingAlgorithm(algo),
    extensions: [san],
  });

  return { der: Buffer.from(csr.rawData), pem: csr.toString('pem'), keys: keyPair };
}
