/**
 * Key algorithm descriptors and their short codes (e.g. `rsa-2048`).
 */

export type KeyAlgorithmCode = 'ec-p256' | 'ec-p384' | 'ec-p521' | 'rsa-2048' | 'rsa-3072' | 'rsa-4096';

export type EcAlgorithm = {
  kind: 'ec';
  namedCurve: 'P-256' | 'P-384' | 'P-521';
  hash: 'SHA-256' | 'SHA-384' | 'SHA-512';
};

export type RsaAlgorithm = {
  kind: 'rsa';
  /** RSA key length - 2048 minimum */
  modulusLength: 2048 | 3072 | 4096;
  /** Hash algorithm for RSASSA-PKCS1-v1_5 */
  hash: 'SHA-256' | 'SHA-384' | 'SHA-512';
};

export type KeyAlgorithm = EcAlgorithm | RsaAlgorithm;

export const KEY_ALGORITHM_CODES: readonly KeyAlgorithmCode[] = [
  'ec-p256',
  'ec-p384',
  'ec-p521',
  'rsa-2048',
  'rsa-3072',
  'rsa-4096',
];

/** Parse a short algorithm code into an algorithm descriptor. */
export function parseAlgorithm(algoStr: string): KeyAlgorithm {
  switch (algoStr) {
    case 'ec-p256':
      return { kind: 'ec', namedCurve: 'P-256', hash: 'SHA-256' };
    case 'ec-p384':
      return { kind: 'ec', namedCurve: 'P-384', hash: 'SHA-384' };
    case 'ec-p521':
      return { kind: 'ec', namedCurve: 'P-521', hash: 'SHA-512' };
    case 'rsa-2048':
      return { kind: 'rsa', modulusLength: 2048, hash: 'SHA-256' };
    case 'rsa-3072':
      return { kind: 'rsa', modulusLength: 3072, hash: 'SHA-256' };
    case 'rsa-4096':
      return { kind: 'rsa', modulusLength: 4096, hash: 'SHA-384' };
    default:
      throw new Error(`Unknown algorithm: ${algoStr}`);
  }
}

/** Short code of an algorithm descriptor; inverse of parseAlgorithm. */
export function algorithmCode(algo: KeyAlgorithm): KeyAlgorithmCode {
  const code = KEY_ALGORITHM_CODES.find((c) => describeAlgorithm(parseAlgorithm(c)) === describeAlgorithm(algo));
  if (!code) throw new Error(`No short code for ${describeAlgorithm(algo)}`);
  return code;
}

export function describeAlgorithm(algo: KeyAlgorithm): string {
  return algo.kind === 'ec' ? `ECDSA ${algo.namedCurve}` : `RSA ${algo.modulusLength}`;
}

/** WebCrypto signing parameters for CSRs and certificates. */
export function signingAlgorithm(algo: KeyAlgorithm) {
  return algo.kind === 'ec'
    ? ({ name: 'ECDSA', hash: algo.hash } as const)
    : ({ name: 'RSASSA-PKCS1-v1_5', hash: algo.hash } as const);
}
