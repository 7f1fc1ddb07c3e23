import * as jose from 'jose';
import type { KeyAlgorithm } from './algorithms.js';
import { provider } from './provider.js';

export async function generateKeyPair(algo: KeyAlgorithm): Promise<CryptoKeyPair> {
  if (algo.kind === 'ec') {
    return provider.subtle.generateKey(
      {
        name: 'ECDSA',
        namedCurve: algo.namedCurve,
      },
      true,
      ['sign', 'verify'],
    );
  }

  // RSA
  return provider.subtle.generateKey(
    {
      name: 'RSASSA-PKCS1-v1_5',
      modulusLength: algo.modulusLength,
      publicExponent: new Uint8Array([0x01, 0x00, 0x01]),
      hash: algo.hash,
    },
    true,
    ['sign', 'verify'],
  );
}

/** PKCS#8 PEM export of an extractable private key. */
export async function exportPrivateKeyPem(key: CryptoKey): Promise<string> {
  const pem = await jose.exportPKCS8(key);
  return pem.endsWith('\n') ? pem : `${pem}\n`;
}

/**
 * RFC 7638 thumbprint of the public half of a PKCS#8 EC account key.
 * Displayed as the account fingerprint.
 */
export async function accountKeyThumbprint(privateKeyPem: string): Promise<string> {
  const key = await jose.importPKCS8(privateKeyPem, 'ES256', { extractable: true });
  const jwk = await jose.exportJWK(key);
  return jose.calculateJwkThumbprint(jwk, 'sha256');
}
