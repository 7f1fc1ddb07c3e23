import { Crypto } from '@peculiar/webcrypto';
import { cryptoProvider } from '@peculiar/x509';

/** WebCrypto used for keys, CSRs and certificates: Node's global one, else @peculiar/webcrypto. */
export const provider: Crypto =
  globalThis.crypto && 'subtle' in globalThis.crypto ? (globalThis.crypto as Crypto) : new Crypto();

cryptoProvider.set(provider);
