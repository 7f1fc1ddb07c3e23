import { webcrypto } from 'node:crypto';

// Native WebCrypto must be in place before any module captures a provider
if (!globalThis.crypto) {
  Object.defineProperty(globalThis, 'crypto', {
    value: webcrypto,
    writable: false,
    configurable: true,
  });
}

process.env.NODE_ENV = 'test';
