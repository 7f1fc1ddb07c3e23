/**
 * TLS-ALPN-01 responder (RFC 8737)
 *
 * A TLS server negotiating `acme-tls/1` that presents, per SNI name, a
 * self-signed certificate carrying the acmeIdentifier extension.
 */

import { createSecureContext, createServer, type SecureContext, type Server } from 'node:tls';
import { parseAlgorithm } from '../../crypto/algorithms.js';
import { createAlpnChallengeCertificate } from '../../crypto/certificate.js';
import { exportPrivateKeyPem, generateKeyPair } from '../../crypto/keys.js';
import { createLogger } from '../../logger.js';
import type { ChallengePreparation, ChallengeResponder } from '../capability.js';

const log = createLogger('acme');

export const ACME_TLS_ALPN_PROTOCOL = 'acme-tls/1';

export class TlsAlpnResponder implements ChallengeResponder {
  readonly challengeType = 'tls-alpn-01' as const;
  private readonly contexts = new Map<string, SecureContext>();
  private server?: Server;

  constructor(readonly port: number) {}

  async present({ identifier, value }: ChallengePreparation): Promise<void> {
    const algorithm = parseAlgorithm('ec-p256');
    const keys = await generateKeyPair(algorithm);
    const cert = await createAlpnChallengeCertificate(identifier, value, keys, algorithm);
    const key = await exportPrivateKeyPem(keys.privateKey);
    this.contexts.set(identifier, createSecureContext({ key, cert }));
    await this.listen();
    log.debug('tls-alpn-01 certificate for %s served on port %d', identifier, this.port);
  }

  async cleanup({ identifier }: ChallengePreparation): Promise<void> {
    this.contexts.delete(identifier);
  }

  hasContext(identifier: string): boolean {
    return this.contexts.has(identifier);
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }

  private listen(): Promise<void> {
    if (this.server) return Promise.resolve();
    const server = createServer({
      ALPNProtocols: [ACME_TLS_ALPN_PROTOCOL],
      SNICallback: (servername, cb) => {
        const context = this.contexts.get(servername);
        if (context) {
          cb(null, context);
        } else {
          cb(new Error(`No validation certificate for ${servername}`));
        }
      },
    });
    this.server = server;
    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, () => {
        server.off('error', reject);
        resolve();
      });
    });
  }
}
