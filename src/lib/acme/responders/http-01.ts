/**
 * HTTP-01 responders
 *
 * Both serve the key authorization at
 * `/.well-known/acme-challenge/<token>`: either as a file below an existing
 * document root, or from a built-in HTTP server.
 */

import { createServer, type Server } from 'node:http';
import { mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { HTTP01_PATH_PREFIX, PUBLIC_FILE_MODE } from '../../constants/defaults.js';
import { createLogger } from '../../logger.js';
import { writeFileAtomic } from '../../storage/fs-utils.js';
import type { ChallengePreparation, ChallengeResponder } from '../capability.js';

const log = createLogger('acme');

export class WebrootResponder implements ChallengeResponder {
  readonly challengeType = 'http-01' as const;

  constructor(readonly webroot: string) {}

  challengePath(token: string): string {
    return join(this.webroot, HTTP01_PATH_PREFIX, token);
  }

  async present({ identifier, token, value }: ChallengePreparation): Promise<void> {
    const path = this.challengePath(token);
    await mkdir(join(this.webroot, HTTP01_PATH_PREFIX), { recursive: true });
    await writeFileAtomic(path, value, PUBLIC_FILE_MODE);
    log.debug('http-01 token for %s written to %s', identifier, path);
  }

  async cleanup({ token }: ChallengePreparation): Promise<void> {
    await rm(this.challengePath(token), { force: true });
  }

  async close(): Promise<void> {
    // nothing to stop
  }
}

export class StandaloneHttpResponder implements ChallengeResponder {
  readonly challengeType = 'http-01' as const;
  private readonly tokens = new Map<string, string>();
  private server?: Server;

  constructor(readonly port: number) {}

  async present({ identifier, token, value }: ChallengePreparation): Promise<void> {
    this.tokens.set(token, value);
    await this.listen();
    log.debug('http-01 token for %s served on port %d', identifier, this.port);
  }

  async cleanup({ token }: ChallengePreparation): Promise<void> {
    this.tokens.delete(token);
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }

  /** Body served for a request path, if it names a known token. */
  respond(url: string | undefined): string | undefined {
    if (!url?.startsWith(HTTP01_PATH_PREFIX)) return undefined;
    return this.tokens.get(url.slice(HTTP01_PATH_PREFIX.length));
  }

  private listen(): Promise<void> {
    if (this.server) return Promise.resolve();
    const server = createServer((req, res) => {
      const body = this.respond(req.url);
      if (body === undefined) {
        res.writeHead(404).end();
        return;
      }
      res.writeHead(200, { 'Content-Type': 'application/octet-stream' }).end(body);
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
