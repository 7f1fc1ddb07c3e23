/**
 * Lifecycle configuration
 *
 * One explicit structure handed to the Lifecycle Manager at construction.
 * `loadConfig` derives it from the environment; CLI flags override fields
 * afterwards.
 */

import { homedir } from 'os';
import { join } from 'path';
import type { DnsProvider } from '../acme/capability.js';
import { resolveDirectoryUrl } from '../acme/directories.js';
import {
  DEFAULT_HTTP_PORT,
  DEFAULT_KEY_ALGORITHM,
  DEFAULT_TLS_PORT,
} from '../constants/defaults.js';
import { parseAlgorithm, type KeyAlgorithm } from '../crypto/algorithms.js';

export interface LifecycleConfig {
  /** Root of the per-domain-set certificate directories */
  certDir: string;
  /** Root of the per-email account directories */
  accountDir: string;
  keyAlgorithm: KeyAlgorithm;
  directoryUrl: string;
  httpPort: number;
  tlsPort: number;
  /** Bounded wait around the Obtain step only; unset means no deadline */
  obtainTimeoutMs?: number;
  /** Default contact email */
  email?: string;
  dnsProvider?: DnsProvider;
}

export type Environment = Record<string, string | undefined>;

function integer(env: Environment, name: string, fallback: number): number;
function integer(env: Environment, name: string, fallback?: number): number | undefined;
function integer(env: Environment, name: string, fallback?: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function flag(env: Environment, name: string): boolean {
  const raw = env[name]?.toLowerCase();
  return raw === '1' || raw === 'true' || raw === 'yes';
}

/** Default state root: ~/.certsmith */
export function defaultHome(env: Environment = process.env): string {
  return env.CERTSMITH_HOME || join(homedir(), '.certsmith');
}

export function loadConfig(env: Environment = process.env): LifecycleConfig {
  const home = defaultHome(env);
  const staging = flag(env, 'CERTSMITH_STAGING');

  return {
    certDir: env.CERTSMITH_CERT_DIR || join(home, 'certs'),
    accountDir: env.CERTSMITH_ACCOUNT_DIR || join(home, 'accounts'),
    keyAlgorithm: parseAlgorithm(env.CERTSMITH_KEY_ALGO || DEFAULT_KEY_ALGORITHM),
    directoryUrl: resolveDirectoryUrl(env.CERTSMITH_DIRECTORY_URL || 'letsencrypt', staging),
    httpPort: integer(env, 'CERTSMITH_HTTP_PORT', DEFAULT_HTTP_PORT),
    tlsPort: integer(env, 'CERTSMITH_TLS_PORT', DEFAULT_TLS_PORT),
    obtainTimeoutMs: integer(env, 'CERTSMITH_OBTAIN_TIMEOUT_MS'),
    email: env.CERTSMITH_EMAIL || undefined,
  };
}
