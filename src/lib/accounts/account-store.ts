/**
 * Account Store
 *
 * One directory per contact email (sanitized) under the account root:
 *
 *   account.json   { email, registrationRef }
 *   account.key    PKCS#8 EC P-256 private key (0600), never rewritten
 *
 * First registration for an email is serialized both within the process
 * (promise coalescing) and across processes (directory lock).
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import { coalesceAsync } from 'promise-coalesce';
import {
  ACCOUNT_DIR_MODE,
  ACCOUNT_FILE,
  ACCOUNT_KEY_FILE,
  PRIVATE_FILE_MODE,
} from '../constants/defaults.js';
import { parseAlgorithm } from '../crypto/algorithms.js';
import { exportPrivateKeyPem, generateKeyPair } from '../crypto/keys.js';
import { AccountRegistrationError, StorageError } from '../errors/lifecycle-errors.js';
import { createLogger } from '../logger.js';
import { withDirectoryLock, type DirectoryLockOptions } from '../storage/directory-lock.js';
import { readOptionalFile, writeFileAtomic } from '../storage/fs-utils.js';

const log = createLogger('account');

export interface Account {
  email: string;
  /** Account URL issued by the authority; absent until registered */
  registrationRef?: string;
  privateKeyPem: string;
}

/** Performs the remote registration; satisfied by AcmeCapability. */
export interface AccountRegistrar {
  register(account: Account): Promise<string>;
}

interface AccountRecord {
  email: string;
  registrationRef?: string;
}

/** Filesystem-safe directory name for an email address. */
export function sanitizeEmail(email: string): string {
  return email
    .trim()
    .toLowerCase()
    .replace(/@/g, '_at_')
    .replace(/[^a-z0-9._-]/g, '_');
}

function parseAccountRecord(raw: string): AccountRecord | undefined {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof value !== 'object' || value === null) return undefined;
  const candidate: Partial<Record<keyof AccountRecord, unknown>> = value;
  if (typeof candidate.email !== 'string') return undefined;
  return {
    email: candidate.email,
    ...(typeof candidate.registrationRef === 'string' && { registrationRef: candidate.registrationRef }),
  };
}

export class AccountStore {
  constructor(
    readonly root: string,
    private readonly lockOptions?: DirectoryLockOptions,
  ) {}

  directory(email: string): string {
    return join(this.root, sanitizeEmail(email));
  }

  /**
   * Load the identity for `email`, creating and persisting a fresh key on
   * first use. The returned account has no registration reference until
   * `ensureRegistered` succeeds.
   */
  async loadOrCreate(email: string): Promise<Account> {
    const dir = this.directory(email);
    try {
      await mkdir(dir, { recursive: true, mode: ACCOUNT_DIR_MODE });
    } catch (e) {
      throw StorageError.wrap('identity', dir, e);
    }

    return withDirectoryLock(
      dir,
      async () => {
        const keyPath = join(dir, ACCOUNT_KEY_FILE);
        let privateKeyPem = await readOptionalFile(keyPath);
        if (privateKeyPem === undefined) {
          const keys = await generateKeyPair(parseAlgorithm('ec-p256'));
          privateKeyPem = await exportPrivateKeyPem(keys.privateKey);
          try {
            await writeFileAtomic(keyPath, privateKeyPem, PRIVATE_FILE_MODE);
          } catch (e) {
            throw StorageError.wrap('identity', keyPath, e);
          }
          await this.persist({ email, privateKeyPem });
          log.info('Created account key for %s', email);
        }

        const record = await this.readRecord(email);
        return {
          email,
          ...(record?.registrationRef && { registrationRef: record.registrationRef }),
          privateKeyPem,
        };
      },
      this.lockOptions,
    );
  }

  /** Write email and registration reference. The key is never rewritten. */
  async persist(account: Account): Promise<void> {
    const path = join(this.directory(account.email), ACCOUNT_FILE);
    const record: AccountRecord = {
      email: account.email,
      ...(account.registrationRef && { registrationRef: account.registrationRef }),
    };
    try {
      await writeFileAtomic(path, JSON.stringify(record, null, 2) + '\n', PRIVATE_FILE_MODE);
    } catch (e) {
      throw StorageError.wrap('identity', path, e);
    }
  }

  /**
   * Register `account` once. Concurrent callers for the same email share a
   * single remote registration. A failed registration is logged and the
   * account is returned unregistered; it is retried on the next run.
   */
  async ensureRegistered(account: Account, registrar: AccountRegistrar): Promise<Account> {
    if (account.registrationRef) return account;
    const dir = this.directory(account.email);

    return coalesceAsync(`register:${dir}`, () =>
      withDirectoryLock(
        dir,
        async () => {
          const current = await this.readRecord(account.email);
          if (current?.registrationRef) {
            return { ...account, registrationRef: current.registrationRef };
          }

          let registrationRef: string;
          try {
            registrationRef = await registrar.register(account);
          } catch (e) {
            log.warn('%s', AccountRegistrationError.of(account.email, e).message);
            return account;
          }

          const registered: Account = { ...account, registrationRef };
          try {
            await this.persist(registered);
          } catch (e) {
            // the remote side already holds the account
            log.warn(
              'Registered %s but could not persist the reference: %s',
              account.email,
              e instanceof Error ? e.message : e,
            );
          }
          return registered;
        },
        this.lockOptions,
      ),
    );
  }

  private async readRecord(email: string): Promise<AccountRecord | undefined> {
    const raw = await readOptionalFile(join(this.directory(email), ACCOUNT_FILE));
    if (raw === undefined) return undefined;
    const record = parseAccountRecord(raw);
    if (!record) log.warn('Ignoring unreadable %s for %s', ACCOUNT_FILE, email);
    return record;
  }
}
