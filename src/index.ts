/**
 * certsmith - certificate lifecycle manager
 *
 * Library entry point. The CLI in ./cli.ts is a thin adapter over these
 * exports.
 */

// Lifecycle
export {
  LifecycleManager,
  LIFECYCLE_STATE,
  type LifecycleState,
  type LifecycleTransition,
  type LifecycleResult,
  type LifecycleManagerOptions,
  type InstallOptions,
  type RenewOptions,
} from './lib/lifecycle/lifecycle-manager.js';

// Configuration
export { loadConfig, defaultHome, type LifecycleConfig, type Environment } from './lib/config/config.js';
export * from './lib/constants/defaults.js';

// Domain sets and challenge selection
export * from './lib/domain/domain-set.js';
export * from './lib/challenges/strategy.js';

// Identity and storage
export { AccountStore, sanitizeEmail, type Account, type AccountRegistrar } from './lib/accounts/account-store.js';
export { CertificateStore, needsRenewal, parseMetadata, type CertificateStoreOptions } from './lib/storage/certificate-store.js';
export { withDirectoryLock, KeyedMutex, type DirectoryLockOptions } from './lib/storage/directory-lock.js';
export type * from './lib/storage/types.js';

// Acquisition
export {
  AcquisitionPipeline,
  dnsRecordNames,
  type AcquisitionRequest,
  type AcquisitionResult,
  type AcquisitionHooks,
  type PipelineStep,
  type PipelineConfig,
} from './lib/pipeline/acquisition-pipeline.js';
export type * from './lib/acme/capability.js';
export {
  AcmeClientCapability,
  type AcmeEngine,
  type AcmeEngineFactory,
  type AcmeClientCapabilityOptions,
} from './lib/acme/acme-client-capability.js';
export { directories, resolveDirectoryUrl, type AcmeDirectoryEntry, type AcmeAuthority } from './lib/acme/directories.js';
export * from './lib/acme/responders/index.js';

// Crypto
export * from './lib/crypto/algorithms.js';
export { generateKeyPair, exportPrivateKeyPem, accountKeyThumbprint } from './lib/crypto/keys.js';
export { createCertificateRequest, type CreateCsrResult } from './lib/crypto/csr.js';
export {
  createSelfSignedCertificate,
  parseCertificate,
  splitPemBundle,
  daysUntil,
  type ParsedCertificate,
} from './lib/crypto/certificate.js';

// Web servers and scheduling
export * from './lib/webserver/index.js';
export * from './lib/scheduler/index.js';
export { CommandError, execRunner, type CommandRunner, type CommandResult } from './lib/utils/command-runner.js';

// Errors and logging
export * from './lib/errors/lifecycle-errors.js';
export { createLogger, setLogSink, type Logger, type LogLevel, type LogSink } from './lib/logger.js';
