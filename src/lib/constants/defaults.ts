/**
 * Default configuration constants for certsmith
 *
 * Policy values (renewal threshold, fallback validity) are fixed here and are
 * not user-configurable; the remaining values are fallbacks for LifecycleConfig.
 */

// Renewal policy
export const RENEWAL_THRESHOLD_DAYS = 30;
export const FALLBACK_VALIDITY_DAYS = 90;

// Challenge responders
export const DEFAULT_HTTP_PORT = 80;
export const DEFAULT_TLS_PORT = 443;
export const HTTP01_PATH_PREFIX = '/.well-known/acme-challenge/';
export const DNS01_RECORD_PREFIX = '_acme-challenge.';

// Key material
export const DEFAULT_KEY_ALGORITHM = 'rsa-2048';
export const PRIVATE_FILE_MODE = 0o600;
export const PUBLIC_FILE_MODE = 0o644;
export const ACCOUNT_DIR_MODE = 0o700;
export const CERT_DIR_MODE = 0o755;

// Directory locks
export const LOCK_FILE_NAME = '.certsmith.lock';
export const LOCK_STALE_MS = 10 * 60 * 1_000; // 10 minutes
export const LOCK_RETRY_INTERVAL_MS = 100;
export const LOCK_TIMEOUT_MS = 60_000;

// Scheduler
export const DEFAULT_TASK_NAME = 'certsmith-renew';
export const DEFAULT_SCHEDULE = '0 2 * * *'; // daily at 02:00

// On-disk layout
export const CERT_FILE = 'cert.pem';
export const KEY_FILE = 'key.pem';
export const CHAIN_FILE = 'chain.pem';
export const FULLCHAIN_FILE = 'fullchain.pem';
export const METADATA_FILE = 'cert.json';
export const DOMAINS_FILE = 'domains.txt';
export const ACCOUNT_FILE = 'account.json';
export const ACCOUNT_KEY_FILE = 'account.key';
export const SAN_DIR_SUFFIX = '_san';
