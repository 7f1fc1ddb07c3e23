// ACME directory endpoints of the supported certificate authorities

/**
 * ACME directory entry for a specific environment
 */
export interface AcmeDirectoryEntry {
  directoryUrl: string;
  /** Human-readable name for this directory */
  name: string;
  environment: 'staging' | 'production';
}

export type AcmeAuthority = 'letsencrypt' | 'buypass' | 'google' | 'zerossl';

type AuthorityDirectories = Partial<Record<AcmeDirectoryEntry['environment'], AcmeDirectoryEntry>>;

/**
 * Known authorities, keyed by name then environment. ZeroSSL has no
 * staging endpoint.
 */
export const directories: Record<AcmeAuthority, AuthorityDirectories> = {
  letsencrypt: {
    staging: {
      directoryUrl: 'https://acme-staging-v02.api.letsencrypt.org/directory',
      name: "Let's Encrypt Staging",
      environment: 'staging',
    },
    production: {
      directoryUrl: 'https://acme-v02.api.letsencrypt.org/directory',
      name: "Let's Encrypt Production",
      environment: 'production',
    },
  },
  buypass: {
    staging: {
      directoryUrl: 'https://api.test4.buypass.no/acme/directory',
      name: 'Buypass Staging',
      environment: 'staging',
    },
    production: {
      directoryUrl: 'https://api.buypass.com/acme/directory',
      name: 'Buypass Production',
      environment: 'production',
    },
  },
  google: {
    staging: {
      directoryUrl: 'https://dv.acme-v02.test-api.pki.goog/directory',
      name: 'Google Trust Services Staging',
      environment: 'staging',
    },
    production: {
      directoryUrl: 'https://dv.acme-v02.api.pki.goog/directory',
      name: 'Google Trust Services Production',
      environment: 'production',
    },
  },
  zerossl: {
    production: {
      directoryUrl: 'https://acme.zerossl.com/v2/DV90',
      name: 'ZeroSSL Production',
      environment: 'production',
    },
  },
};

function isAuthority(value: string): value is AcmeAuthority {
  return Object.prototype.hasOwnProperty.call(directories, value);
}

/**
 * Resolve a directory reference: an absolute URL is returned as is, a name
 * such as `letsencrypt` or `google-staging` is looked up.
 */
export function resolveDirectoryUrl(reference: string, staging = false): string {
  if (/^https?:\/\//.test(reference)) return reference;

  const [name, env] = reference.split('-');
  const environment = env === 'staging' || (env === undefined && staging) ? 'staging' : 'production';
  if (!isAuthority(name)) {
    throw new Error(`Unknown ACME directory: ${reference}`);
  }
  const entry = directories[name][environment];
  if (!entry) {
    throw new Error(`${name} has no ${environment} directory`);
  }
  return entry.directoryUrl;
}
