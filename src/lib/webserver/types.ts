/**
 * Web server configurator capability
 *
 * Each variant applies a certificate to a running server in three steps that
 * always run in order: configure -> test -> reload. A failed test stops the
 * sequence so a broken configuration never reaches the live server.
 */

export const WEB_SERVER = {
  NGINX: 'nginx' as const,
  APACHE: 'apache' as const,
  IIS: 'iis' as const,
} as const;

export type WebServerKind = (typeof WEB_SERVER)[keyof typeof WEB_SERVER];

export function isWebServerKind(value: unknown): value is WebServerKind {
  return value === 'nginx' || value === 'apache' || value === 'iis';
}

/** What a configurator needs to know about the certificate to deploy. */
export interface WebServerTarget {
  kind: WebServerKind;
  /** Primary domain, used to name managed files and blocks */
  primary: string;
  /** Space separated domain list */
  domains: string;
  certPath: string;
  keyPath: string;
  fullchainPath: string;
  chainPath?: string;
  webroot?: string;
}

/**
 * Where a configurator deploys to. Stored with the certificate so a renewal
 * updates the same files, site and pool as the install did.
 */
export interface WebServerSettings {
  /** nginx / apache: directory holding the managed file */
  confDir?: string;
  /** iis */
  site?: string;
  /** iis */
  appPool?: string;
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

export function isWebServerSettings(value: unknown): value is WebServerSettings {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Partial<Record<keyof WebServerSettings, unknown>> = value;
  return isOptionalString(candidate.confDir) && isOptionalString(candidate.site) && isOptionalString(candidate.appPool);
}

export interface WebServerConfigurator {
  readonly kind: WebServerKind;
  readonly settings: WebServerSettings;
  /** Write or patch TLS configuration without touching unrelated config. */
  configure(target: WebServerTarget): Promise<void>;
  /** Run the server's syntax checker. @throws ConfigurationInvalidError */
  test(): Promise<void>;
  /** Apply configuration without dropping connections. @throws ReloadFailedError */
  reload(): Promise<void>;
}
