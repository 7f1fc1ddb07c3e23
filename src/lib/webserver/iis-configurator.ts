import {
  ConfigurationInvalidError,
  ReloadFailedError,
  WebServerError,
} from '../errors/lifecycle-errors.js';
import { createLogger } from '../logger.js';
import { CommandError, execRunner, type CommandRunner } from '../utils/command-runner.js';
import type { WebServerConfigurator, WebServerSettings, WebServerTarget } from './types.js';

const log = createLogger('webserver');

export interface IisConfiguratorOptions {
  site?: string;
  appPool?: string;
  appcmd?: string;
  powershell?: string;
  runner?: CommandRunner;
}

const DEFAULT_APPCMD = 'C:\\Windows\\System32\\inetsrv\\appcmd.exe';

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * IIS has no text configuration to merge: the certificate is imported into
 * the machine store and https bindings are added (never removed) for every
 * host name of the set.
 */
export class IisConfigurator implements WebServerConfigurator {
  readonly kind = 'iis' as const;
  private readonly runner: CommandRunner;
  private readonly site: string;
  private readonly appPool: string;
  private readonly appcmd: string;
  private readonly powershell: string;

  constructor(options: IisConfiguratorOptions = {}) {
    this.runner = options.runner ?? execRunner;
    this.site = options.site ?? 'Default Web Site';
    this.appPool = options.appPool ?? 'DefaultAppPool';
    this.appcmd = options.appcmd ?? DEFAULT_APPCMD;
    this.powershell = options.powershell ?? 'powershell.exe';
  }

  get settings(): WebServerSettings {
    return { site: this.site, appPool: this.appPool };
  }

  /** PowerShell script importing the PEM pair and binding it. */
  bindingScript(target: WebServerTarget): string {
    const site = quote(this.site);
    const hosts = target.domains
      .split(' ')
      .filter((d) => d.length > 0)
      .map(quote)
      .join(', ');
    return [
      "$ErrorActionPreference = 'Stop'",
      'Import-Module WebAdministration',
      `$pem = [System.Security.Cryptography.X509Certificates.X509Certificate2]::CreateFromPemFile(${quote(target.fullchainPath)}, ${quote(target.keyPath)})`,
      "$cert = [System.Security.Cryptography.X509Certificates.X509Certificate2]::new($pem.Export('Pfx'), '', 'MachineKeySet,PersistKeySet')",
      "$store = New-Object System.Security.Cryptography.X509Certificates.X509Store('My', 'LocalMachine')",
      "$store.Open('ReadWrite')",
      '$store.Add($cert)',
      '$store.Close()',
      `foreach ($hostName in @(${hosts})) {`,
      `  $binding = Get-WebBinding -Name ${site} -Protocol https -Port 443 -HostHeader $hostName`,
      '  if (-not $binding) {',
      `    New-WebBinding -Name ${site} -Protocol https -Port 443 -HostHeader $hostName -SslFlags 1`,
      `    $binding = Get-WebBinding -Name ${site} -Protocol https -Port 443 -HostHeader $hostName`,
      '  }',
      "  $binding.AddSslCertificate($cert.Thumbprint, 'My')",
      '}',
    ].join('\n');
  }

  async configure(target: WebServerTarget): Promise<void> {
    try {
      await this.runner(this.powershell, [
        '-NoProfile',
        '-NonInteractive',
        '-Command',
        this.bindingScript(target),
      ]);
    } catch (e) {
      throw WebServerError.configure(this.kind, e);
    }
    log.info('IIS bindings for %s updated on site %s', target.primary, this.site);
  }

  async test(): Promise<void> {
    try {
      await this.runner(this.appcmd, ['list', 'config', '/section:system.applicationHost/sites']);
    } catch (e) {
      throw ConfigurationInvalidError.of(this.kind, e instanceof CommandError ? e.output : String(e), e);
    }
  }

  async reload(): Promise<void> {
    try {
      // recycling overlaps the old and new worker processes
      await this.runner(this.appcmd, ['recycle', 'apppool', `/apppool.name:${this.appPool}`]);
    } catch (e) {
      throw ReloadFailedError.of(this.kind, e);
    }
    log.info('IIS application pool %s recycled', this.appPool);
  }
}
