import { mkdir } from 'fs/promises';
import { join } from 'path';
import { PUBLIC_FILE_MODE } from '../constants/defaults.js';
import {
  ConfigurationInvalidError,
  ReloadFailedError,
  WebServerError,
} from '../errors/lifecycle-errors.js';
import { createLogger } from '../logger.js';
import { readOptionalFile, writeFileAtomic } from '../storage/fs-utils.js';
import { CommandError, execRunner, type CommandRunner } from '../utils/command-runner.js';
import { mergeManagedBlock } from './managed-block.js';
import type { WebServerConfigurator, WebServerKind, WebServerSettings, WebServerTarget } from './types.js';

const log = createLogger('webserver');

export interface FileConfiguratorOptions {
  /** Directory holding the managed configuration file */
  confDir: string;
  /** Server control binary (nginx, apachectl) */
  binary?: string;
  runner?: CommandRunner;
}

/**
 * Shared behaviour of servers configured through text files: a managed
 * block merged into a per-domain file, and a control binary for test and
 * reload.
 */
export abstract class FileConfigurator implements WebServerConfigurator {
  abstract readonly kind: WebServerKind;
  protected abstract readonly testArgs: readonly string[];
  protected abstract readonly reloadArgs: readonly string[];
  protected readonly runner: CommandRunner;

  constructor(protected readonly options: FileConfiguratorOptions) {
    this.runner = options.runner ?? execRunner;
  }

  get settings(): WebServerSettings {
    return { confDir: this.options.confDir };
  }

  protected abstract get binary(): string;

  /** File receiving the managed block for `target`. */
  abstract configPath(target: WebServerTarget): string;

  /** Body of the managed block. */
  protected abstract render(target: WebServerTarget): string;

  async configure(target: WebServerTarget): Promise<void> {
    const path = this.configPath(target);
    try {
      const existing = await readOptionalFile(path);
      const merged = mergeManagedBlock(existing, target.primary, this.render(target));
      await mkdir(this.options.confDir, { recursive: true });
      await writeFileAtomic(path, merged, PUBLIC_FILE_MODE);
    } catch (e) {
      throw WebServerError.configure(this.kind, e);
    }
    log.info('%s configuration for %s written to %s', this.kind, target.primary, path);
  }

  async test(): Promise<void> {
    try {
      await this.runner(this.binary, this.testArgs);
    } catch (e) {
      throw ConfigurationInvalidError.of(this.kind, e instanceof CommandError ? e.output : String(e), e);
    }
    log.debug('%s configuration test passed', this.kind);
  }

  async reload(): Promise<void> {
    try {
      await this.runner(this.binary, this.reloadArgs);
    } catch (e) {
      throw ReloadFailedError.of(this.kind, e);
    }
    log.info('%s reloaded', this.kind);
  }
}

export class NginxConfigurator extends FileConfigurator {
  readonly kind = 'nginx' as const;
  protected readonly testArgs = ['-t'];
  protected readonly reloadArgs = ['-s', 'reload'];

  protected get binary(): string {
    return this.options.binary ?? 'nginx';
  }

  configPath(target: WebServerTarget): string {
    return join(this.options.confDir, `${target.primary}.conf`);
  }

  protected render(target: WebServerTarget): string {
    const lines = [
      'server {',
      '    listen 443 ssl;',
      '    listen [::]:443 ssl;',
      `    server_name ${target.domains};`,
      '',
      `    ssl_certificate     ${target.fullchainPath};`,
      `    ssl_certificate_key ${target.keyPath};`,
      '    ssl_protocols       TLSv1.2 TLSv1.3;',
    ];
    if (target.webroot) {
      lines.push('', `    root ${target.webroot};`);
    }
    lines.push('}');
    return lines.join('\n');
  }
}

export class ApacheConfigurator extends FileConfigurator {
  readonly kind = 'apache' as const;
  protected readonly testArgs = ['configtest'];
  protected readonly reloadArgs = ['graceful'];

  protected get binary(): string {
    return this.options.binary ?? 'apachectl';
  }

  configPath(target: WebServerTarget): string {
    return join(this.options.confDir, `${target.primary}-ssl.conf`);
  }

  protected render(target: WebServerTarget): string {
    const [serverName, ...aliases] = target.domains.split(' ');
    const lines = ['<VirtualHost *:443>', `    ServerName ${serverName}`];
    if (aliases.length > 0) lines.push(`    ServerAlias ${aliases.join(' ')}`);
    if (target.webroot) lines.push(`    DocumentRoot ${target.webroot}`);
    lines.push(
      '    SSLEngine on',
      `    SSLCertificateFile ${target.fullchainPath}`,
      `    SSLCertificateKeyFile ${target.keyPath}`,
      '</VirtualHost>',
    );
    return lines.join('\n');
  }
}
