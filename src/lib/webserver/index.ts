import { ApacheConfigurator, NginxConfigurator } from './file-configurator.js';
import { IisConfigurator, type IisConfiguratorOptions } from './iis-configurator.js';
import type { CommandRunner } from '../utils/command-runner.js';
import type { WebServerConfigurator, WebServerKind, WebServerSettings, WebServerTarget } from './types.js';

export * from './types.js';
export { mergeManagedBlock } from './managed-block.js';
export { FileConfigurator, NginxConfigurator, ApacheConfigurator } from './file-configurator.js';
export { IisConfigurator, type IisConfiguratorOptions } from './iis-configurator.js';

export interface ConfiguratorOptions {
  runner?: CommandRunner;
  nginx?: { confDir?: string; binary?: string };
  apache?: { confDir?: string; binary?: string };
  iis?: Omit<IisConfiguratorOptions, 'runner'>;
}

/**
 * Bind the configurator implementation for a web server variant. Explicit
 * options win over `stored` settings, which win over the defaults.
 */
export function createConfigurator(
  kind: WebServerKind,
  options: ConfiguratorOptions = {},
  stored: WebServerSettings = {},
): WebServerConfigurator {
  switch (kind) {
    case 'nginx':
      return new NginxConfigurator({
        confDir: options.nginx?.confDir ?? stored.confDir ?? '/etc/nginx/conf.d',
        binary: options.nginx?.binary,
        runner: options.runner,
      });
    case 'apache':
      return new ApacheConfigurator({
        confDir: options.apache?.confDir ?? stored.confDir ?? '/etc/apache2/sites-enabled',
        binary: options.apache?.binary,
        runner: options.runner,
      });
    case 'iis':
      return new IisConfigurator({
        ...options.iis,
        site: options.iis?.site ?? stored.site,
        appPool: options.iis?.appPool ?? stored.appPool,
        runner: options.runner,
      });
  }
}

/**
 * configure -> test -> reload, strictly in that order. A failing step
 * stops the sequence.
 */
export async function applyConfiguration(
  configurator: WebServerConfigurator,
  target: WebServerTarget,
): Promise<void> {
  await configurator.configure(target);
  await configurator.test();
  await configurator.reload();
}
