import {
  LifecycleManager,
  algorithmCode,
  createConfigurator,
  loadConfig,
  parseAlgorithm,
  resolveDirectoryUrl,
  type LifecycleConfig,
  type LifecycleManagerOptions,
  type TaskCommand,
  type WebServerConfigurator,
  type WebServerKind,
  type WebServerSettings,
} from '../../index.js';

/** Options shared by every command. */
export interface GlobalOptions {
  certDir?: string;
  accountDir?: string;
  directory?: string;
  staging?: boolean;
  keyAlgo?: string;
  httpPort?: string;
  tlsPort?: string;
}

/** Web server flags of install. */
export interface WebServerOptions {
  nginxConfDir?: string;
  apacheConfDir?: string;
  iisSite?: string;
  iisAppPool?: string;
}

function port(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return parsed;
}

/** Environment configuration with command-line flags applied on top. */
export function buildConfig(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): LifecycleConfig {
  const config = loadConfig(env);
  return {
    ...config,
    ...(options.certDir && { certDir: options.certDir }),
    ...(options.accountDir && { accountDir: options.accountDir }),
    ...((options.directory || options.staging) && {
      directoryUrl: resolveDirectoryUrl(options.directory ?? 'letsencrypt', options.staging === true),
    }),
    ...(options.keyAlgo && { keyAlgorithm: parseAlgorithm(options.keyAlgo) }),
    httpPort: port(options.httpPort, config.httpPort),
    tlsPort: port(options.tlsPort, config.tlsPort),
  };
}

/** Configurator factory honouring web server flags over settings stored at install. */
export function webServerFactory(
  options: WebServerOptions,
): (kind: WebServerKind, stored?: WebServerSettings) => WebServerConfigurator {
  return (kind, stored) =>
    createConfigurator(
      kind,
      {
        ...(options.nginxConfDir && { nginx: { confDir: options.nginxConfDir } }),
        ...(options.apacheConfDir && { apache: { confDir: options.apacheConfDir } }),
        iis: {
          ...(options.iisSite && { site: options.iisSite }),
          ...(options.iisAppPool && { appPool: options.iisAppPool }),
        },
      },
      stored,
    );
}

export function createManager(
  options: GlobalOptions & WebServerOptions,
  extra: Partial<LifecycleManagerOptions> = {},
): LifecycleManager {
  return new LifecycleManager({
    config: buildConfig(options),
    configuratorFactory: webServerFactory(options),
    ...extra,
  });
}

/**
 * Command line of the scheduled `renew` run. The store roots, directory and
 * key algorithm resolved now are passed as flags, since cron and the Task
 * Scheduler start without this shell's environment.
 */
export function renewTaskCommand(
  options: GlobalOptions & { executable?: string },
  env: NodeJS.ProcessEnv = process.env,
  script: string | undefined = process.argv[1],
): TaskCommand {
  const config = buildConfig(options, env);
  const args = [
    'renew',
    '--cert-dir',
    config.certDir,
    '--account-dir',
    config.accountDir,
    '--directory',
    config.directoryUrl,
    '--key-algo',
    algorithmCode(config.keyAlgorithm),
  ];
  if (options.executable) return { program: options.executable, args };
  return { program: process.execPath, args: script ? [script, ...args] : args };
}
