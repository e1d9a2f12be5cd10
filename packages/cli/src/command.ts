/**
 * Command line
 *
 * One command: build the installable, serve it, and keep serving until a
 * shutdown signal.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { ConfigError, ExitStatus, LOG_LEVELS, describeError, exitStatusFor, type Logger } from '@snowweb/core';
import { createApplication } from './app.js';
import {
  SETTINGS,
  defaultSettings,
  environmentSettings,
  flagSettings,
  loadSettingsFile,
  resolveSettings,
  type SettingKey,
  type SnowWebSettings,
} from './config.js';

export const VERSION = '0.1.0';

export type CommandOptions = Record<string, unknown>;

export type ServeAction = (installable: string | undefined, options: CommandOptions) => Promise<number>;

// =============================================================================
// Program
// =============================================================================

/**
 * Build the command. The action resolves to the process exit status.
 */
export function createProgram(action: ServeAction = serve): Command {
  const program = new Command();

  program
    .name('snowweb')
    .description('Serve a static site built by Nix, rebuilding it on demand')
    .version(VERSION)
    .argument('[installable]', withEnv('Nix installable producing the site', 'installable'))
    .option('-c, --config <path>', 'YAML configuration file (env: SNOWWEB_CONFIG)')
    .option('-l, --listen <address>', withEnv('TCP, Unix, fd or systemd socket address to listen at', 'listen'))
    .addOption(new Option('--log-level <level>', withEnv('Minimum log level', 'logLevel')).choices(LOG_LEVELS))
    .addOption(new Option('--log-format <format>', withEnv('Log line format', 'logFormat')).choices(['pretty', 'json']))
    .option('--profile <path>', withEnv('Nix profile to record each build in', 'profile'))
    .option('-w, --watch <path>', 'Rebuild when this path changes (repeatable)', collect)
    .option('--certificate <path>', withEnv('Path to TLS server certificate', 'tls.certificate'))
    .option('--key <path>', withEnv('Path to TLS server certificate key', 'tls.key'))
    .option('--client-ca <path>', withEnv('Path to CA bundle trusted for client certificates', 'tls.clientCA'))
    .option('--acme-domain <domain>', withEnv('Domain to obtain a certificate for (repeatable)', 'tls.acme.domains'), collect)
    .option('--acme-ca <url>', withEnv('URL of the ACME directory', 'tls.acme.ca'))
    .option('--acme-ca-roots <path>', withEnv('CA bundle trusted when talking to the ACME directory', 'tls.acme.caRoots'))
    .option('--acme-email <email>', withEnv('Email address to register an ACME account with', 'tls.acme.email'))
    .option('--acme-storage <path>', withEnv('Where to store provisioned certificates', 'tls.acme.storage'))
    .option(
      '--acme-renew-interval <ms>',
      withEnv('How often to check the certificate for renewal (default: 43200000)', 'tls.acme.renewCheckIntervalMs')
    )
    .option('--reload-failure-status <status>', 'HTTP status of a failed remote rebuild (default: 200)')
    .option('--reload-rate-limit <count>', 'Remote rebuilds allowed per client and minute (default: 10)')
    .option('--drain-timeout <ms>', 'Longest wait for in-flight requests on shutdown (default: 30000)')
    .action(async (installable: string | undefined, options: CommandOptions) => {
      const status = await action(installable, options);
      if (status !== ExitStatus.OK) {
        process.exit(status);
      }
    });

  return program;
}

/**
 * Settings from every source, lowest precedence first.
 */
export async function readSettings(
  installable: string | undefined,
  options: CommandOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<SnowWebSettings> {
  const configFile = typeof options.config === 'string' ? options.config : env.SNOWWEB_CONFIG;
  const file = configFile ? await loadSettingsFile(configFile) : {};
  return resolveSettings([defaultSettings(env), file, environmentSettings(env), flagSettings(options, installable)]);
}

// =============================================================================
// Serve
// =============================================================================

async function serve(installable: string | undefined, options: CommandOptions): Promise<number> {
  let logger: Logger | undefined;
  try {
    const settings = await readSettings(installable, options);
    const app = await createApplication(settings);
    logger = app.logger;

    await app.server.start();
    const result = await app.server.run();
    logger.info('shut down', result.reason === 'shutdown' ? { signal: result.signal } : { reason: result.reason });
    return ExitStatus.OK;
  } catch (error) {
    reportFailure(error, logger);
    return exitStatusFor(error);
  }
}

export function reportFailure(error: unknown, logger?: Logger, write: (line: string) => void = console.error): void {
  const problems = error instanceof ConfigError ? error.problems : [];
  if (logger) {
    logger.error('server failed', { error, problems: problems.length > 0 ? problems : undefined });
    return;
  }

  write(chalk.red(`snowweb: ${describeError(error)}`));
  for (const problem of problems) {
    write(chalk.red(`  - ${problem}`));
  }
}

function withEnv(description: string, key: SettingKey): string {
  const env = SETTINGS[key].env;
  return env ? `${description} (env: ${env})` : description;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}
