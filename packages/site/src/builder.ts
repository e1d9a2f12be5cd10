/**
 * Content builders
 *
 * A ContentBuilder turns an installable into an immutable content root.
 * NixBuilder shells out to `nix build` and `nix path-info`.
 */

import { execFile } from 'child_process';
import { BuildError, createSilentLogger, type ContentRoot, type Logger } from '@snowweb/core';

// =============================================================================
// Types
// =============================================================================

export interface ContentBuilder {
  /** Build an installable, resolving with the root to serve */
  build(installable: string): Promise<ContentRoot>;
}

export interface NixBuilderOptions {
  /** Profile updated by every successful build */
  profile?: string;
  /** Nix executable */
  command?: string;
  /** Logger */
  logger?: Logger;
}

/** Flags passed to every nix invocation */
export const NIX_GLOBAL_ARGS: readonly string[] = ['--refresh', '--experimental-features', 'nix-command flakes'];

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

// =============================================================================
// Output parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Output path from `nix build --json`:
 * `[{"drvPath": "...", "outputs": {"out": "/nix/store/..."}}]`.
 */
export function parseBuildOutput(json: unknown): string | undefined {
  if (!Array.isArray(json)) return undefined;
  const first: unknown = json[0];
  if (!isRecord(first) || !isRecord(first['outputs'])) return undefined;
  const out = first['outputs']['out'];
  return typeof out === 'string' && out !== '' ? out : undefined;
}

/**
 * NAR hash from `nix path-info --json`, which prints either
 * `[{"path": "...", "narHash": "..."}]` or `{"/nix/store/...": {"narHash": "..."}}`
 * depending on the Nix version.
 */
export function parsePathInfoOutput(json: unknown, storePath: string): string | undefined {
  let info: unknown;
  if (Array.isArray(json)) {
    info = json.find((entry: unknown) => isRecord(entry) && entry['path'] === storePath) ?? json[0];
  } else if (isRecord(json)) {
    info = json[storePath] ?? Object.values(json)[0];
  }
  if (!isRecord(info)) return undefined;
  const narHash = info['narHash'];
  return typeof narHash === 'string' && narHash !== '' ? narHash : undefined;
}

// =============================================================================
// Nix Builder
// =============================================================================

export class NixBuilder implements ContentBuilder {
  private readonly config: Required<Omit<NixBuilderOptions, 'profile'>> & Pick<NixBuilderOptions, 'profile'>;

  constructor(options: NixBuilderOptions = {}) {
    this.config = {
      profile: options.profile,
      command: options.command ?? 'nix',
      logger: options.logger ?? createSilentLogger(),
    };
  }

  async build(installable: string): Promise<ContentRoot> {
    const buildArgs = ['build', installable, '--json', '--no-link'];
    if (this.config.profile) {
      buildArgs.push('--profile', this.config.profile);
    }

    const storePath = parseBuildOutput(await this.run(installable, buildArgs));
    if (storePath === undefined) {
      throw new BuildError('BUILD_OUTPUT_INVALID', `building ${installable}: nix build printed no output path`, {
        context: { installable },
      });
    }
    this.config.logger.debug('built installable', { installable, path: storePath });

    const hash = parsePathInfoOutput(await this.run(installable, ['path-info', '--json', storePath]), storePath);
    if (hash === undefined) {
      throw new BuildError('BUILD_OUTPUT_INVALID', `building ${installable}: nix path-info printed no NAR hash for ${storePath}`, {
        context: { installable, path: storePath },
      });
    }

    return { path: storePath, hash };
  }

  /**
   * Run one nix command and parse its standard output as JSON. Standard
   * error is passed on to the log at debug level.
   */
  private run(installable: string, args: readonly string[]): Promise<unknown> {
    const argv = [...NIX_GLOBAL_ARGS, ...args];
    const commandLine = [this.config.command, ...argv].join(' ');
    const logger = this.config.logger;

    return new Promise((resolve, reject) => {
      execFile(this.config.command, argv, { maxBuffer: MAX_OUTPUT_BYTES, encoding: 'utf8' }, (error, stdout, stderr) => {
        for (const line of stderr.split('\n')) {
          if (line.trim() !== '') logger.debug(line, { command: args[0] });
        }

        if (error) {
          reject(
            new BuildError('BUILD_FAILED', `building ${installable}: running \`${commandLine}\``, {
              context: { installable, command: commandLine },
              cause: error,
            })
          );
          return;
        }

        try {
          resolve(JSON.parse(stdout));
        } catch (parseError) {
          reject(
            new BuildError('BUILD_OUTPUT_INVALID', `building ${installable}: parsing output of \`${commandLine}\``, {
              context: { installable, command: commandLine },
              cause: parseError,
            })
          );
        }
      });
    });
  }
}
