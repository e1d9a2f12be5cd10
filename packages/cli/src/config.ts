/**
 * Configuration
 *
 * Settings come from four layers, lowest precedence first: built-in
 * defaults, a YAML file, SNOWWEB_* environment variables and command-line
 * flags. Each layer is a flat record keyed by dotted setting path; values
 * are checked once, after merging, so every problem is reported together.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, isLogLevel, type LogFormat, type LogLevel } from '@snowweb/core';
import { LETS_ENCRYPT_PRODUCTION } from '@snowweb/tls';
import { DEFAULT_DRAIN_TIMEOUT_MS, DEFAULT_LISTEN_ADDRESS, DEFAULT_RENEW_CHECK_INTERVAL_MS } from '@snowweb/server';

// =============================================================================
// Types
// =============================================================================

export interface AcmeSettings {
  /** Domains to obtain certificates for; ACME is enabled when non-empty */
  domains: readonly string[];
  /** ACME directory URL */
  ca: string;
  /** PEM bundle trusted when talking to the directory */
  caRoots?: string;
  /** Account contact address */
  email?: string;
  /** Where issued certificates and the account key are kept */
  storage: string;
  /** How often the certificate is checked for renewal */
  renewCheckIntervalMs: number;
}

export interface TlsSettings {
  certificate?: string;
  key?: string;
  /** PEM bundle of CAs trusted for client certificates */
  clientCA?: string;
  acme: AcmeSettings;
}

export interface SnowWebSettings {
  installable: string;
  listen: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  /** Nix profile updated with each build */
  profile?: string;
  /** Paths whose changes rebuild the site */
  watch: readonly string[];
  tls: TlsSettings;
  reloadFailureStatus: number;
  reloadRateLimit: number;
  drainTimeoutMs: number;
}

export type SettingKey =
  | 'installable'
  | 'listen'
  | 'logLevel'
  | 'logFormat'
  | 'profile'
  | 'watch'
  | 'tls.certificate'
  | 'tls.key'
  | 'tls.clientCA'
  | 'tls.acme.domains'
  | 'tls.acme.ca'
  | 'tls.acme.caRoots'
  | 'tls.acme.email'
  | 'tls.acme.storage'
  | 'tls.acme.renewCheckIntervalMs'
  | 'reloadFailureStatus'
  | 'reloadRateLimit'
  | 'drainTimeoutMs';

/** One configuration source, keyed by setting path */
export type SettingsLayer = Partial<Record<SettingKey, unknown>>;

type SettingKind = 'string' | 'list' | 'integer' | 'log-level' | 'log-format';

interface SettingDefinition {
  kind: SettingKind;
  /** Environment variable read for this setting */
  env?: string;
  /** Commander attribute name of the flag setting it */
  flag?: string;
}

export const SETTINGS: Record<SettingKey, SettingDefinition> = {
  installable: { kind: 'string', env: 'SNOWWEB_INSTALLABLE' },
  listen: { kind: 'string', env: 'SNOWWEB_LISTEN', flag: 'listen' },
  logLevel: { kind: 'log-level', env: 'SNOWWEB_LOG_LEVEL', flag: 'logLevel' },
  logFormat: { kind: 'log-format', env: 'SNOWWEB_LOG_FORMAT', flag: 'logFormat' },
  profile: { kind: 'string', env: 'SNOWWEB_PROFILE', flag: 'profile' },
  watch: { kind: 'list', flag: 'watch' },
  'tls.certificate': { kind: 'string', env: 'SNOWWEB_TLS_CERTIFICATE', flag: 'certificate' },
  'tls.key': { kind: 'string', env: 'SNOWWEB_TLS_KEY', flag: 'key' },
  'tls.clientCA': { kind: 'string', env: 'SNOWWEB_TLS_CLIENT_CA', flag: 'clientCa' },
  'tls.acme.domains': { kind: 'list', env: 'SNOWWEB_TLS_ACME_DOMAINS', flag: 'acmeDomain' },
  'tls.acme.ca': { kind: 'string', env: 'SNOWWEB_TLS_ACME_CA', flag: 'acmeCa' },
  'tls.acme.caRoots': { kind: 'string', env: 'SNOWWEB_TLS_ACME_CA_ROOTS', flag: 'acmeCaRoots' },
  'tls.acme.email': { kind: 'string', env: 'SNOWWEB_TLS_ACME_EMAIL', flag: 'acmeEmail' },
  'tls.acme.storage': { kind: 'string', env: 'SNOWWEB_TLS_ACME_STORAGE', flag: 'acmeStorage' },
  'tls.acme.renewCheckIntervalMs': {
    kind: 'integer',
    env: 'SNOWWEB_TLS_ACME_RENEW_INTERVAL',
    flag: 'acmeRenewInterval',
  },
  reloadFailureStatus: { kind: 'integer', flag: 'reloadFailureStatus' },
  reloadRateLimit: { kind: 'integer', flag: 'reloadRateLimit' },
  drainTimeoutMs: { kind: 'integer', flag: 'drainTimeout' },
};

const SETTING_KEYS = Object.keys(SETTINGS).filter(isSettingKey);

// Longest delay a Node.js timer accepts
const MAX_TIMER_MS = 2 ** 31 - 1;

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(SETTINGS, key);
}

// =============================================================================
// Layers
// =============================================================================

/**
 * Built-in defaults. The certificate store follows the XDG data directory.
 */
export function defaultSettings(env: NodeJS.ProcessEnv = process.env): SettingsLayer {
  const dataHome = env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share');
  return {
    listen: DEFAULT_LISTEN_ADDRESS,
    logLevel: 'info',
    logFormat: 'pretty',
    watch: [],
    'tls.acme.domains': [],
    'tls.acme.ca': LETS_ENCRYPT_PRODUCTION,
    'tls.acme.storage': path.join(dataHome, 'snowweb', 'certstorage'),
    reloadFailureStatus: 200,
    reloadRateLimit: 10,
    drainTimeoutMs: DEFAULT_DRAIN_TIMEOUT_MS,
  };
}

/**
 * Read a YAML settings file, nested the same way as the setting paths:
 *
 * ```yaml
 * installable: .#site
 * tls:
 *   acme:
 *     domains: [example.org]
 * ```
 */
export async function loadSettingsFile(file: string): Promise<SettingsLayer> {
  let text: string;
  try {
    text = await fs.promises.readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError('CONFIG_READ_FAILED', `reading ${file}`, [], { context: { path: file }, cause: error });
  }

  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigError('CONFIG_INVALID', `parsing ${file}`, [], { context: { path: file }, cause: error });
  }

  const problems: string[] = [];
  const layer: SettingsLayer = {};
  if (document === null || document === undefined) {
    return layer;
  }
  if (!isRecord(document)) {
    throw new ConfigError('CONFIG_INVALID', `invalid configuration in ${file}`, ['(root): must be a mapping']);
  }

  flattenInto(layer, document, '', problems);
  if (problems.length > 0) {
    throw new ConfigError('CONFIG_INVALID', `invalid configuration in ${file}`, problems, { context: { path: file } });
  }
  return layer;
}

/**
 * Settings given through SNOWWEB_* variables. Empty variables count as unset.
 */
export function environmentSettings(env: NodeJS.ProcessEnv): SettingsLayer {
  const layer: SettingsLayer = {};
  for (const key of SETTING_KEYS) {
    const name = SETTINGS[key].env;
    const value = name ? env[name] : undefined;
    if (value !== undefined && value !== '') {
      layer[key] = value;
    }
  }
  return layer;
}

/**
 * Settings given as command-line flags, from commander's parsed options.
 */
export function flagSettings(options: Record<string, unknown>, installable?: string): SettingsLayer {
  const layer: SettingsLayer = {};
  if (installable !== undefined) {
    layer.installable = installable;
  }
  for (const key of SETTING_KEYS) {
    const flag = SETTINGS[key].flag;
    if (flag && options[flag] !== undefined) {
      layer[key] = options[flag];
    }
  }
  return layer;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Merge layers, later ones winning, and check the result.
 *
 * @throws ConfigError with every problem found
 */
export function resolveSettings(layers: readonly SettingsLayer[]): SnowWebSettings {
  const merged: SettingsLayer = {};
  for (const layer of layers) {
    Object.assign(merged, layer);
  }
  const problems: string[] = [];
  const reader = new SettingReader(merged, problems);

  const installable = reader.string('installable');
  if (installable === undefined) {
    problems.push('installable: no installable given');
  }

  const settings: SnowWebSettings = {
    installable: installable ?? '',
    listen: reader.string('listen') ?? DEFAULT_LISTEN_ADDRESS,
    logLevel: reader.logLevel('logLevel'),
    logFormat: reader.logFormat('logFormat'),
    profile: reader.string('profile'),
    watch: reader.list('watch'),
    tls: {
      certificate: reader.string('tls.certificate'),
      key: reader.string('tls.key'),
      clientCA: reader.string('tls.clientCA'),
      acme: {
        domains: reader.list('tls.acme.domains'),
        ca: reader.string('tls.acme.ca') ?? LETS_ENCRYPT_PRODUCTION,
        caRoots: reader.string('tls.acme.caRoots'),
        email: reader.string('tls.acme.email'),
        storage: reader.string('tls.acme.storage') ?? '',
        renewCheckIntervalMs: reader.integer('tls.acme.renewCheckIntervalMs', DEFAULT_RENEW_CHECK_INTERVAL_MS, {
          min: 1000,
          max: MAX_TIMER_MS,
        }),
      },
    },
    reloadFailureStatus: reader.integer('reloadFailureStatus', 200, { min: 100, max: 599 }),
    reloadRateLimit: reader.integer('reloadRateLimit', 10, { min: 1 }),
    drainTimeoutMs: reader.integer('drainTimeoutMs', DEFAULT_DRAIN_TIMEOUT_MS, { min: 1 }),
  };

  problems.push(...checkTls(settings.tls));

  if (problems.length > 0) {
    throw new ConfigError('CONFIG_INVALID', 'invalid configuration', problems);
  }
  return settings;
}

export type TlsMode = 'none' | 'file' | 'acme';

export function tlsMode(tls: TlsSettings): TlsMode {
  if (tls.certificate !== undefined) return 'file';
  if (tls.acme.domains.length > 0) return 'acme';
  return 'none';
}

function checkTls(tls: TlsSettings): string[] {
  const problems: string[] = [];
  if ((tls.certificate === undefined) !== (tls.key === undefined)) {
    problems.push('tls: certificate and key must be either both given, or both not given');
  }
  if (tls.certificate !== undefined && tls.acme.domains.length > 0) {
    problems.push('tls: ACME and a local certificate cannot both be enabled');
  }
  if (tls.clientCA !== undefined && tls.certificate === undefined && tls.acme.domains.length === 0) {
    problems.push('tls.clientCA: client certificates need TLS to be enabled');
  }
  if (!isUrl(tls.acme.ca)) {
    problems.push(`tls.acme.ca: ${JSON.stringify(tls.acme.ca)} is not a URL`);
  }
  if (tls.acme.domains.length > 0 && tls.acme.storage === '') {
    problems.push('tls.acme.storage: no certificate storage directory given');
  }
  return problems;
}

// =============================================================================
// Value checks
// =============================================================================

class SettingReader {
  constructor(
    private readonly layer: SettingsLayer,
    private readonly problems: string[]
  ) {}

  string(key: SettingKey): string | undefined {
    const value = this.layer[key];
    if (value === undefined || value === null || value === '') return undefined;
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    this.problems.push(`${key}: must be a string`);
    return undefined;
  }

  list(key: SettingKey): string[] {
    const value = this.layer[key];
    if (value === undefined || value === null) return [];
    if (typeof value === 'string') return splitList(value);
    // Lists given as lists (YAML sequences, repeated flags) are taken
    // as they are; only single strings are split on commas.
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return value.filter((item) => item !== '');
    }
    this.problems.push(`${key}: must be a list of strings`);
    return [];
  }

  integer(key: SettingKey, fallback: number, range: { min: number; max?: number }): number {
    const value = this.layer[key];
    if (value === undefined || value === null) return fallback;

    const number = typeof value === 'string' && /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : value;
    if (typeof number !== 'number' || !Number.isInteger(number)) {
      this.problems.push(`${key}: must be an integer`);
      return fallback;
    }
    if (number < range.min || (range.max !== undefined && number > range.max)) {
      this.problems.push(
        range.max === undefined
          ? `${key}: must be at least ${range.min}`
          : `${key}: must be between ${range.min} and ${range.max}`
      );
      return fallback;
    }
    return number;
  }

  logLevel(key: SettingKey): LogLevel {
    const value = this.string(key);
    if (value === undefined) return 'info';
    if (isLogLevel(value)) return value;
    this.problems.push(`${key}: unknown log level ${JSON.stringify(value)}`);
    return 'info';
  }

  logFormat(key: SettingKey): LogFormat {
    const value = this.string(key);
    if (value === undefined) return 'pretty';
    if (value === 'pretty' || value === 'json') return value;
    this.problems.push(`${key}: unknown log format ${JSON.stringify(value)}`);
    return 'pretty';
  }
}

function flattenInto(layer: SettingsLayer, node: Record<string, unknown>, prefix: string, problems: string[]): void {
  for (const [name, value] of Object.entries(node)) {
    const key = prefix + name;
    if (isSettingKey(key)) {
      layer[key] = value;
    } else if (isRecord(value) && SETTING_KEYS.some((candidate) => candidate.startsWith(`${key}.`))) {
      flattenInto(layer, value, `${key}.`, problems);
    } else {
      problems.push(`${key}: unknown setting`);
    }
  }
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}
