/**
 * Application assembly
 *
 * Turns resolved settings into a ready-to-start server: logger, builder,
 * TLS material and the server itself.
 */

import { Logger } from '@snowweb/core';
import { SnowWebServer, type SignalEmitter } from '@snowweb/server';
import { NixBuilder, type ContentBuilder } from '@snowweb/site';
import {
  AcmeAuthority,
  AlpnChallengeStore,
  AuthorityMaterialSource,
  FileMaterialSource,
  TlsMaterialManager,
  loadCertificateBundle,
  type MaterialSource,
} from '@snowweb/tls';
import { tlsMode, type SnowWebSettings } from './config.js';

export interface Application {
  server: SnowWebServer;
  tls?: TlsMaterialManager;
  logger: Logger;
}

export interface ApplicationOverrides {
  /** Replaces the nix builder */
  builder?: ContentBuilder;
  /** Where signal handlers go; false for none */
  signals?: SignalEmitter | false;
  /** Log line sink */
  write?: (line: string) => void;
}

export function createLogger(settings: SnowWebSettings, write?: (line: string) => void): Logger {
  return new Logger({ level: settings.logLevel, format: settings.logFormat, write });
}

/**
 * Wire every component from the settings. Bundles named in the settings
 * are read here, so a missing CA file fails before anything is built.
 */
export async function createApplication(
  settings: SnowWebSettings,
  overrides: ApplicationOverrides = {}
): Promise<Application> {
  const logger = createLogger(settings, overrides.write);
  const builder = overrides.builder ?? new NixBuilder({ profile: settings.profile, logger: logger.child('nix') });
  const tls = await createTlsManager(settings, logger);

  const server = new SnowWebServer({
    installable: settings.installable,
    listen: settings.listen,
    builder,
    tls,
    reloadFailureStatus: settings.reloadFailureStatus,
    reloadRateLimit: settings.reloadRateLimit,
    drainTimeoutMs: settings.drainTimeoutMs,
    renewCheckIntervalMs: settings.tls.acme.renewCheckIntervalMs,
    watchPaths: settings.watch,
    signals: overrides.signals,
    logger,
  });

  return { server, tls, logger };
}

async function createTlsManager(settings: SnowWebSettings, logger: Logger): Promise<TlsMaterialManager | undefined> {
  const { tls } = settings;
  const mode = tlsMode(tls);
  if (mode === 'none') {
    logger.debug('TLS disabled');
    return undefined;
  }

  let source: MaterialSource;
  let challenges: AlpnChallengeStore | undefined;
  if (mode === 'file' && tls.certificate !== undefined && tls.key !== undefined) {
    source = new FileMaterialSource(tls.certificate, tls.key);
  } else {
    challenges = new AlpnChallengeStore();
    const caRoots = tls.acme.caRoots ? (await loadCertificateBundle(tls.acme.caRoots)).join('\n') : undefined;
    const authority = new AcmeAuthority({
      storage: tls.acme.storage,
      challenges,
      directoryUrl: tls.acme.ca,
      caRoots,
      email: tls.acme.email,
      logger: logger.child('acme'),
    });
    source = new AuthorityMaterialSource(authority, tls.acme.domains);
  }

  let clientCA: string[] | undefined;
  if (tls.clientCA) {
    clientCA = await loadCertificateBundle(tls.clientCA);
    logger.debug('enabled client certificate verification', { ca_path: tls.clientCA, certificates: clientCA.length });
  }

  logger.debug('initialized certificate management', { mode, source: source.describe() });
  return new TlsMaterialManager({ source, clientCA, challenges, logger: logger.child('tls') });
}
