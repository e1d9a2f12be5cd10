/**
 * ACME certificate authority
 *
 * Issues certificates through an ACME directory (Let's Encrypt by default)
 * and keeps the account key and issued certificates in a storage
 * directory, one subdirectory per directory host. A stored certificate is
 * reused until it is within the renewal window of its expiry. Domains are
 * validated with the TLS-ALPN-01 challenge, answered by the handshakes of
 * this server.
 */

import * as fs from 'fs';
import * as https from 'https';
import * as path from 'path';
import * as acme from 'acme-client';
import { TlsError, createSilentLogger, hasErrorCode, type KeyPair, type Logger } from '@snowweb/core';
import { loadCertificateBundle } from './bundle.js';
import type { AlpnChallengeStore } from './challenges.js';
import type { CertificateAuthority } from './sources.js';

// =============================================================================
// Configuration
// =============================================================================

export const LETS_ENCRYPT_PRODUCTION = acme.directory.letsencrypt.production;

/** Renew certificates expiring within this many milliseconds */
export const RENEWAL_WINDOW_MS = 30 * 24 * 60 * 60 * 1000;

export interface AcmeAuthorityOptions {
  /** Where the account key and certificates are kept */
  storage: string;
  /** Pending challenges, consulted by the TLS manager during handshakes */
  challenges: AlpnChallengeStore;
  /** ACME directory URL */
  directoryUrl?: string;
  /** PEM bundle trusted when talking to the ACME directory */
  caRoots?: string;
  /** Account contact address */
  email?: string;
  /** Logger */
  logger?: Logger;
  /** Clock, for renewal decisions */
  now?: () => Date;
}

export interface StoredCertificatePaths {
  cert: string;
  key: string;
}

// =============================================================================
// ACME Authority
// =============================================================================

export class AcmeAuthority implements CertificateAuthority {
  readonly directoryUrl: string;
  private readonly config: Required<Omit<AcmeAuthorityOptions, 'caRoots' | 'email' | 'directoryUrl'>> &
    Pick<AcmeAuthorityOptions, 'caRoots' | 'email'>;
  private client?: acme.Client;

  constructor(options: AcmeAuthorityOptions) {
    this.directoryUrl = options.directoryUrl ?? LETS_ENCRYPT_PRODUCTION;
    this.config = {
      storage: options.storage,
      challenges: options.challenges,
      caRoots: options.caRoots,
      email: options.email,
      logger: options.logger ?? createSilentLogger(),
      now: options.now ?? (() => new Date()),
    };
  }

  describe(): string {
    return `acme:${this.directoryUrl}`;
  }

  /**
   * Directory holding everything issued by this ACME directory.
   */
  get accountDirectory(): string {
    return path.join(this.config.storage, safeSegment(new URL(this.directoryUrl).host));
  }

  certificatePaths(domains: readonly string[]): StoredCertificatePaths {
    const directory = path.join(this.accountDirectory, 'certificates', safeSegment(domains[0] ?? 'default'));
    return { cert: path.join(directory, 'certificate.pem'), key: path.join(directory, 'private.key') };
  }

  /**
   * Stored certificate when it covers the domains and is not due for
   * renewal, a newly issued one otherwise.
   */
  async obtain(domains: readonly string[]): Promise<KeyPair> {
    const stored = await this.readStored(domains);
    if (stored) {
      return stored;
    }

    const logger = this.config.logger;
    logger.info('requesting certificate', { domains: domains.join(','), directory: this.directoryUrl });

    let pair: KeyPair;
    try {
      pair = await this.issue(domains);
    } catch (error) {
      throw new TlsError('TLS_AUTHORITY_FAILED', `obtaining a certificate for ${domains.join(', ')} from ${this.directoryUrl}`, {
        context: { domains: domains.join(','), directory: this.directoryUrl },
        cause: error,
      });
    }

    await this.store(domains, pair);
    logger.info('certificate issued', { domains: domains.join(',') });
    return pair;
  }

  private async readStored(domains: readonly string[]): Promise<KeyPair | undefined> {
    const paths = this.certificatePaths(domains);
    let cert: Buffer;
    let key: Buffer;
    try {
      [cert, key] = await Promise.all([fs.promises.readFile(paths.cert), fs.promises.readFile(paths.key)]);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return undefined;
      throw new TlsError('TLS_READ_FAILED', `reading stored certificate ${paths.cert}`, {
        context: { path: paths.cert },
        cause: error,
      });
    }

    let info: ReturnType<typeof acme.crypto.readCertificateInfo>;
    try {
      info = acme.crypto.readCertificateInfo(cert);
    } catch (error) {
      this.config.logger.warn('stored certificate is unreadable, requesting a new one', { path: paths.cert, error });
      return undefined;
    }

    const covered = new Set([info.domains.commonName, ...info.domains.altNames].map((name) => name.toLowerCase()));
    const missing = domains.filter((domain) => !covered.has(domain.toLowerCase()));
    if (missing.length > 0) {
      this.config.logger.info('stored certificate does not cover every domain', { missing: missing.join(',') });
      return undefined;
    }

    const remaining = info.notAfter.getTime() - this.config.now().getTime();
    if (remaining <= RENEWAL_WINDOW_MS) {
      this.config.logger.info('stored certificate is due for renewal', { not_after: info.notAfter.toISOString() });
      return undefined;
    }

    this.config.logger.debug('using stored certificate', { path: paths.cert, not_after: info.notAfter.toISOString() });
    return { cert, key };
  }

  private async issue(domains: readonly string[]): Promise<KeyPair> {
    const client = await this.getClient();
    const [key, csr] = await acme.crypto.createCsr({
      commonName: domains[0],
      altNames: [...domains],
    });

    const challenges = this.config.challenges;
    const cert = await client.auto({
      csr,
      email: this.config.email,
      termsOfServiceAgreed: true,
      challengePriority: ['tls-alpn-01'],
      challengeCreateFn: async (authz, challenge, keyAuthorization) => {
        if (challenge.type !== 'tls-alpn-01') {
          throw new Error(`unsupported challenge type ${challenge.type}`);
        }
        const [challengeKey, challengeCert] = await acme.crypto.createAlpnCertificate(authz, keyAuthorization);
        challenges.set(authz.identifier.value, { cert: challengeCert, key: challengeKey });
        this.config.logger.debug('answering TLS-ALPN-01 challenge', { domain: authz.identifier.value });
      },
      challengeRemoveFn: async (authz) => {
        challenges.delete(authz.identifier.value);
      },
    });

    return { cert: Buffer.from(cert), key };
  }

  private async getClient(): Promise<acme.Client> {
    if (this.client) {
      return this.client;
    }

    if (this.config.caRoots) {
      const ca = await loadCertificateBundle(this.config.caRoots);
      acme.axios.defaults.httpsAgent = new https.Agent({ ca });
    }

    this.client = new acme.Client({
      directoryUrl: this.directoryUrl,
      accountKey: await this.accountKey(),
    });
    return this.client;
  }

  private async accountKey(): Promise<Buffer> {
    const keyPath = path.join(this.accountDirectory, 'account.key');
    try {
      return await fs.promises.readFile(keyPath);
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw error;
      }
    }

    const key = await acme.crypto.createPrivateKey();
    await fs.promises.mkdir(path.dirname(keyPath), { recursive: true, mode: 0o700 });
    await fs.promises.writeFile(keyPath, key, { mode: 0o600 });
    this.config.logger.info('created ACME account key', { path: keyPath });
    return key;
  }

  private async store(domains: readonly string[], pair: KeyPair): Promise<void> {
    const paths = this.certificatePaths(domains);
    await fs.promises.mkdir(path.dirname(paths.cert), { recursive: true, mode: 0o700 });
    await fs.promises.writeFile(paths.key, pair.key, { mode: 0o600 });
    await fs.promises.writeFile(paths.cert, pair.cert);
  }
}

function safeSegment(name: string): string {
  return name.replace(/[^A-Za-z0-9.-]/g, '_');
}
