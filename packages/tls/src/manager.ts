/**
 * TLS Material Manager
 *
 * Holds the certificate and key used for new handshakes and replaces them
 * on demand. The active material is one frozen object swapped by reference,
 * so a handshake always sees a certificate together with its own key.
 * Reloads are serialized; a failed reload leaves the previous material in
 * place.
 */

import { X509Certificate } from 'crypto';
import type * as https from 'https';
import * as tls from 'tls';
import { SerialExecutor, TlsError, createSilentLogger, describeError, type KeyPair, type Logger } from '@snowweb/core';
import { ACME_TLS_ALPN_PROTOCOL, type AlpnChallengeStore } from './challenges.js';
import type { MaterialSource } from './sources.js';

// =============================================================================
// Types
// =============================================================================

export interface ActiveTlsMaterial {
  /** PEM certificate chain */
  readonly cert: Buffer;
  /** PEM private key */
  readonly key: Buffer;
  /** Secure context built from exactly this pair */
  readonly context: tls.SecureContext;
  /** Where the pair came from */
  readonly source: string;
  /** Subject of the leaf certificate */
  readonly subject: string;
  /** Expiry of the leaf certificate */
  readonly validTo: Date;
  readonly loadedAt: Date;
}

export interface TlsMaterialManagerOptions {
  /** Where certificates come from */
  source: MaterialSource;
  /** PEM certificates trusted for client authentication */
  clientCA?: readonly string[];
  /** Pending ACME challenges to answer during handshakes */
  challenges?: AlpnChallengeStore;
  /** Logger */
  logger?: Logger;
}

export type MaterialListener = (material: ActiveTlsMaterial) => void;

// =============================================================================
// TLS Material Manager
// =============================================================================

export class TlsMaterialManager {
  readonly source: MaterialSource;
  readonly challenges?: AlpnChallengeStore;
  private readonly clientCA?: readonly string[];
  private readonly logger: Logger;
  private readonly executor = new SerialExecutor();
  private readonly listeners = new Set<MaterialListener>();
  private active?: ActiveTlsMaterial;

  constructor(options: TlsMaterialManagerOptions) {
    this.source = options.source;
    this.clientCA = options.clientCA;
    this.challenges = options.challenges;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * First load. Rejects with a TlsError when no usable material can be read.
   */
  async init(): Promise<ActiveTlsMaterial> {
    return this.executor.run(() => this.load());
  }

  /**
   * Material used for handshakes starting now.
   */
  currentCertificate(): ActiveTlsMaterial {
    if (!this.active) {
      throw new Error('TLS material requested before init()');
    }
    return this.active;
  }

  get initialized(): boolean {
    return this.active !== undefined;
  }

  /**
   * Read the source again and switch to the new pair once it has been
   * turned into a secure context. Handshakes already under way keep the
   * material they started with.
   */
  async reload(): Promise<ActiveTlsMaterial> {
    return this.executor.run(async () => {
      const previous = this.active;
      try {
        return await this.load();
      } catch (error) {
        this.logger.error('could not reload TLS material', {
          source: this.source.describe(),
          keeping: previous?.subject,
          error: describeError(error),
        });
        throw error;
      }
    });
  }

  /**
   * Be told about every newly activated material.
   */
  onChange(listener: MaterialListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Options for `https.createServer`. Server-name-indicating clients get
   * the active material through SNICallback; the plain cert/key pair only
   * serves clients without SNI and is refreshed by the server on change.
   * Before init() only pending ACME challenges are answered.
   */
  serverOptions(): https.ServerOptions {
    const options: https.ServerOptions = {
      ...(this.active ? this.secureContextOptions(this.active) : {}),
      minVersion: 'TLSv1.2',
      SNICallback: (serverName, callback) => {
        const context = this.challenges?.get(serverName) ?? this.active?.context;
        if (context) {
          callback(null, context);
        } else {
          callback(new Error(`no TLS certificate loaded for ${serverName}`));
        }
      },
    };
    if (this.challenges) {
      options.ALPNProtocols = ['http/1.1', ACME_TLS_ALPN_PROTOCOL];
    }
    if (this.clientCA) {
      options.requestCert = true;
      options.rejectUnauthorized = false;
    }
    return options;
  }

  /**
   * Options for `tls.createSecureContext` or `server.setSecureContext`.
   */
  secureContextOptions(material: ActiveTlsMaterial): tls.SecureContextOptions {
    const options: tls.SecureContextOptions = { cert: material.cert, key: material.key };
    if (this.clientCA) {
      options.ca = [...this.clientCA];
    }
    return options;
  }

  private async load(): Promise<ActiveTlsMaterial> {
    const pair = await this.source.load();
    const material = this.activate(pair);

    this.active = material;
    this.logger.info('loaded TLS certificate', {
      source: material.source,
      subject: material.subject,
      valid_to: material.validTo.toISOString(),
    });
    for (const listener of this.listeners) {
      listener(material);
    }
    return material;
  }

  private activate(pair: KeyPair): ActiveTlsMaterial {
    const source = this.source.describe();

    let leaf: X509Certificate;
    try {
      leaf = new X509Certificate(pair.cert);
    } catch (error) {
      throw new TlsError('TLS_INVALID', `parsing certificate from ${source}`, { context: { source }, cause: error });
    }

    let context: tls.SecureContext;
    try {
      context = tls.createSecureContext({
        cert: pair.cert,
        key: pair.key,
        ca: this.clientCA ? [...this.clientCA] : undefined,
      });
    } catch (error) {
      throw new TlsError('TLS_INVALID', `certificate and key from ${source} do not form a usable pair`, {
        context: { source },
        cause: error,
      });
    }

    return Object.freeze({
      cert: pair.cert,
      key: pair.key,
      context,
      source,
      subject: leaf.subject.replace(/\n/g, ', '),
      validTo: new Date(leaf.validTo),
      loadedAt: new Date(),
    });
  }
}
