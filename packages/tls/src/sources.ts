/**
 * TLS material sources
 *
 * A MaterialSource produces a certificate chain and its private key on
 * demand. Sources only read; validating that the pair matches is left to
 * the manager, which does it while building the secure context.
 */

import * as fs from 'fs';
import { TlsError, type KeyPair } from '@snowweb/core';

// =============================================================================
// Types
// =============================================================================

export interface MaterialSource {
  /** Produce the current pair */
  load(): Promise<KeyPair>;
  /** Human-readable origin, for logs */
  describe(): string;
  /** Files whose changes should trigger a reload, if any */
  watchPaths(): readonly string[];
  /**
   * Whether loading may need handshakes to be answered, as when a
   * certificate authority validates the domain through this server.
   */
  readonly requiresListener: boolean;
}

/**
 * Something that issues certificates, deciding by itself whether a stored
 * certificate is still good enough.
 */
export interface CertificateAuthority {
  obtain(domains: readonly string[]): Promise<KeyPair>;
  describe(): string;
}

// =============================================================================
// File source
// =============================================================================

export class FileMaterialSource implements MaterialSource {
  readonly requiresListener = false;

  constructor(
    readonly certificatePath: string,
    readonly keyPath: string
  ) {}

  async load(): Promise<KeyPair> {
    const [cert, key] = await Promise.all([readPem(this.certificatePath), readPem(this.keyPath)]);
    return { cert, key };
  }

  describe(): string {
    return `file:${this.certificatePath}`;
  }

  watchPaths(): readonly string[] {
    return [this.certificatePath, this.keyPath];
  }
}

async function readPem(filePath: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(filePath);
  } catch (error) {
    throw new TlsError('TLS_READ_FAILED', `reading ${filePath}`, { context: { path: filePath }, cause: error });
  }
}

// =============================================================================
// Authority source
// =============================================================================

export class AuthorityMaterialSource implements MaterialSource {
  readonly domains: readonly string[];
  readonly requiresListener = true;

  constructor(
    private readonly authority: CertificateAuthority,
    domains: readonly string[]
  ) {
    if (domains.length === 0) {
      throw new TlsError('TLS_AUTHORITY_FAILED', 'no domains to obtain certificates for');
    }
    this.domains = Object.freeze([...domains]);
  }

  async load(): Promise<KeyPair> {
    try {
      return await this.authority.obtain(this.domains);
    } catch (error) {
      if (error instanceof TlsError) throw error;
      throw new TlsError('TLS_AUTHORITY_FAILED', `obtaining a certificate for ${this.domains.join(', ')}`, {
        context: { authority: this.authority.describe(), domains: this.domains.join(',') },
        cause: error,
      });
    }
  }

  describe(): string {
    return `${this.authority.describe()} for ${this.domains.join(', ')}`;
  }

  watchPaths(): readonly string[] {
    return [];
  }
}
