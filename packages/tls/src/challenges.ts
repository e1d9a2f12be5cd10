/**
 * TLS-ALPN-01 challenge certificates
 *
 * While an ACME order is being validated, handshakes for the domain under
 * validation are answered with the self-signed challenge certificate
 * instead of the active one.
 */

import * as tls from 'tls';
import type { KeyPair } from '@snowweb/core';

/** ALPN protocol identifier of the TLS-ALPN-01 challenge (RFC 8737) */
export const ACME_TLS_ALPN_PROTOCOL = 'acme-tls/1';

export class AlpnChallengeStore {
  private readonly contexts = new Map<string, tls.SecureContext>();

  /**
   * Answer handshakes for a server name with a challenge certificate.
   */
  set(serverName: string, pair: KeyPair): void {
    this.contexts.set(serverName.toLowerCase(), tls.createSecureContext({ cert: pair.cert, key: pair.key }));
  }

  get(serverName: string): tls.SecureContext | undefined {
    return this.contexts.get(serverName.toLowerCase());
  }

  delete(serverName: string): void {
    this.contexts.delete(serverName.toLowerCase());
  }

  get size(): number {
    return this.contexts.size;
  }
}
