/**
 * SnowWeb core types
 *
 * Values shared by the listener, content, TLS, site and server packages.
 */

// =============================================================================
// Content
// =============================================================================

/**
 * An immutable, content-addressed directory tree.
 * A new build always yields a new ContentRoot; existing ones are never updated.
 */
export interface ContentRoot {
  /** Filesystem path of the tree (the Nix store path) */
  readonly path: string;
  /** Digest of the whole tree, e.g. `sha256-...` */
  readonly hash: string;
}

/** Header name (canonical form) to every value given for it */
export type HeaderMap = ReadonlyMap<string, readonly string[]>;

// =============================================================================
// TLS
// =============================================================================

export interface KeyPair {
  /** PEM certificate chain */
  readonly cert: Buffer;
  /** PEM private key */
  readonly key: Buffer;
}

// =============================================================================
// Listener addresses
// =============================================================================

export type TcpNetwork = 'tcp' | 'tcp4' | 'tcp6';

export type ListenTarget =
  | { readonly kind: 'tcp'; readonly network: TcpNetwork; readonly host?: string; readonly port: number }
  | { readonly kind: 'unix'; readonly path: string }
  | { readonly kind: 'fd'; readonly fd: number }
  | { readonly kind: 'systemd'; readonly fd: number; readonly name?: string };

// =============================================================================
// Reload triggers
// =============================================================================

export type TriggerOrigin = 'signal' | 'watch' | 'remote' | 'timer';

export type ReloadTrigger =
  | { readonly kind: 'shutdown'; readonly signal: NodeJS.Signals }
  | { readonly kind: 'rebuild'; readonly origin: TriggerOrigin; readonly detail?: string }
  | { readonly kind: 'reload-tls'; readonly origin: TriggerOrigin; readonly detail?: string }
  | { readonly kind: 'watch-error'; readonly error: unknown };

export type ReloadTriggerKind = ReloadTrigger['kind'];
