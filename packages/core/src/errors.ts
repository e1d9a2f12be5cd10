/**
 * SnowWeb errors
 *
 * Every failure that crosses a package boundary is a SnowWebError carrying
 * a machine-readable code, the context needed to log it (which installable,
 * which file, which address) and the error that caused it.
 */

// =============================================================================
// Codes
// =============================================================================

export type ErrorCode =
  // Listener resolution
  | 'LISTENER_PARSE'
  | 'LISTENER_NOT_FOUND'
  | 'LISTENER_NO_SOCKETS'
  | 'LISTENER_BIND'
  // Builds
  | 'BUILD_FAILED'
  | 'BUILD_OUTPUT_INVALID'
  | 'SITE_HEADERS_INVALID'
  | 'SITE_NOT_READY'
  // TLS material
  | 'TLS_READ_FAILED'
  | 'TLS_INVALID'
  | 'TLS_AUTHORITY_FAILED'
  // Filesystem watching
  | 'WATCH_FAILED'
  // Configuration
  | 'CONFIG_INVALID'
  | 'CONFIG_READ_FAILED';

/**
 * Process exit statuses, following the BSD sysexits convention so that
 * supervisors can tell a usage error from a missing resource.
 */
export const ExitStatus = {
  OK: 0,
  USAGE: 64,
  DATA_ERR: 65,
  NO_INPUT: 66,
  UNAVAILABLE: 69,
  SOFTWARE: 70,
  OS_ERR: 71,
} as const;

export type ExitStatus = (typeof ExitStatus)[keyof typeof ExitStatus];

// =============================================================================
// Error classes
// =============================================================================

export interface SnowWebErrorOptions {
  /** Structured fields describing what was being done */
  context?: Record<string, string>;
  /** Underlying error */
  cause?: unknown;
}

export class SnowWebError extends Error {
  readonly code: ErrorCode;
  readonly context: Readonly<Record<string, string>>;

  constructor(code: ErrorCode, message: string, options: SnowWebErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SnowWebError';
    this.code = code;
    this.context = Object.freeze({ ...options.context });
  }
}

export class ListenerError extends SnowWebError {
  constructor(
    code: 'LISTENER_PARSE' | 'LISTENER_NOT_FOUND' | 'LISTENER_NO_SOCKETS' | 'LISTENER_BIND',
    message: string,
    options?: SnowWebErrorOptions
  ) {
    super(code, message, options);
    this.name = 'ListenerError';
  }
}

export class BuildError extends SnowWebError {
  constructor(
    code: 'BUILD_FAILED' | 'BUILD_OUTPUT_INVALID' | 'SITE_HEADERS_INVALID' | 'SITE_NOT_READY',
    message: string,
    options?: SnowWebErrorOptions
  ) {
    super(code, message, options);
    this.name = 'BuildError';
  }
}

export class TlsError extends SnowWebError {
  constructor(
    code: 'TLS_READ_FAILED' | 'TLS_INVALID' | 'TLS_AUTHORITY_FAILED',
    message: string,
    options?: SnowWebErrorOptions
  ) {
    super(code, message, options);
    this.name = 'TlsError';
  }
}

export class WatchError extends SnowWebError {
  constructor(message: string, options?: SnowWebErrorOptions) {
    super('WATCH_FAILED', message, options);
    this.name = 'WatchError';
  }
}

export class ConfigError extends SnowWebError {
  /** Individual problems, as `path: message` */
  readonly problems: readonly string[];

  constructor(
    code: 'CONFIG_INVALID' | 'CONFIG_READ_FAILED',
    message: string,
    problems: readonly string[] = [],
    options?: SnowWebErrorOptions
  ) {
    super(code, message, options);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Flatten an error and its cause chain into one line:
 * `building .#site: nix exited with status 1`.
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }

  return parts.filter((part) => part !== '').join(': ');
}

/**
 * Whether an error is a Node system error with the given errno code.
 */
export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === 'string' && codes.includes(code);
}

/**
 * Exit status for an error that aborted startup.
 */
export function exitStatusFor(error: unknown): ExitStatus {
  if (!(error instanceof SnowWebError)) {
    return ExitStatus.SOFTWARE;
  }

  switch (error.code) {
    case 'CONFIG_INVALID':
    case 'LISTENER_PARSE':
      return ExitStatus.USAGE;
    case 'CONFIG_READ_FAILED':
    case 'TLS_READ_FAILED':
      return ExitStatus.NO_INPUT;
    case 'TLS_INVALID':
    case 'SITE_HEADERS_INVALID':
    case 'BUILD_OUTPUT_INVALID':
      return ExitStatus.DATA_ERR;
    case 'WATCH_FAILED':
      return ExitStatus.OS_ERR;
    case 'LISTENER_NOT_FOUND':
    case 'LISTENER_NO_SOCKETS':
    case 'LISTENER_BIND':
    case 'BUILD_FAILED':
    case 'SITE_NOT_READY':
    case 'TLS_AUTHORITY_FAILED':
      return ExitStatus.UNAVAILABLE;
  }
}
