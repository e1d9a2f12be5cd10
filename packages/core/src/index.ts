/**
 * SnowWeb Core Package
 *
 * Types, errors, logging and concurrency primitives shared by every
 * SnowWeb package.
 */

export type {
  ContentRoot,
  HeaderMap,
  KeyPair,
  TcpNetwork,
  ListenTarget,
  TriggerOrigin,
  ReloadTrigger,
  ReloadTriggerKind,
} from './types.js';

export {
  SnowWebError,
  ListenerError,
  BuildError,
  TlsError,
  WatchError,
  ConfigError,
  ExitStatus,
  describeError,
  hasErrorCode,
  exitStatusFor,
  type ErrorCode,
  type SnowWebErrorOptions,
} from './errors.js';

export {
  Logger,
  LOG_LEVELS,
  createSilentLogger,
  isLogLevel,
  type LogLevel,
  type LogFormat,
  type LogFields,
  type LoggerOptions,
} from './logger.js';

export { SerialExecutor } from './serial.js';
export { TriggerQueue } from './trigger-queue.js';
export { parseHeaderBlock, canonicalHeaderName, HeaderSyntaxError } from './headers.js';
export { generateId } from './utils.js';
