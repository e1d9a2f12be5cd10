/**
 * SnowWeb Server Package
 *
 * HTTP/HTTPS server with live site and certificate reloads.
 */

export {
  SnowWebServer,
  DEFAULT_LISTEN_ADDRESS,
  DEFAULT_DRAIN_TIMEOUT_MS,
  DEFAULT_RENEW_CHECK_INTERVAL_MS,
  type SnowWebServerConfig,
} from './server.js';
export {
  ReloadLoop,
  type ReloadLoopOptions,
  type ReloadLoopResult,
  type Rebuilder,
  type TlsReloader,
} from './reload-loop.js';
export {
  SignalTriggerSource,
  WatchTriggerSource,
  SIGNAL_TRIGGERS,
  type SignalEmitter,
  type SignalTriggerKind,
  type WatchTriggerSourceOptions,
} from './triggers.js';
