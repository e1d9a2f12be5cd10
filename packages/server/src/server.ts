/**
 * SnowWeb Server
 *
 * Assembles the site handler, the optional TLS layer and the listening
 * socket, then runs the reload loop until shutdown.
 */

import * as http from 'http';
import * as https from 'https';
import type { ErrorHandler } from '@snowweb/content';
import {
  TriggerQueue,
  createSilentLogger,
  type ListenTarget,
  type Logger,
} from '@snowweb/core';
import { bindListener, formatListenTarget, parseListenAddress, type ActivationEnv } from '@snowweb/listeners';
import { SiteCoordinator, SiteHandler, type ContentBuilder } from '@snowweb/site';
import type { TlsMaterialManager } from '@snowweb/tls';
import { ReloadLoop, type ReloadLoopResult } from './reload-loop.js';
import { SignalTriggerSource, WatchTriggerSource, type SignalEmitter } from './triggers.js';

// =============================================================================
// Types
// =============================================================================

export interface SnowWebServerConfig {
  /** Installable to build and serve */
  installable: string;
  /** Listen address, e.g. `tcp:[::1]:8080` or `systemd:https` */
  listen?: string | ListenTarget;
  /** Turns the installable into a content root */
  builder: ContentBuilder;
  /** TLS material; plain HTTP when absent */
  tls?: TlsMaterialManager;
  /** Failure responses */
  errorHandler?: ErrorHandler;
  /** Status of a failed remote reload */
  reloadFailureStatus?: number;
  /** Remote reloads allowed per client and minute */
  reloadRateLimit?: number;
  /** Longest wait for in-flight requests on shutdown */
  drainTimeoutMs?: number;
  /**
   * How often certificates from an authority are checked for renewal;
   * false for never
   */
  renewCheckIntervalMs?: number | false;
  /** Paths whose changes rebuild the site */
  watchPaths?: readonly string[];
  /** Where signal handlers are installed; false for none */
  signals?: SignalEmitter | false;
  /** Socket activation environment */
  env?: ActivationEnv;
  /** Logger */
  logger?: Logger;
}

export const DEFAULT_LISTEN_ADDRESS = 'tcp:[::1]:';
export const DEFAULT_DRAIN_TIMEOUT_MS = 30 * 1000;
export const DEFAULT_RENEW_CHECK_INTERVAL_MS = 12 * 60 * 60 * 1000;

// =============================================================================
// SnowWeb Server
// =============================================================================

export class SnowWebServer {
  readonly coordinator: SiteCoordinator;
  readonly handler: SiteHandler;
  readonly triggers = new TriggerQueue();
  private readonly config: SnowWebServerConfig & {
    drainTimeoutMs: number;
    renewCheckIntervalMs: number | false;
    logger: Logger;
  };
  private server?: http.Server | https.Server;
  private boundAddress?: string;
  private stopping?: Promise<void>;
  private draining = false;

  constructor(config: SnowWebServerConfig) {
    this.config = {
      ...config,
      drainTimeoutMs: config.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS,
      renewCheckIntervalMs: config.renewCheckIntervalMs ?? DEFAULT_RENEW_CHECK_INTERVAL_MS,
      logger: config.logger ?? createSilentLogger(),
    };

    const logger = this.config.logger;
    this.coordinator = new SiteCoordinator({
      installable: config.installable,
      builder: config.builder,
      errorHandler: config.errorHandler,
      logger: logger.child('site'),
    });
    this.handler = new SiteHandler({
      coordinator: this.coordinator,
      errorHandler: config.errorHandler,
      reloadFailureStatus: config.reloadFailureStatus,
      reloadRateLimit: config.reloadRateLimit,
      logger: logger.child('api'),
    });
  }

  /**
   * Printable address the server is bound to, once started
   */
  get address(): string | undefined {
    return this.boundAddress;
  }

  /**
   * Load TLS material, build the site and bind the listener. Each step is
   * fatal: the promise rejects with the step's error and nothing is left
   * listening.
   *
   * Certificate authorities validate domains by connecting to this server,
   * so with such a source the listener is bound first.
   */
  async start(): Promise<string> {
    const { tls, logger } = this.config;
    const target = this.resolveTarget();

    if (tls && !tls.source.requiresListener) {
      await tls.init();
    }
    if (!tls?.source.requiresListener) {
      await this.coordinator.rebuild();
    }

    const server = this.createServer();
    this.server = server;
    this.stopping = undefined;
    this.draining = false;
    let address: string;
    try {
      address = await bindListener(server, target);
    } catch (error) {
      this.server = undefined;
      throw error;
    }
    this.boundAddress = address;

    if (tls?.source.requiresListener) {
      try {
        await tls.init();
        await this.coordinator.rebuild();
      } catch (error) {
        await this.stop(0);
        throw error;
      }
    }

    logger.info('server started', { address, tls: tls !== undefined });
    return address;
  }

  /**
   * Serve until a shutdown trigger, reacting to signals, watched files and
   * queued triggers. Certificates from an authority are also reloaded on
   * the renewal interval, which renews them once they near expiry.
   * Resolves once the server has drained.
   */
  async run(): Promise<ReloadLoopResult> {
    const { tls, signals, watchPaths, renewCheckIntervalMs, logger } = this.config;

    const signalSource =
      signals === false ? undefined : new SignalTriggerSource(this.triggers, { emitter: signals, logger });
    const watchSource = new WatchTriggerSource(this.triggers, {
      tlsPaths: tls?.source.watchPaths() ?? [],
      rebuildPaths: watchPaths ?? [],
      logger: logger.child('watch'),
    });

    let renewTimer: NodeJS.Timeout | undefined;
    if (tls?.source.requiresListener && renewCheckIntervalMs !== false) {
      renewTimer = setInterval(() => {
        this.triggers.push({ kind: 'reload-tls', origin: 'timer', detail: 'renewal check' });
      }, renewCheckIntervalMs);
      renewTimer.unref();
      logger.debug('scheduled certificate renewal checks', { interval_ms: renewCheckIntervalMs });
    }

    signalSource?.attach();
    try {
      await watchSource.start();
      const loop = new ReloadLoop({
        queue: this.triggers,
        site: this.coordinator,
        tls,
        onShutdown: () => this.stop(),
        logger,
      });
      return await loop.run();
    } finally {
      clearInterval(renewTimer);
      signalSource?.detach();
      await watchSource.close();
      await this.stop();
    }
  }

  /**
   * Stop accepting connections and wait for in-flight requests, for at
   * most the drain timeout; connections still open then are destroyed.
   */
  stop(drainTimeoutMs: number = this.config.drainTimeoutMs): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.drain(drainTimeoutMs);
    }
    return this.stopping;
  }

  private async drain(drainTimeoutMs: number): Promise<void> {
    const server = this.server;
    if (!server) return;
    const logger = this.config.logger;

    this.draining = true;
    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    server.closeIdleConnections();

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<'expired'>((resolve) => {
      timer = setTimeout(() => resolve('expired'), drainTimeoutMs);
    });

    const outcome = await Promise.race([closed.then(() => 'drained' as const), expired]);
    clearTimeout(timer);

    if (outcome === 'expired') {
      logger.warn('drain timeout reached, closing remaining connections', { timeout_ms: drainTimeoutMs });
      server.closeAllConnections();
      await closed;
    }

    this.server = undefined;
    logger.info('server stopped', { address: this.boundAddress });
  }

  private resolveTarget(): ListenTarget {
    const listen = this.config.listen ?? DEFAULT_LISTEN_ADDRESS;
    const target = typeof listen === 'string' ? parseListenAddress(listen, this.config.env) : listen;
    this.config.logger.debug('resolved listen address', { address: formatListenTarget(target) });
    return target;
  }

  private createServer(): http.Server | https.Server {
    const { tls } = this.config;
    const app = this.handler.app;
    // While draining, connections close once their response is done.
    const listener = (req: http.IncomingMessage, res: http.ServerResponse): void => {
      if (this.draining) {
        res.shouldKeepAlive = false;
      }
      res.on('finish', () => {
        if (this.draining) setImmediate(() => this.server?.closeIdleConnections());
      });
      app(req, res);
    };

    if (!tls) {
      return http.createServer(listener);
    }

    const server = https.createServer(tls.serverOptions(), listener);
    tls.onChange((material) => server.setSecureContext(tls.secureContextOptions(material)));
    return server;
  }
}
