/**
 * Reload Event Loop
 *
 * Takes triggers off the queue one at a time and acts on them. Failed
 * rebuilds and TLS reloads are logged and the loop goes on serving what it
 * had; a broken filesystem watch ends the loop.
 */

import { WatchError, createSilentLogger, describeError, type Logger, type TriggerQueue } from '@snowweb/core';

export interface Rebuilder {
  rebuild(): Promise<unknown>;
}

export interface TlsReloader {
  reload(): Promise<unknown>;
}

export interface ReloadLoopOptions {
  queue: TriggerQueue;
  site: Rebuilder;
  tls?: TlsReloader;
  /** Called with the signal on shutdown, before the loop returns */
  onShutdown?: (signal: NodeJS.Signals) => Promise<void>;
  logger?: Logger;
}

export type ReloadLoopResult =
  | { reason: 'shutdown'; signal: NodeJS.Signals }
  | { reason: 'closed' };

export class ReloadLoop {
  private readonly logger: Logger;

  constructor(private readonly options: ReloadLoopOptions) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Process triggers until shutdown or until the queue is closed.
   * Rejects with a WatchError when a watcher fails.
   */
  async run(): Promise<ReloadLoopResult> {
    const { queue, site, tls, onShutdown } = this.options;

    for await (const trigger of queue) {
      switch (trigger.kind) {
        case 'shutdown':
          this.logger.info('shutting down', { signal: trigger.signal });
          queue.close();
          await onShutdown?.(trigger.signal);
          return { reason: 'shutdown', signal: trigger.signal };

        case 'rebuild':
          this.logger.info('reloading', { origin: trigger.origin, detail: trigger.detail });
          try {
            await site.rebuild();
          } catch (error) {
            this.logger.warn('rebuild failed, still serving the previous build', { error: describeError(error) });
          }
          break;

        case 'reload-tls':
          if (!tls) {
            this.logger.debug('ignoring TLS reload, TLS is disabled', { origin: trigger.origin });
            break;
          }
          this.logger.info('reloading TLS certificate', { origin: trigger.origin, detail: trigger.detail });
          try {
            await tls.reload();
          } catch (error) {
            this.logger.warn('TLS reload failed, keeping the current certificate', { error: describeError(error) });
          }
          break;

        case 'watch-error':
          queue.close();
          throw new WatchError('watching files for changes', { cause: trigger.error });
      }
    }

    return { reason: 'closed' };
  }
}
