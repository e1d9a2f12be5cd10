/**
 * Reload trigger sources
 *
 * Producers feeding the reload loop's queue: process signals and
 * filesystem watches.
 */

import chokidar, { type FSWatcher } from 'chokidar';
import { createSilentLogger, type Logger, type ReloadTrigger, type TriggerQueue } from '@snowweb/core';

// =============================================================================
// Signals
// =============================================================================

export type SignalTriggerKind = Exclude<ReloadTrigger['kind'], 'watch-error'>;

/** Triggers raised by each handled signal, in order */
export const SIGNAL_TRIGGERS: Readonly<Partial<Record<NodeJS.Signals, readonly SignalTriggerKind[]>>> = {
  SIGINT: ['shutdown'],
  SIGTERM: ['shutdown'],
  SIGHUP: ['rebuild', 'reload-tls'],
  SIGUSR1: ['rebuild'],
  SIGUSR2: ['reload-tls'],
};

/** What signal handlers are installed on; `process` in production */
export interface SignalEmitter {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export class SignalTriggerSource {
  private readonly emitter: SignalEmitter;
  private readonly logger: Logger;
  private attached = false;

  constructor(
    private readonly queue: TriggerQueue,
    options: { emitter?: SignalEmitter; logger?: Logger } = {}
  ) {
    this.emitter = options.emitter ?? process;
    this.logger = options.logger ?? createSilentLogger();
  }

  attach(): void {
    if (this.attached) return;
    this.attached = true;
    for (const signal of signalNames()) {
      this.emitter.on(signal, this.onSignal);
    }
  }

  detach(): void {
    if (!this.attached) return;
    this.attached = false;
    for (const signal of signalNames()) {
      this.emitter.off(signal, this.onSignal);
    }
  }

  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.logger.info('received signal', { signal });
    for (const kind of SIGNAL_TRIGGERS[signal] ?? []) {
      this.queue.push(signalTrigger(kind, signal));
    }
  };
}

function signalNames(): NodeJS.Signals[] {
  return ['SIGINT', 'SIGTERM', 'SIGHUP', 'SIGUSR1', 'SIGUSR2'];
}

function signalTrigger(kind: SignalTriggerKind, signal: NodeJS.Signals): ReloadTrigger {
  return kind === 'shutdown' ? { kind, signal } : { kind, origin: 'signal', detail: signal };
}

// =============================================================================
// Filesystem watches
// =============================================================================

export interface WatchTriggerSourceOptions {
  /** Files whose changes reload the TLS material */
  tlsPaths?: readonly string[];
  /** Files or directories whose changes rebuild the site */
  rebuildPaths?: readonly string[];
  /** How long a file must stay unchanged before it counts as written */
  stabilityThresholdMs?: number;
  /** Logger */
  logger?: Logger;
}

export class WatchTriggerSource {
  private readonly watchers: FSWatcher[] = [];
  private readonly config: Required<WatchTriggerSourceOptions>;

  constructor(
    private readonly queue: TriggerQueue,
    options: WatchTriggerSourceOptions = {}
  ) {
    this.config = {
      tlsPaths: options.tlsPaths ?? [],
      rebuildPaths: options.rebuildPaths ?? [],
      stabilityThresholdMs: options.stabilityThresholdMs ?? 200,
      logger: options.logger ?? createSilentLogger(),
    };
  }

  get watching(): boolean {
    return this.watchers.length > 0;
  }

  /**
   * Start watching; resolves once the initial scan is done.
   */
  async start(): Promise<void> {
    const ready: Promise<void>[] = [];
    if (this.config.tlsPaths.length > 0) {
      ready.push(this.watch(this.config.tlsPaths, 'reload-tls', ['add', 'change']));
    }
    if (this.config.rebuildPaths.length > 0) {
      ready.push(this.watch(this.config.rebuildPaths, 'rebuild', ['add', 'change', 'unlink']));
    }
    await Promise.all(ready);
  }

  async close(): Promise<void> {
    await Promise.all(this.watchers.splice(0).map((watcher) => watcher.close()));
  }

  private watch(
    paths: readonly string[],
    kind: 'rebuild' | 'reload-tls',
    events: readonly ('add' | 'change' | 'unlink')[]
  ): Promise<void> {
    const watcher = chokidar.watch([...paths], {
      ignoreInitial: true,
      awaitWriteFinish: { stabilityThreshold: this.config.stabilityThresholdMs, pollInterval: 50 },
    });
    this.watchers.push(watcher);

    for (const event of events) {
      watcher.on(event, (changed: string) => {
        this.config.logger.debug('watched file changed', { event, path: changed, trigger: kind });
        this.queue.push({ kind, origin: 'watch', detail: changed });
      });
    }
    watcher.on('error', (error: unknown) => {
      this.queue.push({ kind: 'watch-error', error });
    });

    this.config.logger.debug('watching files', { paths: paths.join(','), trigger: kind });
    return new Promise((resolve) => watcher.once('ready', () => resolve()));
  }
}
