/**
 * Trigger queue
 *
 * Single-consumer queue of reload triggers. Producers (signal handlers,
 * filesystem watchers) push without waiting; the reload loop takes one
 * trigger at a time through async iteration.
 */

import type { ReloadTrigger } from './types.js';

function isCoalescing(trigger: ReloadTrigger): boolean {
  return trigger.kind === 'rebuild' || trigger.kind === 'reload-tls';
}

export class TriggerQueue implements AsyncIterable<ReloadTrigger> {
  private readonly buffer: ReloadTrigger[] = [];
  private readonly waiters: Array<(result: IteratorResult<ReloadTrigger, undefined>) => void> = [];
  private closed = false;

  /**
   * Enqueue a trigger. Returns false when the queue is already closed.
   *
   * A rebuild or TLS reload that is already waiting in the buffer covers
   * a second one of the same kind, which is dropped.
   */
  push(trigger: ReloadTrigger): boolean {
    if (this.closed) return false;
    if (isCoalescing(trigger) && this.buffer.some((queued) => queued.kind === trigger.kind)) {
      return true;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: trigger });
    } else {
      this.buffer.push(trigger);
    }
    return true;
  }

  /**
   * Stop accepting triggers. Buffered triggers are still delivered,
   * then iteration ends.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<ReloadTrigger, undefined>> {
    const trigger = this.buffer.shift();
    if (trigger) {
      return Promise.resolve({ done: false, value: trigger });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<ReloadTrigger, undefined> {
    return { next: () => this.next() };
  }
}
