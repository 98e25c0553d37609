/**
 * Ordered fan-out of accepted records.
 *
 * Records are delivered one at a time, to every subscriber, in the order
 * they were published. A publish that happens while a delivery is running
 * (a handler publishing, or a second file's read finishing in the same
 * turn) is queued behind it instead of interleaving.
 *
 * @module watchers/eventBus
 */

import { SubscriberError, toError } from '../errors';
import type { Logger } from '../logger';

export type Unsubscribe = () => void;

interface Subscription<T> {
  handler: (value: T) => void;
  active: boolean;
}

export class EventBus<T> {
  private subscriptions: Subscription<T>[] = [];
  private errorSubscriptions: Subscription<Error>[] = [];
  private readonly queue: T[] = [];
  private draining = false;
  private disposed = false;

  constructor(private readonly logger?: Logger) {}

  get subscriberCount(): number {
    return this.subscriptions.length;
  }

  subscribe(handler: (value: T) => void): Unsubscribe {
    if (this.disposed) return () => {};
    const sub: Subscription<T> = { handler, active: true };
    this.subscriptions = [...this.subscriptions, sub];
    return () => {
      if (!sub.active) return;
      sub.active = false;
      this.subscriptions = this.subscriptions.filter(s => s !== sub);
    };
  }

  onError(handler: (error: Error) => void): Unsubscribe {
    if (this.disposed) return () => {};
    const sub: Subscription<Error> = { handler, active: true };
    this.errorSubscriptions = [...this.errorSubscriptions, sub];
    return () => {
      if (!sub.active) return;
      sub.active = false;
      this.errorSubscriptions = this.errorSubscriptions.filter(s => s !== sub);
    };
  }

  publish(value: T): void {
    if (this.disposed) return;
    this.queue.push(value);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        this.deliver(next);
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  /** Reports a non-fatal error to error subscribers. Never throws. */
  reportError(error: Error): void {
    if (this.disposed) return;
    if (this.errorSubscriptions.length === 0) {
      this.logger?.debug({ err: error }, 'Unobserved monitor error');
      return;
    }
    for (const sub of [...this.errorSubscriptions]) {
      if (!sub.active) continue;
      try {
        sub.handler(error);
      } catch (handlerError) {
        this.logger?.warn({ err: toError(handlerError) }, 'Error handler threw');
      }
    }
  }

  dispose(): void {
    this.disposed = true;
    for (const sub of this.subscriptions) sub.active = false;
    for (const sub of this.errorSubscriptions) sub.active = false;
    this.subscriptions = [];
    this.errorSubscriptions = [];
    this.queue.length = 0;
  }

  private deliver(value: T): void {
    // Snapshot: subscribers added mid-delivery start with the next record
    for (const sub of [...this.subscriptions]) {
      if (!sub.active) continue;
      try {
        sub.handler(value);
      } catch (error) {
        this.reportError(new SubscriberError(error));
      }
    }
  }
}
