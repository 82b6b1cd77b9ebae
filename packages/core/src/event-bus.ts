/**
 * @module event-bus
 * Type-safe pub/sub event emitter.
 *
 * A composer publishes layer and render notifications here; subscribers
 * never hold a reference back into the composition.
 *
 * @see {@link @eink-composer/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@eink-composer/types';

/** Callback shape the bus stores internally. */
type Callback = (...args: unknown[]) => void;

/** One subscription. `original` is what the caller passed to `on`/`once`. */
interface Subscription {
  original: unknown;
  invoke: Callback;
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Subscriptions are kept per event in subscription order. A `once`
 * subscription removes itself before its callback runs, and can be removed
 * early through `off` with the callback the caller supplied.
 */
export class EventBusImpl implements EventBus {
  private subscriptions = new Map<keyof EventMap, Subscription[]>();

  /** @inheritdoc */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    const fn = callback as Callback;
    this.add(event, { original: fn, invoke: fn });
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    const fn = callback as Callback;
    this.add(event, {
      original: fn,
      invoke: (...args) => {
        this.off(event, callback);
        fn(...args);
      },
    });
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void {
    const list = this.subscriptions.get(event);
    if (!list) return;
    const index = list.findIndex((sub) => sub.original === callback);
    if (index === -1) return;
    list.splice(index, 1);
    if (list.length === 0) {
      this.subscriptions.delete(event);
    }
  }

  /** @inheritdoc */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void {
    const list = this.subscriptions.get(event);
    if (!list) return;
    // Snapshot: listeners may unsubscribe while we iterate.
    for (const sub of [...list]) {
      sub.invoke(...args);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.subscriptions.clear();
  }

  /** Number of live subscriptions for an event. */
  listenerCount(event: keyof EventMap): number {
    return this.subscriptions.get(event)?.length ?? 0;
  }

  private add(event: keyof EventMap, subscription: Subscription): void {
    const list = this.subscriptions.get(event);
    if (list) {
      list.push(subscription);
    } else {
      this.subscriptions.set(event, [subscription]);
    }
  }
}
