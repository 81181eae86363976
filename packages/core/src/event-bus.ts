/**
 * @module event-bus
 * Type-safe pub/sub event emitter.
 *
 * Devices and dispatchers publish what they did here instead of calling
 * loggers or outer surfaces directly.
 *
 * @see {@link @switchboard/types#EventBus} for the interface contract
 * @see {@link @switchboard/types#EventMap} for the event catalogue
 */

import type { EventArgs, EventBus, EventCallback, EventMap } from '@switchboard/types';

/** Generic callback type used internally by the event bus. */
type Callback = (...args: unknown[]) => void;

/** A registered listener and whether it fires only once. */
interface Subscription {
  callback: Callback;
  once: boolean;
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Listeners are kept per event in subscription order. A `once` listener is
 * stored with a flag rather than a wrapper. `off` removes the earliest
 * subscription for a callback; emission and the unsubscribe functions
 * returned by `on`/`once` remove the exact subscription they belong to.
 */
export class EventBusImpl implements EventBus {
  /** Registered subscriptions keyed by event name. */
  private subscriptions = new Map<keyof EventMap, Subscription[]>();

  /** @inheritdoc */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    return this.subscribe(event, callback as Callback, false);
  }

  /** @inheritdoc */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    return this.subscribe(event, callback as Callback, true);
  }

  /** @inheritdoc */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void {
    const target = callback as Callback;
    const sub = this.subscriptions.get(event)?.find((s) => s.callback === target);
    if (sub) {
      this.remove(event, sub);
    }
  }

  /** @inheritdoc */
  emit<K extends keyof EventMap>(event: K, ...args: EventArgs<K>): void {
    const list = this.subscriptions.get(event);
    if (!list) return;

    // Snapshot: listeners added during emission wait for the next emit.
    for (const sub of [...list]) {
      if (sub.once) {
        this.remove(event, sub);
      }
      sub.callback(...args);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.subscriptions.clear();
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private subscribe(event: keyof EventMap, callback: Callback, once: boolean): () => void {
    let list = this.subscriptions.get(event);
    if (!list) {
      list = [];
      this.subscriptions.set(event, list);
    }
    const sub: Subscription = { callback, once };
    list.push(sub);
    return () => this.remove(event, sub);
  }

  /** Remove `sub` if still registered; drop the list once empty. */
  private remove(event: keyof EventMap, sub: Subscription): void {
    const list = this.subscriptions.get(event);
    if (!list) return;

    const index = list.indexOf(sub);
    if (index === -1) return;

    list.splice(index, 1);
    if (list.length === 0) {
      this.subscriptions.delete(event);
    }
  }
}
