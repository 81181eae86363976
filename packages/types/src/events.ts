/**
 * @module events
 * Type-safe event bus definitions.
 * Devices and dispatchers report what they did through the EventBus so that
 * loggers and outer surfaces stay decoupled from the core.
 */

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired whenever a device effect is applied. */
  'device:changed': { label: string; isOn: boolean };
  /** Fired when a dispatcher's current action is replaced. */
  'action:selected': { name: string };
  /** Fired after an action ran and was appended to history. */
  'history:pushed': { name: string; size: number };
  /** Fired when a full history drops its oldest entry. */
  'history:evicted': { name: string };
  /** Fired after the newest entry was removed and reverted. */
  'history:undone': { name: string; size: number };
  /** Fired when history is emptied without reverting anything. */
  'history:cleared': undefined;
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/** Argument tuple accepted by {@link EventBus.emit} for an event. */
export type EventArgs<K extends keyof EventMap> = EventMap[K] extends undefined
  ? []
  : [EventMap[K]];

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof EventMap>(event: K, ...args: EventArgs<K>): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
