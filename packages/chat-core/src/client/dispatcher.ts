import EventEmitter from "eventemitter3";
import type { ChatEvent, ChatEventOf, ChatEventType, Logger } from "../types";

/** Event type to payload, plus `*` for every event. */
export type EventMap = { [K in ChatEventType]: ChatEventOf<K> } & { "*": ChatEvent };

export type EventKey = keyof EventMap;

export type EventHandler<K extends EventKey> = (event: EventMap[K]) => void;

type Listener = (event: ChatEvent) => void;

const matches = <K extends EventKey>(key: K, event: ChatEvent): event is EventMap[K] => key === "*" || event.type === key;

/**
 * Handle for one registered handler. Cancelling it removes the handler; the
 * token does not keep the dispatcher alive.
 */
export class SubscriptionToken {
  readonly id: number;
  readonly key: EventKey;
  private readonly dispatcher: WeakRef<Dispatcher>;

  constructor(id: number, key: EventKey, dispatcher: Dispatcher) {
    this.id = id;
    this.key = key;
    this.dispatcher = new WeakRef(dispatcher);
  }

  get active(): boolean {
    return this.dispatcher.deref()?.has(this) ?? false;
  }

  /** Returns false when the handler was already gone. */
  cancel(): boolean {
    return this.dispatcher.deref()?.remove(this) ?? false;
  }
}

/**
 * Per-event-type handler lists. Handlers run synchronously, in registration
 * order, on whatever drives `dispatch` (the client's read loop).
 */
export class Dispatcher {
  private emitter = new EventEmitter<Record<EventKey, [ChatEvent]>>();
  private listeners = new Map<number, { key: EventKey; listener: Listener }>();
  private waiters = new Map<(error: Error) => void, EventKey>();
  private nextId = 0;
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  on<K extends EventKey>(key: K, handler: EventHandler<K>): SubscriptionToken {
    const token = new SubscriptionToken(this.nextId, key, this);
    this.nextId += 1;

    const listener: Listener = (event) => {
      if (!matches(key, event)) return;
      try {
        handler(event);
      } catch (error) {
        this.logger?.(`Handler for "${key}" threw: ${error instanceof Error ? error.message : String(error)}`);
      }
    };

    const eventKey: EventKey = key;
    this.listeners.set(token.id, { key: eventKey, listener });
    this.emitter.on(eventKey, listener);
    return token;
  }

  /** Removal takes effect from the next dispatch; a dispatch already running still sees the handler. */
  remove(token: SubscriptionToken): boolean {
    const entry = this.listeners.get(token.id);
    if (!entry) return false;
    this.listeners.delete(token.id);
    this.emitter.off(entry.key, entry.listener);
    return true;
  }

  /**
   * Resolves with the next event of `key`. Rejects if the subscriptions for
   * `key` are cleared first, which the client does when its run ends.
   */
  waitFor<K extends EventKey>(key: K): Promise<EventMap[K]> {
    return new Promise<EventMap[K]>((resolve, reject) => {
      const eventKey: EventKey = key;
      const token = this.on(key, (event) => {
        this.waiters.delete(reject);
        this.remove(token);
        resolve(event);
      });
      this.waiters.set(reject, eventKey);
    });
  }

  has(token: SubscriptionToken): boolean {
    return this.listeners.has(token.id);
  }

  count(key: EventKey): number {
    return this.emitter.listenerCount(key);
  }

  /**
   * Runs the handlers for `event.type`, then the `*` handlers. A `*` handler
   * runs after every typed handler even when it was registered first.
   */
  dispatch(event: ChatEvent) {
    this.emitter.emit(event.type, event);
    this.emitter.emit("*", event);
  }

  /** Removes the handlers for `key`, or every handler; returns how many were removed. Pending `waitFor` calls reject. */
  clear(key?: EventKey): number {
    let removed = 0;
    for (const [id, entry] of this.listeners) {
      if (key !== undefined && entry.key !== key) continue;
      this.listeners.delete(id);
      this.emitter.off(entry.key, entry.listener);
      removed += 1;
    }

    for (const [reject, waitKey] of this.waiters) {
      if (key !== undefined && waitKey !== key) continue;
      this.waiters.delete(reject);
      reject(new Error(`Subscriptions for "${waitKey}" were cleared.`));
    }
    return removed;
  }
}
