// =============================================================================
// MemoryEventBus — Typed lifecycle events for operators and tests
// =============================================================================

import {
  MemoryEventTypeSchema,
  type MemoryEvent,
  type MemoryEventPayloads,
  type MemoryEventType,
} from "../domain/events.schema.js";

export type MemoryEventHandler<K extends MemoryEventType> = (event: MemoryEvent<K>) => void;
export type WildcardEventHandler = (event: MemoryEvent) => void;

type ListenerTable = { [K in MemoryEventType]?: Set<MemoryEventHandler<K>> };

export interface EventBusOptions {
  /** Maximum listeners allowed per event type (default: 100). */
  maxListenersPerEvent?: number;
  /** Called when a listener throws (default: console.error). The emitter carries on. */
  onListenerError?: (error: unknown, event: MemoryEvent) => void;
}

/**
 * Event bus for memory lifecycle events.
 * Supports typed subscriptions, wildcard listeners and auto-filled timestamps.
 */
export class MemoryEventBus {
  private readonly listeners: ListenerTable = {};
  private readonly wildcard = new Set<WildcardEventHandler>();
  private readonly maxListenersPerEvent: number;
  private readonly onListenerError: (error: unknown, event: MemoryEvent) => void;

  constructor(options?: EventBusOptions) {
    this.maxListenersPerEvent = options?.maxListenersPerEvent ?? 100;
    this.onListenerError = options?.onListenerError ?? reportListenerError;
  }

  /** Subscribe to a specific event type. Returns unsubscribe fn. */
  on<K extends MemoryEventType>(eventType: K, handler: MemoryEventHandler<K>): () => void {
    const existing: Set<MemoryEventHandler<K>> | undefined = this.listeners[eventType];
    const set = existing ?? new Set<MemoryEventHandler<K>>();
    if (set.size >= this.maxListenersPerEvent) {
      throw new Error(
        `MemoryEventBus: max listeners (${this.maxListenersPerEvent}) reached for "${eventType}"`,
      );
    }
    set.add(handler);
    const table: { [P in K]?: Set<MemoryEventHandler<P>> } = this.listeners;
    if (!existing) table[eventType] = set;
    return () => {
      set.delete(handler);
    };
  }

  /** Subscribe to every event. Returns unsubscribe fn. */
  onAny(handler: WildcardEventHandler): () => void {
    if (this.wildcard.size >= this.maxListenersPerEvent) {
      throw new Error(
        `MemoryEventBus: max listeners (${this.maxListenersPerEvent}) reached for "*"`,
      );
    }
    this.wildcard.add(handler);
    return () => {
      this.wildcard.delete(handler);
    };
  }

  /** Emit an event, auto-filling the timestamp. */
  emit<K extends MemoryEventType>(type: K, data: MemoryEventPayloads[K]): void {
    const event: MemoryEvent<K> = { type, timestamp: Date.now(), data };
    const specific: Set<MemoryEventHandler<K>> | undefined = this.listeners[type];
    if (specific) {
      for (const handler of [...specific]) this.invoke(() => handler(event), event);
    }
    for (const handler of [...this.wildcard]) this.invoke(() => handler(event), event);
  }

  /** Resolve with the next event of the given type. */
  once<K extends MemoryEventType>(eventType: K): Promise<MemoryEvent<K>> {
    return new Promise((resolve) => {
      const off = this.on(eventType, (event) => {
        off();
        resolve(event);
      });
    });
  }

  listenerCount(eventType: MemoryEventType | "*"): number {
    if (eventType === "*") return this.wildcard.size;
    return this.listeners[eventType]?.size ?? 0;
  }

  removeAllListeners(): void {
    for (const type of MemoryEventTypeSchema.options) {
      delete this.listeners[type];
    }
    this.wildcard.clear();
  }

  private invoke(call: () => void, event: MemoryEvent): void {
    try {
      call();
    } catch (error) {
      this.onListenerError(error, event);
    }
  }
}

function reportListenerError(error: unknown, event: MemoryEvent): void {
  // eslint-disable-next-line no-console
  console.error(`MemoryEventBus: listener for "${event.type}" threw`, error);
}
