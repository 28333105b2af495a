/**
 * Combat - Event Bus
 *
 * Synchronous, in-order fan-out of combat events to subscribers.
 */

import type { CombatEvent, EventSink } from "../types/events";

export type CombatEventListener = (event: CombatEvent) => void;

export class CombatEventBus implements EventSink {
  private readonly listeners = new Set<CombatEventListener>();

  /** Returns an unsubscribe function. */
  subscribe(listener: CombatEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: CombatEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  emitAll(events: readonly CombatEvent[]): void {
    for (const event of events) {
      this.emit(event);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
