/**
 * infiniview - Event Emitter
 * Typed listener registry shared by the scroller and the pager.
 */

import type { EventHandler, Unsubscribe, EventMap } from "../types";

// =============================================================================
// Types
// =============================================================================

type Listeners<T extends EventMap> = {
  [E in keyof T]?: Set<EventHandler<T[E]>>;
};

export interface Emitter<T extends EventMap> {
  /** Subscribe; the returned function unsubscribes */
  on<E extends keyof T>(event: E, handler: EventHandler<T[E]>): Unsubscribe;
  off<E extends keyof T>(event: E, handler: EventHandler<T[E]>): void;

  /** Deliver payload to every listener of event, in subscription order */
  emit<E extends keyof T>(event: E, payload: T[E]): void;

  /** Drop every listener */
  clear(): void;
}

// =============================================================================
// Factory
// =============================================================================

export const createEmitter = <T extends EventMap>(): Emitter<T> => {
  let listeners: Listeners<T> = {};

  const handlersOf = <E extends keyof T>(event: E): Set<EventHandler<T[E]>> => {
    let handlers = listeners[event];
    if (!handlers) {
      handlers = new Set();
      listeners[event] = handlers;
    }
    return handlers;
  };

  const off = <E extends keyof T>(event: E, handler: EventHandler<T[E]>): void => {
    const handlers = listeners[event];
    if (!handlers) return;
    handlers.delete(handler);
    if (handlers.size === 0) delete listeners[event];
  };

  const on = <E extends keyof T>(event: E, handler: EventHandler<T[E]>): Unsubscribe => {
    handlersOf(event).add(handler);
    return () => off(event, handler);
  };

  const emit = <E extends keyof T>(event: E, payload: T[E]): void => {
    const handlers = listeners[event];
    if (!handlers) return;

    // Snapshot: a listener may unsubscribe itself while we iterate
    for (const handler of Array.from(handlers)) {
      try {
        handler(payload);
      } catch (error) {
        console.error(
          `[infiniview] Error in event handler for "${String(event)}":`,
          error,
        );
      }
    }
  };

  return {
    on,
    off,
    emit,
    clear: () => {
      listeners = {};
    },
  };
};
