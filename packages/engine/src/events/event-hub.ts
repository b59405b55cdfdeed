// ─── Status Event Hub ──────────────────────────────────────────────
// Minimal in-process event source: per-kind listener sets, delivered
// synchronously in subscription order.

import type { StatusEvent, StatusEventKind, StatusEventOfKind } from "../types/index.js";

export type StatusEventListener<K extends StatusEventKind> = (event: StatusEventOfKind<K>) => void;

/** Anything a display can subscribe to: a firmware bus bridge, a replay, a test. */
export interface StatusEventSource {
  /** Registers a listener for one kind. Returns an unsubscribe function. */
  subscribe<K extends StatusEventKind>(kind: K, listener: StatusEventListener<K>): () => void;
}

export interface StatusEventHub extends StatusEventSource {
  emit(event: StatusEvent): void;
  listenerCount(kind: StatusEventKind): number;
}

export function isEventOfKind<K extends StatusEventKind>(
  event: StatusEvent,
  kind: K
): event is StatusEventOfKind<K> {
  return event.kind === kind;
}

export function createStatusEventHub(): StatusEventHub {
  const listeners = new Map<StatusEventKind, Set<(event: StatusEvent) => void>>();

  return Object.freeze({
    subscribe<K extends StatusEventKind>(kind: K, listener: StatusEventListener<K>) {
      const deliver = (event: StatusEvent) => {
        if (isEventOfKind(event, kind)) listener(event);
      };
      let set = listeners.get(kind);
      if (!set) {
        set = new Set();
        listeners.set(kind, set);
      }
      set.add(deliver);
      return () => {
        listeners.get(kind)?.delete(deliver);
      };
    },
    emit(event: StatusEvent) {
      const set = listeners.get(event.kind);
      if (!set) return;
      // Listeners added during delivery wait for the next emit.
      for (const deliver of [...set]) deliver(event);
    },
    listenerCount(kind: StatusEventKind) {
      return listeners.get(kind)?.size ?? 0;
    },
  });
}
