// ─── Status Reducer ────────────────────────────────────────────────
// Common shape of the four reducers. An event (or, at registration, no
// event) becomes a typed partial state, which is then written into
// every registered widget's snapshot.

import type { StatusEvent, StatusEventKind } from "../types/index.js";
import type { StatusWidget } from "../widgets/status-widget.js";

/**
 * Type-erased view of a reducer, so the display can hold reducers with
 * different event and state types in one list.
 */
export interface StatusEventHandler {
  readonly name: string;
  readonly kinds: readonly StatusEventKind[];
  /** Runs the reducer for `event`, or from current device state when null. */
  handleEvent(event: StatusEvent | null, widgets: Iterable<StatusWidget>): void;
}

export abstract class StatusReducer<TEvent extends StatusEvent, TState>
  implements StatusEventHandler
{
  abstract readonly name: string;
  abstract readonly kinds: readonly TEvent["kind"][];

  /** Reads the device getters; used when there is no event. */
  abstract getCurrentState(): TState;

  /** Decodes a domain event into the reducer's state shape. */
  abstract reduce(event: TEvent): TState;

  /** Writes the owned snapshot fields and redraws the owned zones. */
  abstract apply(widget: StatusWidget, state: TState): void;

  accepts(event: StatusEvent): event is TEvent {
    return this.kinds.some((kind) => kind === event.kind);
  }

  handle(event: TEvent | null, widgets: Iterable<StatusWidget>): void {
    const state = event === null ? this.getCurrentState() : this.reduce(event);
    this.update(state, widgets);
  }

  /** Applies `state` to each widget, in registration order. */
  update(state: TState, widgets: Iterable<StatusWidget>): void {
    for (const widget of widgets) {
      this.apply(widget, state);
    }
  }

  handleEvent(event: StatusEvent | null, widgets: Iterable<StatusWidget>): void {
    if (event === null) {
      this.handle(null, widgets);
    } else if (this.accepts(event)) {
      this.handle(event, widgets);
    }
  }
}
