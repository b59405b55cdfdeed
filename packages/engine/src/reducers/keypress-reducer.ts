// ─── Keypress Reducer ──────────────────────────────────────────────
// Owns lastKeyLabel and showLastKey; redraws the top zone. Releases are
// ignored so the last *pressed* key stays on screen, and presses are
// rate limited by the shared KeypressThrottle.

import { formatKeyLabel } from "../decoder/key-label.js";
import type { LabelTables } from "../decoder/label-tables.js";
import type {
  KeyEvent,
  KeyEventForm,
  KeycodeStateChanged,
  PositionStateChanged,
} from "../types/index.js";
import type { StatusWidget } from "../widgets/status-widget.js";
import type { KeypressThrottle, UptimeClock } from "./keypress-throttle.js";
import { StatusReducer } from "./status-reducer.js";

export type KeypressEvent = KeycodeStateChanged | PositionStateChanged;

export interface KeypressReducerOptions {
  /** The one key event form this reducer consumes. */
  readonly form: KeyEventForm;
  readonly tables: LabelTables;
  /** Glyph capacity of the last-key label. */
  readonly capacity: number;
  readonly throttle: KeypressThrottle;
  readonly clock: UptimeClock;
}

const KIND_FOR_FORM = {
  usage: "keycode_state_changed",
  position: "position_state_changed",
} as const satisfies Record<KeyEventForm, KeypressEvent["kind"]>;

export class KeypressReducer extends StatusReducer<KeypressEvent, KeyEvent> {
  readonly name = "keypress";
  readonly kinds: readonly KeypressEvent["kind"][];

  constructor(private readonly options: KeypressReducerOptions) {
    super();
    this.kinds = [KIND_FOR_FORM[options.form]];
  }

  /** There is no "current key": an unpressed event, which update() drops. */
  getCurrentState(): KeyEvent {
    return this.options.form === "usage"
      ? { form: "usage", usagePage: 0, usageId: 0, implicitModifiers: 0, explicitModifiers: 0, pressed: false }
      : { form: "position", position: 0, pressed: false };
  }

  reduce(event: KeypressEvent): KeyEvent {
    switch (event.kind) {
      case "keycode_state_changed":
        return {
          form: "usage",
          usagePage: event.usagePage,
          usageId: event.usageId,
          implicitModifiers: event.implicitModifiers,
          explicitModifiers: event.explicitModifiers,
          pressed: event.pressed,
        };
      case "position_state_changed":
        return { form: "position", position: event.position, pressed: event.pressed };
    }
  }

  /**
   * Drops releases, then asks the throttle once per firing, so every
   * widget sees the same accept/drop decision.
   */
  override update(state: KeyEvent, widgets: Iterable<StatusWidget>): void {
    if (!state.pressed) return;
    if (!this.options.throttle.tryAccept(this.options.clock())) return;
    super.update(state, widgets);
  }

  apply(widget: StatusWidget, state: KeyEvent): void {
    widget.snapshot.lastKeyLabel = formatKeyLabel(state, {
      tables: this.options.tables,
      capacity: this.options.capacity,
    });
    widget.snapshot.showLastKey = true;
    widget.redraw("top");
  }
}
