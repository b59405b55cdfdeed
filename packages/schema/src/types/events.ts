// ─── Domain Events ─────────────────────────────────────────────────
// Typed events delivered one at a time by the event bus. Each reducer
// subscribes to a fixed subset of kinds.

// ─── Key Events ────────────────────────────────────────────────────

/**
 * Rich usage-code key event: HID usage page + usage id, with the
 * implicit and explicit modifier bytes kept as raw bitmasks.
 */
export interface UsageKeyEvent {
  readonly form: "usage";
  readonly usagePage: number;
  readonly usageId: number;
  readonly implicitModifiers: number;
  readonly explicitModifiers: number;
  readonly pressed: boolean;
}

/** Fallback key event carrying only the physical key position. */
export interface PositionKeyEvent {
  readonly form: "position";
  readonly position: number;
  readonly pressed: boolean;
}

/**
 * Input to the key label decoder. Exactly one form is active for a
 * given display, selected by `StatusConfig.keyEventForm`.
 */
export type KeyEvent = UsageKeyEvent | PositionKeyEvent;

export type KeyEventForm = KeyEvent["form"];

// ─── Status Events ─────────────────────────────────────────────────

export interface BatteryStateChanged {
  readonly kind: "battery_state_changed";
  /** Absent when the source reports a change without a level. */
  readonly stateOfCharge?: number;
}

export interface UsbConnStateChanged {
  readonly kind: "usb_conn_state_changed";
  readonly powered: boolean;
}

export interface EndpointChanged {
  readonly kind: "endpoint_changed";
}

export interface BleActiveProfileChanged {
  readonly kind: "ble_active_profile_changed";
  readonly index: number;
}

export interface LayerStateChanged {
  readonly kind: "layer_state_changed";
  readonly layer: number;
  readonly active: boolean;
}

export interface KeycodeStateChanged {
  readonly kind: "keycode_state_changed";
  readonly usagePage: number;
  readonly usageId: number;
  readonly implicitModifiers: number;
  readonly explicitModifiers: number;
  readonly pressed: boolean;
}

export interface PositionStateChanged {
  readonly kind: "position_state_changed";
  readonly position: number;
  readonly pressed: boolean;
}

/** Every event kind the status engine understands, discriminated on `kind`. */
export type StatusEvent =
  | BatteryStateChanged
  | UsbConnStateChanged
  | EndpointChanged
  | BleActiveProfileChanged
  | LayerStateChanged
  | KeycodeStateChanged
  | PositionStateChanged;

export type StatusEventKind = StatusEvent["kind"];

/** Narrows the event union to the member with the given kind. */
export type StatusEventOfKind<K extends StatusEventKind> = Extract<StatusEvent, { kind: K }>;

export const STATUS_EVENT_KINDS = [
  "battery_state_changed",
  "usb_conn_state_changed",
  "endpoint_changed",
  "ble_active_profile_changed",
  "layer_state_changed",
  "keycode_state_changed",
  "position_state_changed",
] as const satisfies readonly StatusEventKind[];
