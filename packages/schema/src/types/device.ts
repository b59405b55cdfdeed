// ─── Device State ──────────────────────────────────────────────────
// Synchronous getters the reducers query for current values. Backed by
// the firmware's battery, USB, BLE and keymap services.

export type Transport = "usb" | "ble";

/** The currently selected output endpoint. BLE carries its profile slot. */
export type EndpointInstance =
  | { readonly transport: "usb" }
  | { readonly transport: "ble"; readonly profileIndex: number };

export interface ActiveLayer {
  readonly index: number;
  /** Display name from the keymap, or null when the layer has none. */
  readonly name: string | null;
}

/**
 * Read-only view of device state. Every call is non-blocking and has no
 * side effects from the engine's point of view.
 */
export interface DeviceState {
  currentBatteryPercent(): number;
  isUsbPowered(): boolean;
  selectedTransport(): Transport;
  activeProfileIndex(): number;
  isProfileConnected(): boolean;
  /** True when the active profile is open, i.e. has no bond. */
  isProfileOpenUnbonded(): boolean;
  highestActiveLayer(): ActiveLayer;
}
