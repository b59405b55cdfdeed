// ─── Endpoint Reducer ──────────────────────────────────────────────
// Owns the selected endpoint and the active BLE profile's state.
// Redraws the top zone (output glyph) and the middle zone (slots).

import {
  PROFILE_SLOT_COUNT,
  type BleActiveProfileChanged,
  type DeviceState,
  type EndpointChanged,
  type EndpointInstance,
  type UsbConnStateChanged,
} from "../types/index.js";
import type { StatusWidget } from "../widgets/status-widget.js";
import { StatusReducer } from "./status-reducer.js";

export interface EndpointState {
  readonly selectedEndpoint: EndpointInstance;
  readonly activeProfileIndex: number;
  readonly activeProfileConnected: boolean;
  readonly activeProfileBonded: boolean;
}

export type EndpointEvent = EndpointChanged | UsbConnStateChanged | BleActiveProfileChanged;

export interface EndpointReducerOptions {
  readonly usbDeviceStack: boolean;
  readonly ble: boolean;
}

export class EndpointReducer extends StatusReducer<EndpointEvent, EndpointState> {
  readonly name = "endpoint";
  readonly kinds: readonly EndpointEvent["kind"][];

  private readonly reportedIndices = new Set<number>();

  constructor(
    private readonly device: DeviceState,
    options: EndpointReducerOptions
  ) {
    super();
    const kinds: EndpointEvent["kind"][] = ["endpoint_changed"];
    if (options.usbDeviceStack) kinds.push("usb_conn_state_changed");
    if (options.ble) kinds.push("ble_active_profile_changed");
    this.kinds = kinds;
  }

  getCurrentState(): EndpointState {
    const profileIndex = this.device.activeProfileIndex();
    this.checkProfileIndex(profileIndex);

    const selectedEndpoint: EndpointInstance =
      this.device.selectedTransport() === "ble"
        ? { transport: "ble", profileIndex }
        : { transport: "usb" };

    return {
      selectedEndpoint,
      activeProfileIndex: profileIndex,
      activeProfileConnected: this.device.isProfileConnected(),
      activeProfileBonded: !this.device.isProfileOpenUnbonded(),
    };
  }

  /** Payloads are not trusted; the getters are the source of truth. */
  reduce(_event: EndpointEvent): EndpointState {
    return this.getCurrentState();
  }

  apply(widget: StatusWidget, state: EndpointState): void {
    widget.snapshot.selectedEndpoint = state.selectedEndpoint;
    widget.snapshot.activeProfileIndex = state.activeProfileIndex;
    widget.snapshot.activeProfileConnected = state.activeProfileConnected;
    widget.snapshot.activeProfileBonded = state.activeProfileBonded;

    widget.redraw("top");
    widget.redraw("middle");
  }

  private checkProfileIndex(index: number): void {
    if (Number.isInteger(index) && index >= 0 && index < PROFILE_SLOT_COUNT) return;
    if (this.reportedIndices.has(index)) return;
    this.reportedIndices.add(index);
    console.warn(
      `[EndpointReducer] Active profile index ${index} is outside 0..${PROFILE_SLOT_COUNT - 1}; no slot will be selected.`
    );
  }
}
