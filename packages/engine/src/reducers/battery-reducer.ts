// ─── Battery Reducer ───────────────────────────────────────────────
// Owns batteryLevel and charging; redraws the top zone.

import type {
  BatteryStateChanged,
  DeviceState,
  UsbConnStateChanged,
} from "../types/index.js";
import type { StatusWidget } from "../widgets/status-widget.js";
import { StatusReducer } from "./status-reducer.js";

export interface BatteryState {
  readonly level: number;
  /** Undefined when charge sensing is off. */
  readonly charging?: boolean;
}

export type BatteryEvent = BatteryStateChanged | UsbConnStateChanged;

export interface BatteryReducerOptions {
  /** USB device stack present: sense charging and follow USB events. */
  readonly usbDeviceStack: boolean;
}

function clampPercent(level: number): number {
  if (!Number.isFinite(level)) return 0;
  return Math.min(100, Math.max(0, Math.round(level)));
}

export class BatteryReducer extends StatusReducer<BatteryEvent, BatteryState> {
  readonly name = "battery";
  readonly kinds: readonly BatteryEvent["kind"][];

  constructor(
    private readonly device: DeviceState,
    private readonly options: BatteryReducerOptions
  ) {
    super();
    this.kinds = options.usbDeviceStack
      ? ["battery_state_changed", "usb_conn_state_changed"]
      : ["battery_state_changed"];
  }

  getCurrentState(): BatteryState {
    return this.withCharging(this.device.currentBatteryPercent());
  }

  reduce(event: BatteryEvent): BatteryState {
    // Only a battery event can carry a level; anything else re-reads it.
    const level =
      (event.kind === "battery_state_changed" ? event.stateOfCharge : undefined) ??
      this.device.currentBatteryPercent();
    return this.withCharging(level);
  }

  apply(widget: StatusWidget, state: BatteryState): void {
    if (state.charging !== undefined) {
      widget.snapshot.charging = state.charging;
    }
    widget.snapshot.batteryLevel = state.level;
    widget.redraw("top");
  }

  private withCharging(level: number): BatteryState {
    const clamped = clampPercent(level);
    if (!this.options.usbDeviceStack) return { level: clamped };
    return { level: clamped, charging: this.device.isUsbPowered() };
  }
}
