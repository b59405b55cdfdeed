// ─── Status Snapshot & Zones ───────────────────────────────────────
// Per-widget render state plus the finished zone values handed to the
// renderer. The snapshot is mutated in place by reducer callbacks.

import type { EndpointInstance } from "./device.js";

// ─── Snapshot ──────────────────────────────────────────────────────

/**
 * Everything one widget displays. Each field is written by exactly one
 * reducer; rendering reads the whole object.
 */
export interface StatusSnapshot {
  batteryLevel: number;
  /** Only present when charge-source sensing is enabled. */
  charging?: boolean;
  selectedEndpoint: EndpointInstance;
  activeProfileIndex: number;
  activeProfileConnected: boolean;
  activeProfileBonded: boolean;
  layerIndex: number;
  layerLabel: string | null;
  lastKeyLabel: string;
  showLastKey: boolean;
}

/** Number of BLE profile slots drawn in the middle zone. */
export const PROFILE_SLOT_COUNT = 5;

// ─── Zones ─────────────────────────────────────────────────────────

export type ZoneName = "top" | "middle" | "bottom";

/**
 * What the top zone shows for the output endpoint.
 * `ble_open` is an unbonded profile waiting for pairing.
 */
export type OutputGlyph = "usb" | "ble_connected" | "ble_disconnected" | "ble_open";

export interface TopZoneState {
  readonly zone: "top";
  readonly batteryLevel: number;
  readonly charging: boolean | null;
  readonly output: OutputGlyph;
  /** Null until the first key press has been shown. */
  readonly lastKey: string | null;
}

export interface ProfileSlot {
  /** 1-based number printed in the slot. */
  readonly number: number;
  readonly selected: boolean;
}

export interface MiddleZoneState {
  readonly zone: "middle";
  readonly slots: readonly ProfileSlot[];
}

export interface BottomZoneState {
  readonly zone: "bottom";
  readonly text: string;
}

/** A finished zone value, discriminated on `zone`. */
export type ZoneState = TopZoneState | MiddleZoneState | BottomZoneState;

// ─── Layout ────────────────────────────────────────────────────────

export interface ZonePlacement {
  readonly x: number;
  readonly y: number;
  readonly size: number;
}

export interface WidgetLayout {
  readonly width: number;
  readonly height: number;
  readonly zones: Readonly<Record<ZoneName, ZonePlacement>>;
}

// ─── Renderer ──────────────────────────────────────────────────────

/**
 * Consumes finished zone values and draws them. Assumed idempotent;
 * nothing it does feeds back into the snapshot.
 */
export interface StatusRenderer {
  render(zone: ZoneState): void;
}
