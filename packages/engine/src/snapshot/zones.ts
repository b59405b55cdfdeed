// ─── Zone Derivation ───────────────────────────────────────────────
// Builds the finished per-zone values the renderer consumes. Reads the
// snapshot only; nothing here writes back.

import {
  PROFILE_SLOT_COUNT,
  type BottomZoneState,
  type MiddleZoneState,
  type OutputGlyph,
  type ProfileSlot,
  type StatusSnapshot,
  type TopZoneState,
  type WidgetLayout,
  type ZoneName,
  type ZoneState,
} from "../types/index.js";

// ─── Top ───────────────────────────────────────────────────────────

/**
 * Picks the output glyph. BLE distinguishes a bonded, connected profile
 * from a bonded one that is out of range, and from an open profile.
 */
export function deriveOutputGlyph(snapshot: StatusSnapshot): OutputGlyph {
  switch (snapshot.selectedEndpoint.transport) {
    case "usb":
      return "usb";
    case "ble":
      if (!snapshot.activeProfileBonded) return "ble_open";
      return snapshot.activeProfileConnected ? "ble_connected" : "ble_disconnected";
  }
}

export function deriveTopZone(snapshot: StatusSnapshot): TopZoneState {
  return {
    zone: "top",
    batteryLevel: snapshot.batteryLevel,
    charging: snapshot.charging ?? null,
    output: deriveOutputGlyph(snapshot),
    lastKey: snapshot.showLastKey ? snapshot.lastKeyLabel : null,
  };
}

// ─── Middle ────────────────────────────────────────────────────────

/** One slot per profile; an out-of-range index selects none. */
export function deriveProfileSlots(activeProfileIndex: number): ProfileSlot[] {
  return Array.from({ length: PROFILE_SLOT_COUNT }, (_, i) => ({
    number: i + 1,
    selected: i === activeProfileIndex,
  }));
}

export function deriveMiddleZone(snapshot: StatusSnapshot): MiddleZoneState {
  return { zone: "middle", slots: deriveProfileSlots(snapshot.activeProfileIndex) };
}

// ─── Bottom ────────────────────────────────────────────────────────

export function deriveLayerText(layerIndex: number, layerLabel: string | null): string {
  if (layerLabel === null || layerLabel.length === 0) {
    return `LAYER ${layerIndex}`;
  }
  return layerLabel;
}

export function deriveBottomZone(snapshot: StatusSnapshot): BottomZoneState {
  return { zone: "bottom", text: deriveLayerText(snapshot.layerIndex, snapshot.layerLabel) };
}

// ─── Dispatch ──────────────────────────────────────────────────────

export function deriveZoneState(zone: ZoneName, snapshot: StatusSnapshot): ZoneState {
  switch (zone) {
    case "top":
      return deriveTopZone(snapshot);
    case "middle":
      return deriveMiddleZone(snapshot);
    case "bottom":
      return deriveBottomZone(snapshot);
  }
}

// ─── Layout ────────────────────────────────────────────────────────

const WIDGET_WIDTH = 160;
const WIDGET_HEIGHT = 68;
const CANVAS_SIZE = 68;

/**
 * Zone canvas placement inside the widget. The panel is mounted
 * sideways, so zones are laid out along x; `rotate180` flips the order.
 */
export function deriveWidgetLayout(rotate180: boolean): WidgetLayout {
  const offsets: readonly [number, number, number] = rotate180 ? [0, 68, 136] : [92, 24, -44];
  const [top, middle, bottom] = offsets;
  return {
    width: WIDGET_WIDTH,
    height: WIDGET_HEIGHT,
    zones: {
      top: { x: top, y: 0, size: CANVAS_SIZE },
      middle: { x: middle, y: 0, size: CANVAS_SIZE },
      bottom: { x: bottom, y: 0, size: CANVAS_SIZE },
    },
  };
}
