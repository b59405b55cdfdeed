import { describe, it, expect } from "vitest";
import { createStatusSnapshot } from "./status-snapshot.js";
import {
  deriveBottomZone,
  deriveLayerText,
  deriveMiddleZone,
  deriveOutputGlyph,
  deriveProfileSlots,
  deriveTopZone,
  deriveWidgetLayout,
  deriveZoneState,
} from "./zones.js";
import type { StatusSnapshot } from "../types/index.js";

// ══════════════════════════════════════════════════════════════════════
// Fixtures
// ══════════════════════════════════════════════════════════════════════

function makeSnapshot(overrides: Partial<StatusSnapshot> = {}): StatusSnapshot {
  return { ...createStatusSnapshot({ chargeSensing: true }), ...overrides };
}

// ══════════════════════════════════════════════════════════════════════
// Tests
// ══════════════════════════════════════════════════════════════════════

describe("createStatusSnapshot", () => {
  it("starts zeroed with no key shown", () => {
    expect(createStatusSnapshot({ chargeSensing: true })).toEqual({
      batteryLevel: 0,
      charging: false,
      selectedEndpoint: { transport: "usb" },
      activeProfileIndex: 0,
      activeProfileConnected: false,
      activeProfileBonded: false,
      layerIndex: 0,
      layerLabel: null,
      lastKeyLabel: "",
      showLastKey: false,
    });
  });

  it("omits the charging field without charge sensing", () => {
    expect("charging" in createStatusSnapshot({ chargeSensing: false })).toBe(false);
  });

  it("returns an independent object per call", () => {
    const a = createStatusSnapshot({ chargeSensing: false });
    const b = createStatusSnapshot({ chargeSensing: false });
    a.batteryLevel = 50;

    expect(b.batteryLevel).toBe(0);
  });
});

describe("deriveOutputGlyph", () => {
  it("shows usb for the USB transport regardless of BLE state", () => {
    const snapshot = makeSnapshot({ activeProfileBonded: true, activeProfileConnected: true });

    expect(deriveOutputGlyph(snapshot)).toBe("usb");
  });

  it("shows ble_connected for a bonded, connected profile", () => {
    const snapshot = makeSnapshot({
      selectedEndpoint: { transport: "ble", profileIndex: 0 },
      activeProfileBonded: true,
      activeProfileConnected: true,
    });

    expect(deriveOutputGlyph(snapshot)).toBe("ble_connected");
  });

  it("shows ble_disconnected for a bonded profile with no connection", () => {
    const snapshot = makeSnapshot({
      selectedEndpoint: { transport: "ble", profileIndex: 2 },
      activeProfileBonded: true,
      activeProfileConnected: false,
    });

    expect(deriveOutputGlyph(snapshot)).toBe("ble_disconnected");
  });

  it("shows ble_open for an unbonded profile even when connected", () => {
    const snapshot = makeSnapshot({
      selectedEndpoint: { transport: "ble", profileIndex: 1 },
      activeProfileBonded: false,
      activeProfileConnected: true,
    });

    expect(deriveOutputGlyph(snapshot)).toBe("ble_open");
  });
});

describe("deriveTopZone", () => {
  it("hides the last key until one has been shown", () => {
    const zone = deriveTopZone(makeSnapshot({ lastKeyLabel: "A", showLastKey: false }));

    expect(zone.lastKey).toBeNull();
  });

  it("carries battery, charging, output and last key", () => {
    const zone = deriveTopZone(
      makeSnapshot({ batteryLevel: 73, charging: true, lastKeyLabel: "ESC", showLastKey: true })
    );

    expect(zone).toEqual({
      zone: "top",
      batteryLevel: 73,
      charging: true,
      output: "usb",
      lastKey: "ESC",
    });
  });

  it("reports charging as null without charge sensing", () => {
    const zone = deriveTopZone(createStatusSnapshot({ chargeSensing: false }));

    expect(zone.charging).toBeNull();
  });
});

describe("deriveProfileSlots", () => {
  it.each([0, 1, 2, 3, 4])("selects exactly one slot for index %i", (index) => {
    const slots = deriveProfileSlots(index);

    expect(slots).toHaveLength(5);
    expect(slots.filter((slot) => slot.selected)).toEqual([{ number: index + 1, selected: true }]);
  });

  it("numbers slots 1 through 5", () => {
    expect(deriveProfileSlots(0).map((slot) => slot.number)).toEqual([1, 2, 3, 4, 5]);
  });

  it("selects no slot for an out-of-range index", () => {
    expect(deriveProfileSlots(5).some((slot) => slot.selected)).toBe(false);
    expect(deriveProfileSlots(-1).some((slot) => slot.selected)).toBe(false);
  });

  it("is exposed through the middle zone", () => {
    const zone = deriveMiddleZone(makeSnapshot({ activeProfileIndex: 3 }));

    expect(zone.zone).toBe("middle");
    expect(zone.slots[3]).toEqual({ number: 4, selected: true });
  });
});

describe("deriveLayerText", () => {
  it("synthesises LAYER N for a null label", () => {
    expect(deriveLayerText(3, null)).toBe("LAYER 3");
  });

  it("synthesises LAYER N for an empty label", () => {
    expect(deriveLayerText(3, "")).toBe("LAYER 3");
  });

  it("uses a non-empty label verbatim and ignores the index", () => {
    expect(deriveLayerText(3, "Nav")).toBe("Nav");
  });

  it("is exposed through the bottom zone", () => {
    expect(deriveBottomZone(makeSnapshot({ layerIndex: 2, layerLabel: null }))).toEqual({
      zone: "bottom",
      text: "LAYER 2",
    });
  });
});

describe("deriveZoneState", () => {
  it("dispatches on the zone name", () => {
    const snapshot = makeSnapshot();

    expect(deriveZoneState("top", snapshot).zone).toBe("top");
    expect(deriveZoneState("middle", snapshot).zone).toBe("middle");
    expect(deriveZoneState("bottom", snapshot).zone).toBe("bottom");
  });
});

describe("deriveWidgetLayout", () => {
  it("places zones right to left by default", () => {
    const layout = deriveWidgetLayout(false);

    expect(layout.width).toBe(160);
    expect(layout.height).toBe(68);
    expect([layout.zones.top.x, layout.zones.middle.x, layout.zones.bottom.x]).toEqual([92, 24, -44]);
  });

  it("places zones left to right when rotated", () => {
    const layout = deriveWidgetLayout(true);

    expect([layout.zones.top.x, layout.zones.middle.x, layout.zones.bottom.x]).toEqual([0, 68, 136]);
    expect(layout.zones.middle.size).toBe(68);
  });
});
