// ─── Status Event Schema Tests ─────────────────────────────────────
// Parse boundary for raw events: defaults for missing payload, and
// rejection of events that cannot be interpreted at all.

import { describe, it, expect } from "vitest";
import { STATUS_EVENT_KINDS, safeParseStatusEvent } from "../index.js";

describe("safeParseStatusEvent", () => {
  // ── Defaults ─────────────────────────────────────────────────────

  describe("payload defaults", () => {
    it("defaults missing modifier bytes to 0 and pressed to false", () => {
      const result = safeParseStatusEvent({
        kind: "keycode_state_changed",
        usagePage: 0x07,
        usageId: 0x04,
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          kind: "keycode_state_changed",
          usagePage: 0x07,
          usageId: 0x04,
          implicitModifiers: 0,
          explicitModifiers: 0,
          pressed: false,
        });
      }
    });

    it("defaults a position event to unpressed", () => {
      const result = safeParseStatusEvent({ kind: "position_state_changed", position: 3 });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({ kind: "position_state_changed", position: 3, pressed: false });
      }
    });

    it("accepts a battery event without a charge level", () => {
      const result = safeParseStatusEvent({ kind: "battery_state_changed" });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({ kind: "battery_state_changed" });
      }
    });

    it("strips unknown payload fields", () => {
      const result = safeParseStatusEvent({ kind: "endpoint_changed", transport: "usb" });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({ kind: "endpoint_changed" });
      }
    });
  });

  // ── Rejections ───────────────────────────────────────────────────

  describe("rejections", () => {
    it("rejects an unknown kind", () => {
      expect(safeParseStatusEvent({ kind: "sensor_event" }).success).toBe(false);
    });

    it("rejects a modifier byte above 0xff", () => {
      const result = safeParseStatusEvent({
        kind: "keycode_state_changed",
        usagePage: 0x07,
        usageId: 0x1e,
        explicitModifiers: 0x100,
        pressed: true,
      });

      expect(result.success).toBe(false);
    });

    it("rejects a negative key position", () => {
      expect(safeParseStatusEvent({ kind: "position_state_changed", position: -3 }).success).toBe(false);
    });

    it("rejects null", () => {
      expect(safeParseStatusEvent(null).success).toBe(false);
    });
  });

  // ── Coverage ─────────────────────────────────────────────────────

  it("accepts a minimal event of every known kind", () => {
    const minimal: Record<(typeof STATUS_EVENT_KINDS)[number], Record<string, unknown>> = {
      battery_state_changed: { stateOfCharge: 80 },
      usb_conn_state_changed: {},
      endpoint_changed: {},
      ble_active_profile_changed: {},
      layer_state_changed: {},
      keycode_state_changed: { usagePage: 0x0c, usageId: 0xe9 },
      position_state_changed: { position: 0 },
    };

    for (const kind of STATUS_EVENT_KINDS) {
      const result = safeParseStatusEvent({ kind, ...minimal[kind] });
      expect(result.success, kind).toBe(true);
    }
  });
});
