// ─── Status Snapshot ───────────────────────────────────────────────
// Default per-widget state, created at registration time and mutated
// in place by reducer callbacks for the widget's lifetime.

import type { StatusSnapshot } from "../types/index.js";

export interface SnapshotOptions {
  /** Adds the `charging` field, which only exists with charge sensing. */
  readonly chargeSensing: boolean;
}

/** Creates a zeroed snapshot: USB endpoint, layer 0, no key shown yet. */
export function createStatusSnapshot(options: SnapshotOptions): StatusSnapshot {
  const snapshot: StatusSnapshot = {
    batteryLevel: 0,
    selectedEndpoint: { transport: "usb" },
    activeProfileIndex: 0,
    activeProfileConnected: false,
    activeProfileBonded: false,
    layerIndex: 0,
    layerLabel: null,
    lastKeyLabel: "",
    showLastKey: false,
  };
  if (options.chargeSensing) {
    snapshot.charging = false;
  }
  return snapshot;
}
