// ─── Status Widget ─────────────────────────────────────────────────
// One physical display: its own snapshot, its renderer and its zone
// layout. Reducers write the snapshot, then ask for zone redraws.

import { createStatusSnapshot } from "../snapshot/status-snapshot.js";
import { deriveWidgetLayout, deriveZoneState } from "../snapshot/zones.js";
import type {
  StatusRenderer,
  StatusSnapshot,
  WidgetLayout,
  ZoneName,
} from "../types/index.js";

export interface StatusWidgetOptions {
  readonly chargeSensing: boolean;
  readonly rotate180: boolean;
}

export class StatusWidget {
  /** Owned exclusively by this widget; reducers mutate it in place. */
  readonly snapshot: StatusSnapshot;
  readonly layout: WidgetLayout;

  constructor(
    readonly id: number,
    private readonly renderer: StatusRenderer,
    options: StatusWidgetOptions
  ) {
    this.snapshot = createStatusSnapshot({ chargeSensing: options.chargeSensing });
    this.layout = deriveWidgetLayout(options.rotate180);
  }

  /** Derives the zone from the current snapshot and hands it to the renderer. */
  redraw(zone: ZoneName): void {
    this.renderer.render(deriveZoneState(zone, this.snapshot));
  }
}
