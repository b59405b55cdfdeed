// ─── Layer Reducer ─────────────────────────────────────────────────
// Owns layerIndex and layerLabel; redraws the bottom zone.

import type { DeviceState, LayerStateChanged } from "../types/index.js";
import type { StatusWidget } from "../widgets/status-widget.js";
import { StatusReducer } from "./status-reducer.js";

export interface LayerState {
  readonly index: number;
  readonly label: string | null;
}

export class LayerReducer extends StatusReducer<LayerStateChanged, LayerState> {
  readonly name = "layer";
  readonly kinds = ["layer_state_changed"] as const;

  constructor(private readonly device: DeviceState) {
    super();
  }

  getCurrentState(): LayerState {
    const { index, name } = this.device.highestActiveLayer();
    return { index, label: name };
  }

  /** The event only says which layer toggled; the highest active one is re-read. */
  reduce(_event: LayerStateChanged): LayerState {
    return this.getCurrentState();
  }

  apply(widget: StatusWidget, state: LayerState): void {
    widget.snapshot.layerIndex = state.index;
    widget.snapshot.layerLabel = state.label;
    widget.redraw("bottom");
  }
}
