// ─── Status Display ────────────────────────────────────────────────
// Composition root: parses the config, builds the four reducers in
// their fixed order, keeps the widget registry and routes events.

import { DEFAULT_LABEL_TABLES, withPositionLabels, type LabelTables } from "../decoder/label-tables.js";
import type { StatusEventSource } from "../events/event-hub.js";
import { BatteryReducer } from "../reducers/battery-reducer.js";
import { EndpointReducer } from "../reducers/endpoint-reducer.js";
import { KeypressReducer } from "../reducers/keypress-reducer.js";
import { KeypressThrottle, processUptimeClock, type UptimeClock } from "../reducers/keypress-throttle.js";
import { LayerReducer } from "../reducers/layer-reducer.js";
import type { StatusEventHandler } from "../reducers/status-reducer.js";
import {
  formatZodIssues,
  parseStatusConfig,
  safeParseStatusEvent,
  type DeviceState,
  type StatusConfig,
  type StatusConfigInput,
  type StatusEvent,
  type StatusEventKind,
  type StatusRenderer,
} from "../types/index.js";
import { StatusWidget } from "../widgets/status-widget.js";
import { WidgetRegistry } from "../widgets/widget-registry.js";

export interface StatusDisplayOptions {
  readonly device: DeviceState;
  /** Raw config; validated and defaulted on construction. */
  readonly config?: StatusConfigInput;
  readonly clock?: UptimeClock;
  /** Base label tables. `config.positionLabels` still overrides positions. */
  readonly tables?: LabelTables;
}

export class StatusDisplay {
  readonly config: StatusConfig;
  /** Shared by every widget of this display. */
  readonly throttle: KeypressThrottle;

  private readonly registry = new WidgetRegistry();
  private readonly handlers: readonly StatusEventHandler[];
  private nextWidgetId = 1;

  /** @throws {StatusConfigError} if `options.config` is invalid. */
  constructor(options: StatusDisplayOptions) {
    this.config = parseStatusConfig(options.config ?? {});

    const baseTables = options.tables ?? DEFAULT_LABEL_TABLES;
    const tables = this.config.positionLabels
      ? withPositionLabels(baseTables, this.config.positionLabels)
      : baseTables;

    this.throttle = new KeypressThrottle(this.config.keypressRenderIntervalMs);

    this.handlers = [
      new BatteryReducer(options.device, { usbDeviceStack: this.config.usbDeviceStack }),
      new EndpointReducer(options.device, {
        usbDeviceStack: this.config.usbDeviceStack,
        ble: this.config.ble,
      }),
      new LayerReducer(options.device),
      new KeypressReducer({
        form: this.config.keyEventForm,
        tables,
        capacity: this.config.lastKeyCapacity,
        throttle: this.throttle,
        clock: options.clock ?? processUptimeClock,
      }),
    ];
  }

  // ─── Widgets ─────────────────────────────────────────────────────

  /**
   * Adds a widget, then runs every reducer from current device state.
   * Earlier widgets receive the same broadcast.
   */
  registerWidget(renderer: StatusRenderer): StatusWidget {
    const widget = new StatusWidget(this.nextWidgetId++, renderer, {
      chargeSensing: this.config.usbDeviceStack,
      rotate180: this.config.rotate180,
    });
    this.registry.register(widget);

    for (const handler of this.handlers) {
      handler.handleEvent(null, this.registry);
    }
    return widget;
  }

  unregisterWidget(widget: StatusWidget): boolean {
    return this.registry.unregister(widget);
  }

  get widgets(): readonly StatusWidget[] {
    return this.registry.toArray();
  }

  // ─── Events ──────────────────────────────────────────────────────

  /** Every kind at least one reducer subscribes to, in reducer order. */
  get subscribedKinds(): readonly StatusEventKind[] {
    const kinds = new Set<StatusEventKind>();
    for (const handler of this.handlers) {
      for (const kind of handler.kinds) kinds.add(kind);
    }
    return [...kinds];
  }

  /** Runs every reducer subscribed to the event's kind, in reducer order. */
  dispatch(event: StatusEvent): void {
    for (const handler of this.handlers) {
      handler.handleEvent(event, this.registry);
    }
  }

  /**
   * Parses an untrusted event and dispatches it. Returns false, after
   * logging the issues, when the event cannot be parsed.
   */
  dispatchRaw(raw: unknown): boolean {
    const result = safeParseStatusEvent(raw);
    if (!result.success) {
      console.warn(`[StatusDisplay] Dropping malformed event. ${formatZodIssues(result.error.issues)}`);
      return false;
    }
    this.dispatch(result.data);
    return true;
  }

  /** Subscribes to every kind this display needs. Returns a detach function. */
  attach(source: StatusEventSource): () => void {
    const unsubscribers = this.subscribedKinds.map((kind) =>
      source.subscribe(kind, (event) => this.dispatch(event))
    );
    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }
}

/** Factory function — creates a display from a device and a raw config. */
export function createStatusDisplay(options: StatusDisplayOptions): StatusDisplay {
  return new StatusDisplay(options);
}
