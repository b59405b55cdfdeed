export type {
  UsageKeyEvent,
  PositionKeyEvent,
  KeyEvent,
  KeyEventForm,
  BatteryStateChanged,
  UsbConnStateChanged,
  EndpointChanged,
  BleActiveProfileChanged,
  LayerStateChanged,
  KeycodeStateChanged,
  PositionStateChanged,
  StatusEvent,
  StatusEventKind,
  StatusEventOfKind,
} from "./events.js";
export { STATUS_EVENT_KINDS } from "./events.js";
export type { Transport, EndpointInstance, ActiveLayer, DeviceState } from "./device.js";
export type {
  StatusSnapshot,
  ZoneName,
  OutputGlyph,
  TopZoneState,
  ProfileSlot,
  MiddleZoneState,
  BottomZoneState,
  ZoneState,
  ZonePlacement,
  WidgetLayout,
  StatusRenderer,
} from "./snapshot.js";
export { PROFILE_SLOT_COUNT } from "./snapshot.js";
