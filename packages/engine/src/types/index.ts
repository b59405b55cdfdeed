// Re-export all types from the canonical schema package.
export type {
  KeyEvent,
  KeyEventForm,
  UsageKeyEvent,
  PositionKeyEvent,
  StatusEvent,
  StatusEventKind,
  StatusEventOfKind,
  BatteryStateChanged,
  UsbConnStateChanged,
  EndpointChanged,
  BleActiveProfileChanged,
  LayerStateChanged,
  KeycodeStateChanged,
  PositionStateChanged,
} from "@keydisplay/schema";
export type { Transport, EndpointInstance, ActiveLayer, DeviceState } from "@keydisplay/schema";
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
} from "@keydisplay/schema";
export type { StatusConfig, StatusConfigInput } from "@keydisplay/schema";
export {
  PROFILE_SLOT_COUNT,
  STATUS_EVENT_KINDS,
  StatusConfigError,
  parseStatusConfig,
  safeParseStatusEvent,
  describeIssue,
  formatZodIssues,
} from "@keydisplay/schema";
