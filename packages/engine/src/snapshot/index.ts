export { createStatusSnapshot, type SnapshotOptions } from "./status-snapshot.js";
export {
  deriveOutputGlyph,
  deriveTopZone,
  deriveProfileSlots,
  deriveMiddleZone,
  deriveLayerText,
  deriveBottomZone,
  deriveZoneState,
  deriveWidgetLayout,
} from "./zones.js";
