export { StatusReducer, type StatusEventHandler } from "./status-reducer.js";
export {
  BatteryReducer,
  type BatteryEvent,
  type BatteryState,
  type BatteryReducerOptions,
} from "./battery-reducer.js";
export {
  EndpointReducer,
  type EndpointEvent,
  type EndpointState,
  type EndpointReducerOptions,
} from "./endpoint-reducer.js";
export { LayerReducer, type LayerState } from "./layer-reducer.js";
export {
  KeypressReducer,
  type KeypressEvent,
  type KeypressReducerOptions,
} from "./keypress-reducer.js";
export {
  KeypressThrottle,
  elapsedUptimeMs,
  processUptimeClock,
  type UptimeClock,
} from "./keypress-throttle.js";
