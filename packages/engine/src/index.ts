// ─── @keydisplay/engine ────────────────────────────────────────────
// Pure TypeScript status engine: key label decoding, snapshot
// reducers, widget broadcast and keypress throttling.

export * from "./types/index.js";
export * from "./decoder/index.js";
export * from "./snapshot/index.js";
export * from "./reducers/index.js";
export * from "./widgets/index.js";
export {
  createStatusEventHub,
  isEventOfKind,
  type StatusEventHub,
  type StatusEventListener,
  type StatusEventSource,
} from "./events/event-hub.js";
export { StatusDisplay, createStatusDisplay, type StatusDisplayOptions } from "./display/status-display.js";
