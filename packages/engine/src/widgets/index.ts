export { StatusWidget, type StatusWidgetOptions } from "./status-widget.js";
export { WidgetRegistry } from "./widget-registry.js";
