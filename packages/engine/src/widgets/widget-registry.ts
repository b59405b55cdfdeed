// ─── Widget Registry ───────────────────────────────────────────────
// Ordered, non-owning list of registered widgets. Every reducer firing
// walks it in registration order.

import type { StatusWidget } from "./status-widget.js";

export class WidgetRegistry implements Iterable<StatusWidget> {
  private readonly widgets: StatusWidget[] = [];

  /** @throws {Error} if the widget is already registered. */
  register(widget: StatusWidget): void {
    if (this.widgets.includes(widget)) {
      throw new Error(`Widget already registered: ${widget.id}`);
    }
    this.widgets.push(widget);
  }

  /** Removes the widget. Returns false if it was not registered. */
  unregister(widget: StatusWidget): boolean {
    const index = this.widgets.indexOf(widget);
    if (index === -1) return false;
    this.widgets.splice(index, 1);
    return true;
  }

  has(widget: StatusWidget): boolean {
    return this.widgets.includes(widget);
  }

  get size(): number {
    return this.widgets.length;
  }

  /** Iterates a copy taken at call time. */
  [Symbol.iterator](): Iterator<StatusWidget> {
    return this.widgets.slice()[Symbol.iterator]();
  }

  toArray(): readonly StatusWidget[] {
    return this.widgets.slice();
  }
}
