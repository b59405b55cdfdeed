// ─── Keypress Throttle ─────────────────────────────────────────────
// Rate limit for keypress-triggered redraws. One instance is shared by
// every widget of a display: the limit is bound to the display refresh,
// not to any single widget.

import { performance } from "node:perf_hooks";

/** Monotonic device uptime in milliseconds, as a 32-bit counter. */
export type UptimeClock = () => number;

/** Uptime since process start, truncated to an unsigned 32-bit value. */
export const processUptimeClock: UptimeClock = () => Math.floor(performance.now()) >>> 0;

/** Milliseconds from `from` to `to`, modulo 2^32 so a wrapped counter still works. */
export function elapsedUptimeMs(from: number, to: number): number {
  return ((to >>> 0) - (from >>> 0)) >>> 0;
}

export class KeypressThrottle {
  private lastAcceptedMs: number | null = null;

  constructor(readonly intervalMs: number) {}

  /**
   * Accepts the press and records `nowMs` unless the previous accepted
   * press was less than `intervalMs` ago.
   */
  tryAccept(nowMs: number): boolean {
    if (this.lastAcceptedMs !== null && elapsedUptimeMs(this.lastAcceptedMs, nowMs) < this.intervalMs) {
      return false;
    }
    this.lastAcceptedMs = nowMs;
    return true;
  }

  /** Uptime of the last accepted press, or null before the first. */
  get lastAccepted(): number | null {
    return this.lastAcceptedMs;
  }

  reset(): void {
    this.lastAcceptedMs = null;
  }
}
