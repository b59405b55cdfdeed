import { describe, it, expect } from "vitest";
import { KeypressThrottle, elapsedUptimeMs, processUptimeClock } from "./keypress-throttle.js";

describe("KeypressThrottle", () => {
  it("accepts the first press at any uptime", () => {
    const throttle = new KeypressThrottle(100);

    expect(throttle.tryAccept(0)).toBe(true);
    expect(throttle.lastAccepted).toBe(0);
  });

  it("drops a press 50ms after the last accepted one", () => {
    const throttle = new KeypressThrottle(100);
    throttle.tryAccept(1_000);

    expect(throttle.tryAccept(1_050)).toBe(false);
    expect(throttle.lastAccepted).toBe(1_000);
  });

  it("accepts a press exactly one interval later", () => {
    const throttle = new KeypressThrottle(100);
    throttle.tryAccept(1_000);

    expect(throttle.tryAccept(1_100)).toBe(true);
  });

  it("measures from the last accepted press, not the last attempt", () => {
    const throttle = new KeypressThrottle(100);
    throttle.tryAccept(0);
    throttle.tryAccept(60); // dropped

    expect(throttle.tryAccept(110)).toBe(true);
  });

  it("accepts every press with a zero interval", () => {
    const throttle = new KeypressThrottle(0);

    expect(throttle.tryAccept(5)).toBe(true);
    expect(throttle.tryAccept(5)).toBe(true);
  });

  it("handles the 32-bit uptime counter wrapping", () => {
    const throttle = new KeypressThrottle(100);
    throttle.tryAccept(0xffff_ffc0); // 64ms before wrap

    expect(throttle.tryAccept(0x10)).toBe(false); // 80ms later
    expect(throttle.tryAccept(0x30)).toBe(true); // 112ms later
  });

  it("forgets the last press on reset", () => {
    const throttle = new KeypressThrottle(100);
    throttle.tryAccept(10);
    throttle.reset();

    expect(throttle.lastAccepted).toBeNull();
    expect(throttle.tryAccept(20)).toBe(true);
  });
});

describe("elapsedUptimeMs", () => {
  it("subtracts plain values", () => {
    expect(elapsedUptimeMs(100, 250)).toBe(150);
  });

  it("wraps modulo 2^32", () => {
    expect(elapsedUptimeMs(0xffff_fff0, 0x10)).toBe(0x20);
  });
});

describe("processUptimeClock", () => {
  it("returns an unsigned 32-bit integer", () => {
    const now = processUptimeClock();

    expect(Number.isInteger(now)).toBe(true);
    expect(now).toBeGreaterThanOrEqual(0);
    expect(now).toBeLessThanOrEqual(0xffff_ffff);
  });
});
