#!/usr/bin/env tsx
// ─── Replay Events ─────────────────────────────────────────────────
// CLI script that replays a JSON event trace through a StatusDisplay
// and prints every zone redraw. Exits 1 if the trace cannot be loaded
// or any event in it is malformed.
//
// Usage: npm run replay -- [path/to/trace.json]

import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  StatusConfigError,
  createStatusDisplay,
  createStatusEventHub,
  formatZodIssues,
  parseStatusConfig,
  safeParseStatusEvent,
  type DeviceState,
  type StatusRenderer,
  type ZoneState,
} from "../packages/engine/src/index.js";

const DEFAULT_TRACE = join(dirname(fileURLToPath(import.meta.url)), "fixtures", "sample-trace.json");

// ─── Trace Format ──────────────────────────────────────────────────

const DeviceValuesSchema = z
  .object({
    batteryPercent: z.number(),
    usbPowered: z.boolean(),
    transport: z.enum(["usb", "ble"]),
    profileIndex: z.number().int(),
    profileConnected: z.boolean(),
    profileOpen: z.boolean(),
    layerIndex: z.number().int().nonnegative(),
    layerName: z.string().nullable(),
  })
  .strict();

type DeviceValues = z.infer<typeof DeviceValuesSchema>;

const TraceStepSchema = z.union([
  z.object({ device: DeviceValuesSchema.partial() }).strict(),
  z.object({ atMs: z.number().int().nonnegative(), event: z.unknown() }).strict(),
]);

const TraceSchema = z
  .object({
    config: z.unknown().optional(),
    widgets: z.number().int().min(1).default(1),
    device: DeviceValuesSchema,
    steps: z.array(TraceStepSchema),
  })
  .strict();

// ─── Device & Renderer ─────────────────────────────────────────────

function traceDevice(values: DeviceValues): DeviceState {
  return {
    currentBatteryPercent: () => values.batteryPercent,
    isUsbPowered: () => values.usbPowered,
    selectedTransport: () => values.transport,
    activeProfileIndex: () => values.profileIndex,
    isProfileConnected: () => values.profileConnected,
    isProfileOpenUnbonded: () => values.profileOpen,
    highestActiveLayer: () => ({ index: values.layerIndex, name: values.layerName }),
  };
}

function describeZone(zone: ZoneState): string {
  switch (zone.zone) {
    case "top": {
      const charging = zone.charging ? " charging" : "";
      const key = zone.lastKey === null ? "" : ` key=${zone.lastKey}`;
      return `${zone.batteryLevel}%${charging} ${zone.output}${key}`;
    }
    case "middle":
      return zone.slots.map((slot) => (slot.selected ? `[${slot.number}]` : ` ${slot.number} `)).join("");
    case "bottom":
      return zone.text;
  }
}

function consoleRenderer(label: string): StatusRenderer {
  return {
    render(zone) {
      console.log(`  ${label} ${zone.zone.padEnd(6)} ${describeZone(zone)}`);
    },
  };
}

// ─── Main ──────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const tracePath = process.argv[2] ?? DEFAULT_TRACE;
  const raw = await readFile(tracePath, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    console.error(`❌ ${tracePath}: invalid JSON`);
    if (err instanceof Error) {
      console.error(`   ${err.message}`);
    }
    process.exit(1);
  }

  const result = TraceSchema.safeParse(parsed);
  if (!result.success) {
    console.error(`❌ ${tracePath}`);
    console.error(`   ${formatZodIssues(result.error.issues)}`);
    process.exit(1);
  }
  const trace = result.data;

  const values: DeviceValues = { ...trace.device };
  let now = 0;

  const display = createStatusDisplay({
    device: traceDevice(values),
    config: parseStatusConfig(trace.config ?? {}),
    clock: () => now,
  });
  const hub = createStatusEventHub();
  const detach = display.attach(hub);

  console.log(`\nReplaying ${trace.steps.length} step(s) from ${tracePath}\n`);

  for (let i = 0; i < trace.widgets; i++) {
    console.log(`register widget ${i + 1}`);
    display.registerWidget(consoleRenderer(`#${i + 1}`));
  }

  let dropped = 0;
  for (const step of trace.steps) {
    if ("device" in step) {
      Object.assign(values, step.device);
      continue;
    }
    now = step.atMs;
    const event = safeParseStatusEvent(step.event);
    if (!event.success) {
      console.error(`@${now}ms ❌ ${formatZodIssues(event.error.issues)}`);
      dropped++;
      continue;
    }
    console.log(`@${now}ms ${event.data.kind}`);
    hub.emit(event.data);
  }

  detach();
  console.log();

  if (dropped > 0) {
    console.error(`${dropped} malformed event(s) dropped.`);
    process.exit(1);
  }

  console.log(`Replayed ${trace.steps.length} step(s) across ${trace.widgets} widget(s).`);
}

main().catch((err: unknown) => {
  if (err instanceof StatusConfigError) {
    console.error(`❌ ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
