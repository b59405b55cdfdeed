// ─── Event Schemas ─────────────────────────────────────────────────
// Zod schemas for events arriving from an untrusted source (a bus
// bridge, a recorded trace). Missing optional payload degrades to
// defaults instead of rejecting the event.

import { z } from "zod";
import type { StatusEvent } from "../types/index.js";

// ─── Primitives ────────────────────────────────────────────────────

const ModifierByteSchema = z.number().int().min(0).max(0xff).default(0);

const PressedSchema = z.boolean().default(false);

// ─── Events ────────────────────────────────────────────────────────

export const StatusEventSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("battery_state_changed"),
    stateOfCharge: z.number().int().optional(),
  }),
  z.object({
    kind: z.literal("usb_conn_state_changed"),
    powered: z.boolean().default(false),
  }),
  z.object({
    kind: z.literal("endpoint_changed"),
  }),
  z.object({
    kind: z.literal("ble_active_profile_changed"),
    index: z.number().int().default(0),
  }),
  z.object({
    kind: z.literal("layer_state_changed"),
    layer: z.number().int().min(0).default(0),
    active: z.boolean().default(false),
  }),
  z.object({
    kind: z.literal("keycode_state_changed"),
    usagePage: z.number().int().min(0),
    usageId: z.number().int().min(0),
    implicitModifiers: ModifierByteSchema,
    explicitModifiers: ModifierByteSchema,
    pressed: PressedSchema,
  }),
  z.object({
    kind: z.literal("position_state_changed"),
    position: z.number().int().min(0),
    pressed: PressedSchema,
  }),
]) satisfies z.ZodType<StatusEvent, z.ZodTypeDef, unknown>;

/** Parses a raw event. Returns a Zod SafeParseResult. */
export function safeParseStatusEvent(raw: unknown) {
  return StatusEventSchema.safeParse(raw);
}
