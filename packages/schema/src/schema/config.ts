// ─── Status Config ─────────────────────────────────────────────────
// Build-time options for a status display. Every key has a default, so
// `{}` is a complete configuration.

import { z } from "zod";
import { describeIssue, formatZodIssues } from "./format-issues.js";

export const StatusConfigSchema = z
  .object({
    /** Which key event form the keypress reducer consumes. */
    keyEventForm: z.enum(["usage", "position"]).default("usage"),
    /** Minimum spacing between two keypress-triggered redraws. */
    keypressRenderIntervalMs: z.number().int().min(0).default(100),
    /** Enables charge sensing and the USB connection subscriptions. */
    usbDeviceStack: z.boolean().default(true),
    /** Enables the BLE profile-change subscription. */
    ble: z.boolean().default(true),
    /** Maximum glyphs kept in the last-key label. */
    lastKeyCapacity: z.number().int().min(1).default(9),
    rotate180: z.boolean().default(false),
    /** Replaces the default position-form label table. */
    positionLabels: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

export type StatusConfig = z.output<typeof StatusConfigSchema>;
export type StatusConfigInput = z.input<typeof StatusConfigSchema>;

export class StatusConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = "StatusConfigError";
  }
}

/** Validates a raw config. Returns a Zod SafeParseResult. */
export function safeParseStatusConfig(raw: unknown) {
  return StatusConfigSchema.safeParse(raw);
}

/**
 * Validates a raw config and fills in defaults.
 *
 * @throws {StatusConfigError} listing every issue as `path: message`.
 */
export function parseStatusConfig(raw: unknown = {}): StatusConfig {
  const result = StatusConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new StatusConfigError(
      formatZodIssues(result.error.issues),
      result.error.issues.map(describeIssue)
    );
  }
  return result.data;
}
