// ─── Label Tables ──────────────────────────────────────────────────
// Lookup tables behind the key label decoder. The raw tables ship as
// JSON beside this module and are validated once, at load time.

import { z } from "zod";
import { describeIssue, formatZodIssues } from "../types/index.js";
import keyboardUsagesJson from "./tables/keyboard-usages.json";
import consumerUsagesJson from "./tables/consumer-usages.json";
import positionLabelsJson from "./tables/position-labels.json";

// ─── Types ─────────────────────────────────────────────────────────

/** Unshifted and shifted labels. Fixed-label keys repeat the same string. */
export type KeyboardLabel = readonly [unshifted: string, shifted: string];

export interface LabelTables {
  /** Page 0x07 usage id → label pair (letters are decoded by offset). */
  readonly keyboard: ReadonlyMap<number, KeyboardLabel>;
  /** Page 0x0C usage id → label. */
  readonly consumer: ReadonlyMap<number, string>;
  /** Physical key position → label, for the positional event form. */
  readonly positions: readonly string[];
}

/** Raw JSON shape of the three tables, before conversion. */
export interface RawLabelTables {
  readonly keyboard: unknown;
  readonly consumer: unknown;
  readonly positions: unknown;
}

export class LabelTableError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = "LabelTableError";
  }
}

// ─── Schemas ───────────────────────────────────────────────────────

const UsageIdKeySchema = z.string().regex(/^0x[0-9a-f]{2,4}$/, "usage ids must be lowercase hex, e.g. 0x1e");

const LabelSchema = z.string().min(1);

const RawLabelTablesSchema = z.object({
  keyboard: z.record(UsageIdKeySchema, z.union([LabelSchema, z.tuple([LabelSchema, LabelSchema])])),
  consumer: z.record(UsageIdKeySchema, LabelSchema),
  positions: z.array(LabelSchema).min(1),
});

// ─── Loading ───────────────────────────────────────────────────────

/**
 * Validates raw tables and converts hex-keyed records into numeric maps.
 *
 * @throws {LabelTableError} if any table is malformed.
 */
export function createLabelTables(raw: RawLabelTables): LabelTables {
  const result = RawLabelTablesSchema.safeParse(raw);
  if (!result.success) {
    throw new LabelTableError(
      formatZodIssues(result.error.issues),
      result.error.issues.map(describeIssue)
    );
  }

  const keyboard = new Map<number, KeyboardLabel>();
  for (const [hex, label] of Object.entries(result.data.keyboard)) {
    keyboard.set(Number.parseInt(hex, 16), typeof label === "string" ? [label, label] : label);
  }

  const consumer = new Map<number, string>();
  for (const [hex, label] of Object.entries(result.data.consumer)) {
    consumer.set(Number.parseInt(hex, 16), label);
  }

  return { keyboard, consumer, positions: result.data.positions };
}

/** Returns a copy of `tables` with the positional table replaced. */
export function withPositionLabels(tables: LabelTables, positions: readonly string[]): LabelTables {
  return { ...tables, positions };
}

/** The tables shipped with the engine. */
export const DEFAULT_LABEL_TABLES: LabelTables = createLabelTables({
  keyboard: keyboardUsagesJson,
  consumer: consumerUsagesJson,
  positions: positionLabelsJson,
});
