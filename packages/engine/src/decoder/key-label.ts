// ─── Key Label Decoder ─────────────────────────────────────────────
// Turns a key event into the short label shown in the top zone.
// Pure: no I/O, and the same event always yields the same result.

import type { KeyEvent, PositionKeyEvent, UsageKeyEvent } from "../types/index.js";
import { DEFAULT_LABEL_TABLES, type LabelTables } from "./label-tables.js";

// ─── Constants ─────────────────────────────────────────────────────

export const USAGE_PAGE_KEYBOARD = 0x07;
export const USAGE_PAGE_CONSUMER = 0x0c;

const FIRST_LETTER_USAGE = 0x04; // A
const LAST_LETTER_USAGE = 0x1d; // Z

/** Left shift (bit 1) and right shift (bit 5) in the HID modifier byte. */
const SHIFT_MODIFIER_MASK = (1 << 1) | (1 << 5);

/** Label used for any consumer usage missing from the consumer table. */
export const GENERIC_MEDIA_LABEL = "MEDIA";

/** Placeholder for an unmatched usage-form event. */
export const UNKNOWN_KEY_LABEL = "KEY";

// ─── Result ────────────────────────────────────────────────────────

/**
 * Outcome of a table lookup. An unmatched result carries no label:
 * the decoder never invents one it cannot justify from its tables.
 */
export type DecodeResult =
  | { readonly matched: true; readonly label: string }
  | { readonly matched: false; readonly label: null };

const NO_MATCH: DecodeResult = { matched: false, label: null };

function match(label: string): DecodeResult {
  return { matched: true, label };
}

// ─── Decoding ──────────────────────────────────────────────────────

/** True when either modifier byte has a shift bit set. */
export function isShifted(implicitModifiers: number, explicitModifiers: number): boolean {
  return ((implicitModifiers | explicitModifiers) & SHIFT_MODIFIER_MASK) !== 0;
}

function decodeUsage(event: UsageKeyEvent, tables: LabelTables): DecodeResult {
  const { usagePage, usageId } = event;
  if (!Number.isInteger(usageId)) return NO_MATCH;

  if (usagePage === USAGE_PAGE_KEYBOARD) {
    if (usageId >= FIRST_LETTER_USAGE && usageId <= LAST_LETTER_USAGE) {
      return match(String.fromCharCode(0x41 + (usageId - FIRST_LETTER_USAGE)));
    }

    const labels = tables.keyboard.get(usageId);
    if (labels === undefined) return NO_MATCH;

    const [unshifted, shifted] = labels;
    return match(isShifted(event.implicitModifiers, event.explicitModifiers) ? shifted : unshifted);
  }

  if (usagePage === USAGE_PAGE_CONSUMER) {
    // Every consumer usage is "matched"; unknown ones share one label.
    return match(tables.consumer.get(usageId) ?? GENERIC_MEDIA_LABEL);
  }

  return NO_MATCH;
}

function decodePosition(event: PositionKeyEvent, tables: LabelTables): DecodeResult {
  const { position } = event;
  if (!Number.isInteger(position) || position < 0 || position >= tables.positions.length) {
    return NO_MATCH;
  }
  const label = tables.positions[position];
  return label === undefined ? NO_MATCH : match(label);
}

/** Looks the event up in the label tables. */
export function decodeKeyLabel(
  event: KeyEvent,
  tables: LabelTables = DEFAULT_LABEL_TABLES
): DecodeResult {
  switch (event.form) {
    case "usage":
      return decodeUsage(event, tables);
    case "position":
      return decodePosition(event, tables);
  }
}

// ─── Formatting ────────────────────────────────────────────────────

/** `"KEY"` for usage events, `"K<position>"` for positional ones. */
export function placeholderLabel(event: KeyEvent): string {
  return event.form === "usage" ? UNKNOWN_KEY_LABEL : `K${event.position}`;
}

/** Cuts a label down to at most `capacity` glyphs. */
export function truncateLabel(label: string, capacity: number): string {
  const glyphs = Array.from(label);
  return glyphs.length <= capacity ? label : glyphs.slice(0, Math.max(0, capacity)).join("");
}

export interface FormatKeyLabelOptions {
  readonly tables?: LabelTables;
  readonly capacity: number;
}

/**
 * Decodes the event, substitutes a placeholder when nothing matched,
 * and fits the result into the last-key buffer.
 */
export function formatKeyLabel(event: KeyEvent, options: FormatKeyLabelOptions): string {
  const result = decodeKeyLabel(event, options.tables);
  const label = result.matched ? result.label : placeholderLabel(event);
  return truncateLabel(label, options.capacity);
}
