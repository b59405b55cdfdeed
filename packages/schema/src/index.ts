// ─── @keydisplay/schema ────────────────────────────────────────────
// Canonical type definitions and Zod validation for status events and
// display configuration. All types and schemas are re-exported here.

export * from "./types/index.js";
export * from "./schema/index.js";
