// ─── Zod Issue Formatter ───────────────────────────────────────────
// Converts Zod validation issues into human-readable strings.
// Uses a minimal structural type so callers don't need "zod" types.

/** Minimal shape of a Zod issue (path + message). */
export interface ZodIssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/** Renders one issue as `path: message`, with `(root)` for an empty path. */
export function describeIssue(issue: ZodIssueLike): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/**
 * Formats an array of Zod issues into a single string.
 *
 * @example
 * formatZodIssues([{ path: ["keyEventForm"], message: "Invalid enum value" }])
 * // => "Validation failed: keyEventForm: Invalid enum value"
 */
export function formatZodIssues(issues: readonly ZodIssueLike[]): string {
  return `Validation failed: ${issues.map(describeIssue).join("; ")}`;
}
