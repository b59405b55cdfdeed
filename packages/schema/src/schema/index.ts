export { StatusEventSchema, safeParseStatusEvent } from "./events.js";
export {
  StatusConfigSchema,
  StatusConfigError,
  parseStatusConfig,
  safeParseStatusConfig,
  type StatusConfig,
  type StatusConfigInput,
} from "./config.js";
export { describeIssue, formatZodIssues, type ZodIssueLike } from "./format-issues.js";
