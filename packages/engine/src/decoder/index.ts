export {
  decodeKeyLabel,
  formatKeyLabel,
  placeholderLabel,
  truncateLabel,
  isShifted,
  USAGE_PAGE_KEYBOARD,
  USAGE_PAGE_CONSUMER,
  GENERIC_MEDIA_LABEL,
  UNKNOWN_KEY_LABEL,
  type DecodeResult,
  type FormatKeyLabelOptions,
} from "./key-label.js";
export {
  createLabelTables,
  withPositionLabels,
  DEFAULT_LABEL_TABLES,
  LabelTableError,
  type KeyboardLabel,
  type LabelTables,
  type RawLabelTables,
} from "./label-tables.js";
