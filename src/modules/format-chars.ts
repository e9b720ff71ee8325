/**
 * Identify format characters
 * Maps field names to `gm identify -format` escapes
 */

import formatChars from "../config/format-chars.json";
import { UnknownFieldError } from "../errors";

export type FormatField = keyof typeof formatChars;

// Separator between fields in the explicit identify format string
export const FIELD_SEPARATOR = "--SEP--";

// Separator between a field name and its value
export const KEY_VALUE_SEPARATOR = ": ";

// Fields parsed as integers
export const NUMERIC_FIELDS: ReadonlySet<string> = new Set<FormatField>([
  "width",
  "height",
]);

export function isFormatField(name: string): name is FormatField {
  return Object.hasOwn(formatChars, name);
}

/**
 * Get the format escape for a field
 *
 * @example
 * formatChar("width") // "%w"
 */
export function formatChar(field: string): string {
  if (!isFormatField(field)) throw new UnknownFieldError(field);
  return formatChars[field];
}

/**
 * Build the -format argument for explicit identify
 *
 * @example
 * identifyFormatString(["filename", "width"]) // "filename: %f--SEP--width: %w"
 */
export function identifyFormatString(fields: readonly FormatField[]): string {
  return fields
    .map((field) => `${field}${KEY_VALUE_SEPARATOR}${formatChar(field)}`)
    .join(FIELD_SEPARATOR);
}
