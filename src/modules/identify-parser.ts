/**
 * Explicit-Metadata Parser
 * Parses the output of `gm identify -format` built by identifyFormatString
 */

import type { MetadataRecord, MetadataResult, MetadataValue } from "../types";
import {
  FIELD_SEPARATOR,
  KEY_VALUE_SEPARATOR,
  NUMERIC_FIELDS,
} from "./format-chars";

const INTEGER = /^-?\d+$/;

/**
 * Parse "filename: a.jpg--SEP--width: 100" into { filename: "a.jpg", width: 100 }
 *
 * gm may break lines mid-stream, so all CR and LF characters are dropped first.
 * A segment without ": " or a non-integer width/height fails the whole parse
 */
export function parseIdentifyExplicit(output: string): MetadataResult {
  const cleaned = output.replace(/[\r\n]/g, "");
  const record: MetadataRecord = {};

  for (const segment of cleaned.split(FIELD_SEPARATOR)) {
    const at = segment.indexOf(KEY_VALUE_SEPARATOR);
    if (at === -1) {
      return {
        ok: false,
        error: {
          kind: "malformed-metadata-field",
          segment,
          reason: "missing-separator",
        },
      };
    }

    const key = segment.slice(0, at);
    const raw = segment.slice(at + KEY_VALUE_SEPARATOR.length);

    let value: MetadataValue = raw;
    if (NUMERIC_FIELDS.has(key)) {
      if (!INTEGER.test(raw)) {
        return {
          ok: false,
          error: {
            kind: "malformed-metadata-field",
            segment,
            reason: "not-an-integer",
          },
        };
      }
      value = Number.parseInt(raw, 10);
    }

    record[key] = value;
  }

  return { ok: true, value: record };
}
