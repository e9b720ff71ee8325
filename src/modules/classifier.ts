/**
 * Output Classifier
 * Maps gm's output text to a known error kind by substring match
 */

import type { CommandResult, KnownErrorKind } from "../types";

export interface ErrorRule {
  pattern: string;
  kind: KnownErrorKind;
}

// Checked in order, first match wins: output can contain more than one pattern
export const ERROR_RULES: readonly ErrorRule[] = [
  { pattern: "command not found", kind: "binary-not-found" },
  { pattern: "No such file", kind: "input-file-missing" },
  { pattern: "Request did not return an image", kind: "no-image-produced" },
  { pattern: "unable to open image", kind: "cannot-open-input" },
];

/**
 * Find the first rule whose pattern appears in the output
 */
export function matchErrorRule(output: string): KnownErrorKind | null {
  const rule = ERROR_RULES.find(({ pattern }) => output.includes(pattern));
  return rule?.kind ?? null;
}

/**
 * Classify the output of a command that prints nothing on success
 *
 * @example
 * classifyOutput("") // { ok: true }
 * classifyOutput("gm: unable to open image 'x.jpg'") // { ok: false, error: { kind: "cannot-open-input" } }
 */
export function classifyOutput(output: string): CommandResult {
  const kind = matchErrorRule(output);
  if (kind !== null) return { ok: false, error: { kind } };
  if (output === "") return { ok: true };
  return { ok: false, error: { kind: "unclassified", output } };
}
