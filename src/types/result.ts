/**
 * Result type definitions
 * Every failure reported by gm comes back as a value, never as a thrown error
 */

// Known failures recognised in gm's output text
export type KnownErrorKind =
  | "binary-not-found"
  | "input-file-missing"
  | "no-image-produced"
  | "cannot-open-input";

export interface KnownError {
  kind: KnownErrorKind;
}

// Non-empty output that matched no rule
export interface UnclassifiedError {
  kind: "unclassified";
  output: string;
}

export interface MalformedFieldError {
  kind: "malformed-metadata-field";
  segment: string;
  reason: "missing-separator" | "not-an-integer";
}

export type GmError = KnownError | UnclassifiedError | MalformedFieldError;
export type GmErrorKind = GmError["kind"];

export type Result<T, E = GmError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type CommandResult = { ok: true } | { ok: false; error: GmError };

export type TextResult = Result<string>;

export type MetadataValue = string | number;
export type MetadataRecord = Record<string, MetadataValue>;

export type MetadataResult = Result<MetadataRecord>;
