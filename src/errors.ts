/**
 * Thrown errors
 * These signal a malformed call, not a gm failure: gm failures are returned as values
 */

export abstract class GmWrapError extends Error {
  // unique error identifier
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnboundPlaceholderError extends GmWrapError {
  readonly code = "UNBOUND_PLACEHOLDER";

  constructor(
    readonly template: string,
    readonly missing: readonly string[],
  ) {
    super(
      `Unbound placeholder${missing.length > 1 ? "s" : ""} ${missing
        .map((name) => `:${name}`)
        .join(", ")} in template "${template}"`,
    );
  }
}

export class UnknownFieldError extends GmWrapError {
  readonly code = "UNKNOWN_FIELD";

  constructor(readonly field: string) {
    super(`Unknown identify field "${field}"`);
  }
}
