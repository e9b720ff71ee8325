import { describe, it, expect } from "vitest";
import { describeError } from "./client";

describe("describeError", () => {
  it("explains known errors", () => {
    expect(describeError({ kind: "binary-not-found" })).toBe(
      "gm binary not found (use --binary or GMWRAP_BINARY)",
    );
    expect(describeError({ kind: "cannot-open-input" })).toBe(
      "gm could not open the input image",
    );
  });

  it("shows gm's own text for unclassified errors", () => {
    expect(
      describeError({ kind: "unclassified", output: "convert: some warning\n" }),
    ).toBe("convert: some warning");
  });

  it("shows the segment that failed to parse", () => {
    expect(
      describeError({
        kind: "malformed-metadata-field",
        segment: "garbage",
        reason: "missing-separator",
      }),
    ).toBe("Could not parse identify output (missing-separator): garbage");
  });
});
