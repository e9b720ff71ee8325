import { describe, it, expect } from "vitest";
import { autoOrient, quality, scale, strip } from "../../options";
import { buildConvertOptions } from "./convert";

describe("buildConvertOptions", () => {
  it("splits flags into input and output options", () => {
    expect(
      buildConvertOptions({ resize: "50%", quality: 80, strip: true, autoOrient: true }),
    ).toEqual({
      input: [autoOrient(), scale(50)],
      output: [strip(), quality(80)],
    });
  });

  it("returns empty lists without flags", () => {
    expect(buildConvertOptions({})).toEqual({ input: [], output: [] });
  });

  it("throws on an invalid geometry", () => {
    expect(() => buildConvertOptions({ resize: "huge" })).toThrow(
      'Invalid resize geometry "huge"',
    );
  });
});
