import { describe, it, expect } from "vitest";
import { bindData, findUnbound, quote } from "./bind-data";

describe("quote", () => {
  it("wraps text in double quotes", () => {
    expect(quote("my file.jpg")).toBe('"my file.jpg"');
  });

  it("escapes characters the shell expands inside double quotes", () => {
    expect(quote('a"b$c`d\\e')).toBe('"a\\"b\\$c\\`d\\\\e"');
  });
});

describe("bindData", () => {
  // ==========================================================================
  // Modes
  // ==========================================================================
  describe("modes", () => {
    it("quotes values in escaped mode", () => {
      expect(
        bindData("identify :file", [["file", "a.jpg"]], "escaped"),
      ).toBe('identify "a.jpg"');
    });

    it("leaves values bare in raw mode", () => {
      expect(
        bindData(":widthx:height", [["width", 640], ["height", 480]], "raw"),
      ).toBe("640x480");
    });

    it("quotes each element of a list in escaped mode", () => {
      expect(
        bindData(":input_file", [["input_file", ["a.png", "b c.png"]]], "escaped"),
      ).toBe('"a.png" "b c.png"');
    });
  });

  // ==========================================================================
  // Matching
  // ==========================================================================
  describe("matching", () => {
    it("is a no-op for a key whose placeholder is absent", () => {
      const template = "convert :input_file :output_file";
      expect(bindData(template, [["missing", "x"]], "escaped")).toBe(template);
    });

    it("leaves placeholders without a binding in place", () => {
      expect(
        bindData("convert :input_file :output_file", [["input_file", "a.jpg"]], "escaped"),
      ).toBe('convert "a.jpg" :output_file');
    });

    it("replaces every occurrence of a placeholder", () => {
      expect(bindData(":n-:n", [["n", 3]], "raw")).toBe("3-3");
    });

    it("matches each placeholder to its own name", () => {
      expect(
        bindData(":file :file_name", [["file", "a"], ["file_name", "b"]], "raw"),
      ).toBe("a b");
    });

    it("does not bind a shorter name inside a longer placeholder", () => {
      expect(
        bindData(":file :file_name", [["file", "a.jpg"]], "escaped"),
      ).toBe('"a.jpg" :file_name');
    });

    it("binds a raw prefix followed by literal text", () => {
      expect(bindData(":xx:y", [["x", 72], ["y", 96]], "raw")).toBe("72x96");
    });

    it("does not bind a raw prefix followed by an underscore", () => {
      expect(bindData(":file_name", [["file", "a"]], "raw")).toBe(":file_name");
    });

    it("does not rescan substituted text", () => {
      expect(bindData(":a :b", [["a", ":b"], ["b", "x"]], "raw")).toBe(":b x");
    });

    it("uses the last binding for a repeated name", () => {
      expect(bindData(":f", [["f", "a"], ["f", "b"]], "raw")).toBe("b");
    });
  });
});

describe("findUnbound", () => {
  it("lists placeholders without a binding", () => {
    expect(
      findUnbound("convert :input_file :output_file", [["input_file", "a"]], "escaped"),
    ).toEqual(["output_file"]);
  });

  it("reports a longer placeholder when only its prefix is bound", () => {
    expect(
      findUnbound(":file :file_name", [["file", "a.jpg"]], "escaped"),
    ).toEqual(["file_name"]);
    expect(findUnbound(":file_name", [["file", "a"]], "raw")).toEqual(["file_name"]);
  });

  it("accepts raw placeholders followed by literal text", () => {
    expect(
      findUnbound(":widthx:height", [["width", 1], ["height", 2]], "raw"),
    ).toEqual([]);
  });

  it("requires whole words in escaped mode", () => {
    expect(
      findUnbound(":widthx", [["width", 1]], "escaped"),
    ).toEqual(["widthx"]);
  });

  it("reports each missing name once", () => {
    expect(findUnbound(":a :a :b", [], "escaped")).toEqual(["a", "b"]);
  });
});
