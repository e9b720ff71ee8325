import { describe, it, expect } from "vitest";
import { UnboundPlaceholderError } from "../errors";
import { bare, define, strip, valued } from "../options";
import { renderCommand, spliceFragments } from "./render-command";
import { renderOptions } from "./render-options";

const TEMPLATE = "convert {{options}} :input_file :output_file";
const OPTIONS = [bare("-verbose"), valued("-resize", ":size", [["size", "50%"]])];

describe("spliceFragments", () => {
  it("splices options and keeps named placeholders", () => {
    expect(
      spliceFragments(TEMPLATE, { options: renderOptions(OPTIONS) }),
    ).toBe('convert -verbose -resize "50%" :input_file :output_file');
  });

  it("renders a marker without a fragment as empty", () => {
    expect(spliceFragments("mogrify {{options}} :file", {})).toBe("mogrify  :file");
  });
});

describe("renderCommand", () => {
  it("splices options then binds file names", () => {
    const command = renderCommand(
      {
        template: TEMPLATE,
        bindings: [
          ["input_file", "in.jpg"],
          ["output_file", "out.jpg"],
        ],
        insertions: { options: OPTIONS },
      },
      { strict: true },
    );

    expect(command).toBe('convert -verbose -resize "50%" "in.jpg" "out.jpg"');
  });

  it("never binds inside option text", () => {
    const command = renderCommand(
      {
        template: "convert {{options}} :input_file",
        bindings: [["input_file", "x.jpg"]],
        insertions: {
          options: [valued("-draw", ":primitive", [["primitive", "text 0,0 'a:input_file'"]])],
        },
      },
      { strict: true },
    );

    expect(command).toBe(`convert -draw "text 0,0 'a:input_file'" "x.jpg"`);
  });

  it("renders an empty marker when no options are given", () => {
    const command = renderCommand(
      {
        template: "convert {{options}} :input_file {{output_options}} :output_file",
        bindings: [
          ["input_file", "a.jpg"],
          ["output_file", "b.png"],
        ],
        insertions: { options: [strip()] },
      },
      { strict: true },
    );

    expect(command).toBe('convert -strip "a.jpg"  "b.png"');
  });

  // ==========================================================================
  // Placeholder checks
  // ==========================================================================
  describe("placeholder checks", () => {
    it("throws for an unbound template placeholder in strict mode", () => {
      const render = () =>
        renderCommand(
          { template: "convert :input_file :output_file", bindings: [["input_file", "a.jpg"]] },
          { strict: true },
        );

      expect(render).toThrow(UnboundPlaceholderError);
      expect(render).toThrow('Unbound placeholder :output_file in template "convert :input_file :output_file"');
    });

    it("throws for an unbound option placeholder in strict mode", () => {
      try {
        renderCommand(
          { template: "convert {{options}}", insertions: { options: [valued("-resize", ":size")] } },
          { strict: true },
        );
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(UnboundPlaceholderError);
        if (error instanceof UnboundPlaceholderError) {
          expect(error.template).toBe(":size");
          expect(error.missing).toEqual(["size"]);
        }
      }
    });

    it("throws when only a prefix of a placeholder is bound in strict mode", () => {
      const render = () =>
        renderCommand(
          { template: "composite :input :input_file", bindings: [["input", "a.jpg"]] },
          { strict: true },
        );

      expect(render).toThrow(
        'Unbound placeholder :input_file in template "composite :input :input_file"',
      );
    });

    it("accepts gm's key:value syntax passed through define", () => {
      expect(
        renderCommand(
          {
            template: "convert {{options}} :input_file",
            bindings: [["input_file", "a.jpg"]],
            insertions: { options: [define("jpeg:size", "640x480")] },
          },
          { strict: true },
        ),
      ).toBe('convert -define "jpeg:size=640x480" "a.jpg"');
    });

    it("passes unbound placeholders through when not strict", () => {
      expect(
        renderCommand(
          { template: "convert :input_file :output_file", bindings: [["input_file", "a.jpg"]] },
          { strict: false },
        ),
      ).toBe('convert "a.jpg" :output_file');
    });
  });
});
