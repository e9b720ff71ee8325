import type { BareOption, Binding, ValuedOption } from "../types";

/**
 * A switch without an argument
 *
 * @example
 * bare("-strip")
 */
export function bare(switchName: string): BareOption {
  return { kind: "bare", switch: switchName };
}

/**
 * A switch whose argument is rendered from a sub-template
 *
 * @example
 * valued("-resize", ":widthx:height", [["width", 640], ["height", 480]])
 * // renders as: -resize "640x480"
 */
export function valued(
  switchName: string,
  template: string,
  bindings: readonly Binding[] = [],
): ValuedOption {
  return { kind: "valued", switch: switchName, template, bindings };
}
