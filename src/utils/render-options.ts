/**
 * Option Renderer
 * Turns an option list into a command-line fragment
 */

import type { Option } from "../types";
import { bindData, quote } from "./bind-data";

export function renderOption(option: Option): string {
  switch (option.kind) {
    case "bare":
      return option.switch;
    case "valued":
      return `${option.switch} ${quote(bindData(option.template, option.bindings, "raw"))}`;
  }
}

/**
 * Render options space-joined, in the order given.
 * gm lets a later switch override an earlier one, so order is preserved exactly
 *
 * @example
 * renderOptions([bare("-strip"), valued("-quality", ":q", [["q", 80]])])
 * // -strip -quality "80"
 */
export function renderOptions(options: readonly Option[]): string {
  return options.map(renderOption).join(" ");
}
