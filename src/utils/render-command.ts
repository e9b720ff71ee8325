/**
 * Command Renderer
 * Splices rendered option fragments into {{marker}} insertion points, then
 * binds :name placeholders in the template's own text only
 */

import { UnboundPlaceholderError } from "../errors";
import type { Binding, Fragments, Option } from "../types";
import { bindData, findUnbound } from "./bind-data";
import { renderOptions } from "./render-options";

const MARKER = /\{\{(\w+)\}\}/;

export interface CommandTemplate {
  template: string;
  // Bound in escaped mode
  bindings?: readonly Binding[];
  // Option lists keyed by marker name, e.g. { options: [...] } for {{options}}
  insertions?: Readonly<Record<string, readonly Option[]>>;
}

export interface RenderOptions {
  // Throw UnboundPlaceholderError instead of leaving placeholders in the command
  strict: boolean;
}

/**
 * Replace each {{marker}} with its fragment. Markers without a fragment
 * render as an empty string
 *
 * @example
 * spliceFragments("convert {{options}} :input_file", { options: "-strip" })
 * // "convert -strip :input_file"
 */
export function spliceFragments(template: string, fragments: Fragments): string {
  return template
    .split(MARKER)
    .map((part, i) => (i % 2 === 1 ? (fragments[part] ?? "") : part))
    .join("");
}

function assertBound(command: CommandTemplate): void {
  const bindings = command.bindings ?? [];
  const missing = findUnbound(command.template, bindings, "escaped");
  if (missing.length > 0) {
    throw new UnboundPlaceholderError(command.template, missing);
  }

  for (const options of Object.values(command.insertions ?? {})) {
    for (const option of options) {
      if (option.kind !== "valued") continue;
      const unbound = findUnbound(option.template, option.bindings, "raw");
      if (unbound.length > 0) {
        throw new UnboundPlaceholderError(option.template, unbound);
      }
    }
  }
}

/**
 * Render a command template to the text passed to the shell
 * (without the binary name)
 */
export function renderCommand(
  command: CommandTemplate,
  { strict }: RenderOptions,
): string {
  if (strict) assertBound(command);

  const bindings = command.bindings ?? [];
  const insertions = command.insertions ?? {};

  // Odd parts are marker names: fragments stay opaque to value binding
  return command.template
    .split(MARKER)
    .map((part, i) => {
      if (i % 2 === 0) return bindData(part, bindings, "escaped");
      const options = insertions[part];
      return options === undefined ? "" : renderOptions(options);
    })
    .join("");
}
