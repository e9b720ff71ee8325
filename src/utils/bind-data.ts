/**
 * Template Binder
 * Substitutes :name placeholders in a command template
 */

import type { Binding, BindingValue, BindMode } from "../types";
import { stringify } from "./stringify";

const PLACEHOLDER = /:([A-Za-z_][A-Za-z0-9_]*)/g;

function isList(value: BindingValue): value is readonly BindingValue[] {
  return Array.isArray(value);
}

/**
 * Wrap text in double quotes for `sh -c`
 * Escapes the characters the shell still expands inside double quotes
 *
 * @example
 * quote("my file.jpg") // "\"my file.jpg\""
 * quote("cost $5") // "\"cost \\$5\""
 */
export function quote(text: string): string {
  return `"${text.replace(/["\\$`]/g, "\\$&")}"`;
}

function render(value: BindingValue, mode: BindMode): string {
  if (mode === "raw") return stringify(value);
  if (isList(value)) return value.map((item) => render(item, mode)).join(" ");
  return quote(stringify(value));
}

/**
 * Find the binding for a placeholder word.
 * Escaped templates match whole words only. Raw sub-templates may run a
 * literal straight on, so ":widthx:height" binds `width` then "x"; the
 * longest bound prefix wins and a tail starting with "_" never matches
 */
function matchBinding(
  word: string,
  values: ReadonlyMap<string, BindingValue>,
  mode: BindMode,
): [string, BindingValue] | undefined {
  const exact = values.get(word);
  if (exact !== undefined) return [word, exact];
  if (mode === "escaped") return undefined;

  let best: [string, BindingValue] | undefined;
  for (const [name, value] of values) {
    if (name.length === 0 || !word.startsWith(name)) continue;
    if (word.charAt(name.length) === "_") continue;
    if (best === undefined || name.length > best[0].length) {
      best = [name, value];
    }
  }
  return best;
}

/**
 * Bind values into a template in a single left-to-right pass.
 * Substituted text is never scanned again, and a binding whose placeholder
 * is absent leaves the template unchanged. For a repeated name the last
 * binding wins.
 *
 * @example
 * bindData(":file", [["file", "a.jpg"]], "escaped") // "\"a.jpg\""
 * bindData(":widthx:height", [["width", 10], ["height", 20]], "raw") // "10x20"
 */
export function bindData(
  template: string,
  bindings: readonly Binding[],
  mode: BindMode,
): string {
  const values = new Map<string, BindingValue>(bindings);

  return template.replace(PLACEHOLDER, (match: string, word: string) => {
    const found = matchBinding(word, values, mode);
    if (found === undefined) return match;

    const [name, value] = found;
    return render(value, mode) + word.slice(name.length);
  });
}

/**
 * List the placeholder words in a template that no binding covers,
 * matching words the way bindData does in the same mode
 */
export function findUnbound(
  template: string,
  bindings: readonly Binding[],
  mode: BindMode,
): string[] {
  const values = new Map<string, BindingValue>(bindings);
  const missing = new Set<string>();

  for (const [, word] of template.matchAll(PLACEHOLDER)) {
    if (matchBinding(word, values, mode) === undefined) missing.add(word);
  }

  return [...missing];
}
