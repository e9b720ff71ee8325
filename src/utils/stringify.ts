import type { BindingValue } from "../types";

const decoder = new TextDecoder();

/**
 * Convert a bindable value to its command-line text
 *
 * @example
 * stringify(42) // "42"
 * stringify("Center") // "Center"
 * stringify(Buffer.from("a.jpg")) // "a.jpg"
 * stringify(["a.jpg", 2]) // "a.jpg 2"
 */
export function stringify(value: BindingValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint") {
    return value.toString(10);
  }
  if (value instanceof Uint8Array) return decoder.decode(value);
  return value.map(stringify).join(" ");
}
