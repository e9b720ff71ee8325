/**
 * Command template type definitions
 */

/**
 * A value that can be bound into a command template.
 * Lists bind as several arguments (each quoted on its own in escaped mode).
 */
export type BindingValue =
  | number
  | bigint
  | string
  | Uint8Array
  | readonly BindingValue[];

export type Binding = readonly [name: string, value: BindingValue];

export type BindMode = "escaped" | "raw";

// A switch with no argument, e.g. "-strip"
export interface BareOption {
  kind: "bare";
  switch: string;
}

// A switch whose argument is rendered from a sub-template, e.g. "-resize" ":widthx:height"
export interface ValuedOption {
  kind: "valued";
  switch: string;
  template: string;
  bindings: readonly Binding[];
}

export type Option = BareOption | ValuedOption;

/**
 * Rendered fragments spliced into `{{marker}}` insertion points
 */
export type Fragments = Readonly<Record<string, string>>;
