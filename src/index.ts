/**
 * Public API
 */

export { GraphicsMagick, createGraphicsMagick } from "./gm";
export type { GraphicsMagickDeps } from "./gm";

export * as options from "./options";
export { bare, valued } from "./options";

export * from "./modules";
export * from "./utils";
export * from "./types";

export { GmWrapError, UnboundPlaceholderError, UnknownFieldError } from "./errors";
