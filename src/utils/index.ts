/**
 * Utility exports
 */

// Template utilities
export { stringify } from "./stringify";
export { bindData, findUnbound, quote } from "./bind-data";
export { renderOption, renderOptions } from "./render-options";
export { renderCommand, spliceFragments } from "./render-command";
export type { CommandTemplate, RenderOptions } from "./render-command";

// Config utilities
export {
  BINARY_ENV_VAR,
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Classes
export { Logger } from "./logger";
