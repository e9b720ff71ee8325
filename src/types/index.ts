/**
 * Central type exports
 */

// Configuration
export type {
  GmConfig,
  PartialGmConfig,
  TemplatesConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export { GmConfigSchema, PartialGmConfigSchema } from "./config";

// Templates and options
export type {
  BindingValue,
  Binding,
  BindMode,
  BareOption,
  ValuedOption,
  Option,
  Fragments,
} from "./options";

// Results
export type {
  KnownErrorKind,
  KnownError,
  UnclassifiedError,
  MalformedFieldError,
  GmError,
  GmErrorKind,
  Result,
  CommandResult,
  TextResult,
  MetadataValue,
  MetadataRecord,
  MetadataResult,
} from "./result";
