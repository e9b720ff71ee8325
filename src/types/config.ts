/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const TemplatesConfigSchema = z.object({
  // Fail before running when a :name placeholder has no binding.
  // false keeps unbound placeholders in the command as literal text
  strictPlaceholders: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const GmConfigSchema = z.object({
  // Resolved through PATH by the shell unless absolute
  binary: z.string().min(1),
  // Shell that runs each command line, with stderr joined to stdout
  shell: z.string().min(1),
  templates: TemplatesConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialGmConfigSchema = GmConfigSchema.partial().extend({
  templates: TemplatesConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type TemplatesConfig = z.infer<typeof TemplatesConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type GmConfig = z.infer<typeof GmConfigSchema>;
export type PartialGmConfig = z.infer<typeof PartialGmConfigSchema>;

export interface ConfigError {
  path: string;
  error: Error;
}
