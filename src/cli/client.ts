/**
 * Shared CLI setup - global options, config loading and result display
 */

import chalk from "chalk";
import { z } from "zod";
import { GraphicsMagick } from "../gm";
import type { GmError } from "../types";
import { Logger, loadConfig, mergeConfig } from "../utils";

export const GlobalOptionsSchema = z.object({
  binary: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/**
 * Load configuration (default → user → custom → CLI flags) and build a client
 */
export async function createClient(
  options: GlobalOptions,
): Promise<GraphicsMagick> {
  const { config: loaded, errors } = await loadConfig(options.config);

  const config = mergeConfig(loaded, {
    ...(options.binary ? { binary: options.binary } : {}),
    ...(options.verbose ? { logging: { level: "debug" as const } } : {}),
  });

  const logger = new Logger(config.logging.level);
  for (const err of errors) {
    logger.warn(`Ignoring config file ${err.path}: ${err.error.message}`);
  }

  return new GraphicsMagick(config, { logger });
}

/**
 * Human-readable description of a gm failure
 */
export function describeError(error: GmError): string {
  switch (error.kind) {
    case "binary-not-found":
      return "gm binary not found (use --binary or GMWRAP_BINARY)";
    case "input-file-missing":
      return "Input file does not exist";
    case "no-image-produced":
      return "gm did not produce an image";
    case "cannot-open-input":
      return "gm could not open the input image";
    case "malformed-metadata-field":
      return `Could not parse identify output (${error.reason}): ${error.segment}`;
    case "unclassified":
      return error.output.trim();
  }
}

export function reportFailure(error: GmError): void {
  console.error(chalk.red(`✖ ${describeError(error)}`));
  process.exitCode = 1;
}
