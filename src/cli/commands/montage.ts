/**
 * Montage command - Combines images matching glob patterns into one sheet
 */

import type { Command } from "commander";
import glob from "fast-glob";
import ora from "ora";
import { z } from "zod";
import type { Option } from "../../types";
import { createClient, describeError, GlobalOptionsSchema } from "../client";
import { parseTile } from "../geometry";

const MontageOptionsSchema = GlobalOptionsSchema.extend({
  output: z.string(),
  tile: z.string().optional(),
});

/**
 * Expand glob patterns to a sorted, de-duplicated file list
 */
export async function expandInputs(
  patterns: readonly string[],
  cwd: string = process.cwd(),
): Promise<string[]> {
  const files = await glob([...patterns], { cwd, onlyFiles: true });
  return [...new Set(files)].sort();
}

export async function montageCommand(
  patterns: string[],
  _opts: unknown,
  command: Command,
): Promise<void> {
  const spinner = ora({ text: "Collecting images...", indent: 2 }).start();

  try {
    const options = MontageOptionsSchema.parse(command.optsWithGlobals());
    const gm = await createClient(options);

    const files = await expandInputs(patterns);
    if (files.length === 0) {
      spinner.fail("No input images matched");
      process.exitCode = 1;
      return;
    }

    const montageOptions: Option[] = [];
    if (options.tile) {
      const option = parseTile(options.tile);
      if (!option) throw new Error(`Invalid tile geometry "${options.tile}"`);
      montageOptions.push(option);
    }

    spinner.text = `Combining ${files.length} images...`;
    const result = gm.montage(files, options.output, montageOptions);

    if (result.ok) {
      spinner.succeed(`Wrote ${options.output}`);
    } else {
      spinner.fail(describeError(result.error));
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Montage failed");
    console.error(error);
    process.exit(1);
  }
}
