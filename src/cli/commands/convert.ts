/**
 * Convert command - Converts an image with common options
 */

import type { Command } from "commander";
import ora from "ora";
import { z } from "zod";
import { autoOrient, quality, strip } from "../../options";
import type { Option } from "../../types";
import { createClient, describeError, GlobalOptionsSchema } from "../client";
import { parseResize } from "../geometry";

const ConvertOptionsSchema = GlobalOptionsSchema.extend({
  resize: z.string().optional(),
  quality: z.coerce.number().int().min(0).max(100).optional(),
  strip: z.boolean().optional(),
  autoOrient: z.boolean().optional(),
});

type ConvertOptions = z.infer<typeof ConvertOptionsSchema>;

/**
 * Build input and output option lists from CLI flags.
 * Orientation and resize apply to the input, quality and strip to the output
 */
export function buildConvertOptions(options: ConvertOptions): {
  input: Option[];
  output: Option[];
} {
  const input: Option[] = [];
  const output: Option[] = [];

  if (options.autoOrient) input.push(autoOrient());
  if (options.resize) {
    const option = parseResize(options.resize);
    if (!option) throw new Error(`Invalid resize geometry "${options.resize}"`);
    input.push(option);
  }

  if (options.strip) output.push(strip());
  if (options.quality !== undefined) output.push(quality(options.quality));

  return { input, output };
}

export async function convertCommand(
  input: string,
  output: string,
  _opts: unknown,
  command: Command,
): Promise<void> {
  const spinner = ora({ text: `Converting ${input}...`, indent: 2 }).start();

  try {
    const options = ConvertOptionsSchema.parse(command.optsWithGlobals());
    const gm = await createClient(options);
    const optionLists = buildConvertOptions(options);

    const result = gm.convert(input, output, optionLists.input, optionLists.output);

    if (result.ok) {
      spinner.succeed(`Wrote ${output}`);
    } else {
      spinner.fail(describeError(result.error));
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Conversion failed");
    console.error(error);
    process.exit(1);
  }
}
