/**
 * Identify command - Prints image properties
 */

import type { Command } from "commander";
import { z } from "zod";
import { isFormatField, type FormatField } from "../../modules";
import { createClient, GlobalOptionsSchema, reportFailure } from "../client";

const FieldSchema = z.custom<FormatField>(
  (value) => typeof value === "string" && isFormatField(value),
  { message: "Unknown identify field" },
);

const IdentifyOptionsSchema = GlobalOptionsSchema.extend({
  fields: z.array(FieldSchema).optional(),
});

export async function identifyCommand(
  file: string,
  _opts: unknown,
  command: Command,
): Promise<void> {
  try {
    const options = IdentifyOptionsSchema.parse(command.optsWithGlobals());
    const gm = await createClient(options);

    // Explicit fields → JSON record, otherwise gm's own identify output
    if (options.fields) {
      const result = gm.identifyExplicit(file, options.fields);
      if (!result.ok) return reportFailure(result.error);
      console.log(JSON.stringify(result.value, null, 2));
      return;
    }

    const result = gm.identify(file);
    if (!result.ok) return reportFailure(result.error);
    process.stdout.write(result.value);
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
}
