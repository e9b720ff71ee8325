/**
 * Version command - Prints gm's version banner
 */

import type { Command } from "commander";
import { createClient, GlobalOptionsSchema } from "../client";

export async function versionCommand(
  _opts: unknown,
  command: Command,
): Promise<void> {
  try {
    const options = GlobalOptionsSchema.parse(command.optsWithGlobals());
    const gm = await createClient(options);
    process.stdout.write(gm.version());
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
}
