/**
 * Config command - Prints where gmwrap looks for its user config
 */

import chalk from "chalk";
import { getUserConfigPath } from "../../utils";

export function configCommand(): void {
  console.log(chalk.bold("gmwrap reads user settings from:"));
  console.log(`  ${getUserConfigPath()}`);
  console.log(
    chalk.dim(
      '\nExample: { "binary": "/usr/local/bin/gm", "logging": { "level": "debug" } }',
    ),
  );
  console.log(chalk.dim("GMWRAP_BINARY and --binary override the binary setting."));
}
