#!/usr/bin/env tsx

/**
 * CLI entry point for gmwrap
 * Handles command-line argument parsing
 */

import { Command } from "commander";
import { configCommand } from "./commands/config";
import { convertCommand } from "./commands/convert";
import { identifyCommand } from "./commands/identify";
import { montageCommand } from "./commands/montage";
import { versionCommand } from "./commands/version";

const program = new Command();

program
  .name("gmwrap")
  .description("Run GraphicsMagick commands and report typed results")
  .version("0.1.0")
  .option("--binary <path>", "GraphicsMagick binary (default: gm)")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Log each command before running it");

program
  .command("identify <file>")
  .description("Print image properties")
  .option("-f, --fields <names...>", "Print only these fields as JSON (e.g., --fields width height type)")
  .action(identifyCommand);

program
  .command("convert <input> <output>")
  .description("Convert an image")
  .option("-r, --resize <geometry>", "Resize to WIDTHxHEIGHT[!<>^] or PERCENT%")
  .option("-q, --quality <n>", "Output quality (0-100)")
  .option("--strip", "Remove profiles and comments")
  .option("--auto-orient", "Rotate according to EXIF orientation")
  .action(convertCommand);

program
  .command("montage <patterns...>")
  .description("Combine images matching glob patterns into one image")
  .requiredOption("-o, --output <path>", "Output image")
  .option("-t, --tile <geometry>", "Grid as COLUMNSxROWS")
  .action(montageCommand);

program
  .command("version")
  .description("Show the GraphicsMagick version")
  .action(versionCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
