/**
 * GraphicsMagick client
 * One method per gm subcommand; each call renders a template, runs it once
 * and interprets the output
 */

import {
  ShellExecutor,
  classifyOutput,
  identifyFormatString,
  matchErrorRule,
  parseIdentifyExplicit,
  type Executor,
  type FormatField,
} from "./modules";
import type {
  CommandResult,
  GmConfig,
  MetadataResult,
  Option,
  PartialGmConfig,
  TextResult,
} from "./types";
import {
  Logger,
  loadDefaultConfig,
  mergeConfig,
  renderCommand,
  type CommandTemplate,
} from "./utils";

export interface GraphicsMagickDeps {
  executor?: Executor;
  logger?: Logger;
}

export class GraphicsMagick {
  private executor: Executor;
  private logger: Logger;

  constructor(
    readonly config: GmConfig,
    deps: GraphicsMagickDeps = {},
  ) {
    this.executor = deps.executor ?? new ShellExecutor(config.shell);
    this.logger = (deps.logger ?? new Logger(config.logging.level)).child("gm");
  }

  /**
   * Build the full command line, binary name included
   */
  command(template: CommandTemplate): string {
    const rendered = renderCommand(template, {
      strict: this.config.templates.strictPlaceholders,
    });
    return `${this.config.binary} ${rendered}`;
  }

  private exec(template: CommandTemplate): string {
    const command = this.command(template);
    this.logger.debug(`Running: ${command}`);

    const { output, status } = this.executor.run(command);
    if (status !== 0) {
      // Exit status is not used for classification, only the output text
      this.logger.debug(`Exited with status ${status ?? "none"}`);
    }
    return output;
  }

  private run(template: CommandTemplate): CommandResult {
    const result = classifyOutput(this.exec(template));
    if (!result.ok) {
      this.logger.debug(`Failed: ${result.error.kind}`);
    }
    return result;
  }

  /**
   * Read selected image properties as a typed record
   *
   * @example
   * gm.identifyExplicit("photo.jpg", ["filename", "width", "height", "type"])
   * // { ok: true, value: { filename: "photo.jpg", width: 640, height: 480, type: "JPEG" } }
   */
  identifyExplicit(
    file: string,
    fields: readonly FormatField[],
  ): MetadataResult {
    const output = this.exec({
      template: "identify -format :format_string :file",
      bindings: [
        ["file", file],
        ["format_string", identifyFormatString(fields)],
      ],
    });

    const kind = matchErrorRule(output);
    if (kind !== null) return { ok: false, error: { kind } };

    return parseIdentifyExplicit(output);
  }

  /**
   * Raw `gm identify` output. Only the known error patterns count as failures,
   * since identify always prints on success
   */
  identify(file: string, options: readonly Option[] = []): TextResult {
    const output = this.exec({
      template: "identify {{options}} :file",
      bindings: [["file", file]],
      insertions: { options },
    });

    const kind = matchErrorRule(output);
    if (kind !== null) return { ok: false, error: { kind } };

    return { ok: true, value: output };
  }

  /**
   * Composite `file` over `baseFile` into `output`
   */
  composite(
    file: string,
    baseFile: string,
    output: string,
    options: readonly Option[] = [],
  ): CommandResult {
    return this.run({
      template: "composite {{options}} :input_file :output_file",
      bindings: [
        ["input_file", [file, baseFile]],
        ["output_file", output],
      ],
      insertions: { options },
    });
  }

  /**
   * Convert `file` to `output`. Options apply to the input image,
   * output options go between the input and output file names
   */
  convert(
    file: string,
    output: string,
    options: readonly Option[] = [],
    outputOptions: readonly Option[] = [],
  ): CommandResult {
    return this.run({
      template:
        "convert {{options}} :input_file {{output_options}} :output_file",
      bindings: [
        ["input_file", file],
        ["output_file", output],
      ],
      insertions: { options, output_options: outputOptions },
    });
  }

  /**
   * Transform `file` in place
   */
  mogrify(file: string, options: readonly Option[] = []): CommandResult {
    return this.run({
      template: "mogrify {{options}} :file",
      bindings: [["file", file]],
      insertions: { options },
    });
  }

  /**
   * Combine `files` into a single `output` image
   */
  montage(
    files: readonly string[],
    output: string,
    options: readonly Option[] = [],
  ): CommandResult {
    return this.run({
      template: "montage {{options}} :input_file :output_file",
      bindings: [
        ["input_file", files],
        ["output_file", output],
      ],
      insertions: { options },
    });
  }

  /**
   * Raw `gm version` output
   */
  version(): string {
    return this.exec({ template: "version" });
  }
}

/**
 * Create a client from the default config merged with `config`
 */
export function createGraphicsMagick(
  config: PartialGmConfig = {},
  deps: GraphicsMagickDeps = {},
): GraphicsMagick {
  return new GraphicsMagick(mergeConfig(loadDefaultConfig(), config), deps);
}
