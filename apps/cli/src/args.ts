import { asConfigFormat, type ConfigFormat } from "@gatewise/config";
import { Command, Option } from "commander";

export type CommandName = "check" | "merge" | "compress";

export interface CommandOptions {
  compress: boolean;
  sortKeys: boolean;
  format?: ConfigFormat;
  out?: string;
}

export interface ParsedArgs {
  command: CommandName;
  files: string[];
  options: CommandOptions;
}

type RawOptions = {
  compress?: boolean;
  sortKeys?: boolean;
  format?: string;
  out?: string;
};

function toCommandOptions(command: CommandName, raw: RawOptions): CommandOptions {
  const format = raw.format === undefined ? undefined : asConfigFormat(raw.format);
  return {
    compress: command === "compress" || raw.compress === true,
    sortKeys: raw.sortKeys === true,
    ...(format !== undefined && { format }),
    ...(raw.out !== undefined && { out: raw.out })
  };
}

function addOutputOptions(command: Command): Command {
  return command
    .option("--sort-keys", "print type and field names in sorted order", false)
    .addOption(
      new Option("--format <format>", "output format (default: json, or the --out extension)").choices(["json", "yaml"])
    )
    .option("-o, --out <file>", "write the result to a file instead of stdout");
}

/**
 * Builds the `gatewise` program. `configure` runs before the subcommands are
 * added, so settings such as `exitOverride()` are inherited by them.
 */
export function createProgram(
  onCommand: (args: ParsedArgs) => void,
  configure?: (program: Command) => void
): Command {
  const program = new Command();
  program
    .name("gatewise")
    .description("Check, merge and compress GraphQL gateway configuration files")
    .showHelpAfterError()
    .addHelpText("after", "\nWithout files, paths are read from GATEWISE_CONFIG (comma separated).");
  configure?.(program);

  program
    .command("check")
    .description("validate each config file on its own")
    .argument("[files...]", "config files (.json, .yml, .yaml)")
    .action((files: string[]) => {
      onCommand({ command: "check", files, options: toCommandOptions("check", {}) });
    });

  addOutputOptions(
    program
      .command("merge")
      .description("merge config files in order, later files win")
      .argument("[files...]", "config files (.json, .yml, .yaml)")
      .option("--compress", "drop defaults and schemas before printing", false)
  ).action((files: string[], options: RawOptions) => {
    onCommand({ command: "merge", files, options: toCommandOptions("merge", options) });
  });

  addOutputOptions(
    program
      .command("compress")
      .description("print a single config file in its compressed form")
      .argument("[file]", "config file (.json, .yml, .yaml)")
      .allowExcessArguments(false)
  ).action((file: string | undefined, options: RawOptions) => {
    onCommand({
      command: "compress",
      files: file === undefined ? [] : [file],
      options: toCommandOptions("compress", options)
    });
  });

  return program;
}

/** Parses user arguments (without the node and script entries). */
export function parseArgs(argv: readonly string[], configure?: (program: Command) => void): ParsedArgs {
  const result: { parsed?: ParsedArgs } = {};
  createProgram(args => {
    result.parsed = args;
  }, configure).parse([...argv], { from: "user" });
  if (!result.parsed) {
    throw new Error("No command given");
  }
  return result.parsed;
}
