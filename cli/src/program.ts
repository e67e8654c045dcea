import path from "node:path";

import { Command, CommanderError, Option } from "commander";

import {
  BUILT_IN_STYLES,
  DEFAULT_SORT_KEY,
  DEFAULT_STYLE,
  PACKAGE,
  TEXT_SORT_KEYS,
  TREE,
} from "../../src/constants";
import { isConfigurationError } from "../../src/file-ops/errors";
import type { TreeSink } from "../../src/file-ops/output-assembler";
import { defaultOutputPath } from "../../src/file-ops/path";
import { fileSink as defaultFileSink, type FileSink } from "../../src/main/sinks";
import { TreeDisplay } from "../../src/main/tree-display";
import { getErrorMessage } from "../../src/utils/error-utils";
import { setLogLevel } from "../../src/utils/logger";

import { loadConfigFile, mergeConfig, type CliOptions, type MergedOptions } from "./config";
import { parseIndent, parseNameList } from "./util/parse";

export type ExitCode =
  | 0  // Success
  | 1  // Runtime failure (write error, unexpected fs error)
  | 2; // Validation or configuration error

export interface CliDeps {
  cwd?: string;
  sink?: TreeSink;
  fileSink?: FileSink;
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name(PACKAGE.NAME)
    .description(
      "Display a filtered directory tree.\n" +
      "Each of the ignore/include options takes space-separated names or one list literal, e.g. \"['.git', '.idea']\"."
    )
    .version(TreeDisplay.getVersion(), "-v, --version", "Print the version")
    .option("--cfg <path>", "Path to JSON config file")
    .option("-r, --root-dir <dir>", "Root directory to display (default: current directory)")
    .option("-o, --filepath <path>", `Output file path (default: <root>${TREE.DEFAULT_OUTPUT_SUFFIX} next to the root)`)
    .option("--ignore-dirs <names...>", "Directory names or patterns to ignore")
    .option("--ignore-files <names...>", "File names or patterns to ignore")
    .option("--include-dirs <names...>", "Only show directories matching these names or patterns")
    .option("--include-files <names...>", "Only show files matching these names or patterns")
    .addOption(new Option("-s, --style <style>", "Tree connector style").choices(BUILT_IN_STYLES).default(DEFAULT_STYLE))
    .option("-i, --indent <width>", "Indent width per level", parseIndent, TREE.DEFAULT_INDENT)
    .option("-f, --files-first", "List files before directories", false)
    .option("--skip-sorting", "Keep the directory listing order", false)
    .addOption(
      new Option("--sort-key <key>", "Sort key (custom sorting is available from the library API only)")
        .choices(TEXT_SORT_KEYS)
        .default(DEFAULT_SORT_KEY)
    )
    .option("--reverse", "Reverse sort order", false)
    .option("--no-save", "Do not save to file")
    .option("-p, --printout", "Print the tree to stdout", false)
    .option("--stream", "Print lines while the tree is built; nothing is saved", false)
    .option("-c, --count", "Print directory and file counts", false)
    .option("--follow-symlinks", "Descend into symlinked directories", false)
    .option("--debug", "Enable debug logging", false);

  return program;
}

function withParsedLists(cli: CliOptions): CliOptions {
  return {
    ...cli,
    ignoreDirs: parseNameList(cli.ignoreDirs),
    ignoreFiles: parseNameList(cli.ignoreFiles),
    includeDirs: parseNameList(cli.includeDirs),
    includeFiles: parseNameList(cli.includeFiles),
  };
}

/**
 * Build a TreeDisplay from merged options and run it.
 */
export async function runTree(options: MergedOptions, deps: CliDeps = {}): Promise<string> {
  const cwd = deps.cwd ?? process.cwd();
  const rootDir = path.resolve(cwd, options.rootDir ?? ".");
  const save = options.save && !options.stream;
  const writeErr = deps.writeErr ?? ((text: string) => process.stderr.write(text));
  const targetSink = deps.fileSink ?? defaultFileSink;

  const reportingSink: FileSink = {
    write: async (destination, text) => {
      const result = await targetSink.write(destination, text);
      if (result.ok) writeErr(`Wrote ${result.bytes} bytes to ${result.path}\n`);
      return result;
    },
  };

  const display = new TreeDisplay({
    rootDir,
    filepath: save ? path.resolve(cwd, options.filepath ?? defaultOutputPath(rootDir)) : null,
    ignoreDirs: options.ignoreDirs,
    ignoreFiles: options.ignoreFiles,
    includeDirs: options.includeDirs,
    includeFiles: options.includeFiles,
    style: options.style,
    indent: options.indent,
    filesFirst: options.filesFirst,
    skipSorting: options.skipSorting,
    sortKey: options.sortKey,
    reverse: options.reverse,
    saveToFile: save,
    printout: options.printout,
    streamOutput: options.stream,
    entryCount: options.count,
    followSymlinks: options.followSymlinks,
    sink: deps.sink,
    fileSink: reportingSink,
  });

  return display.display();
}

export async function run(argv: readonly string[], deps: CliDeps = {}): Promise<ExitCode> {
  const writeOut = deps.writeOut ?? ((text: string) => process.stdout.write(text));
  const writeErr = deps.writeErr ?? ((text: string) => process.stderr.write(text));

  const program = createProgram()
    .exitOverride()
    .configureOutput({ writeOut, writeErr });

  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version also end up here, with exit code 0
      return error.exitCode === 0 ? 0 : 2;
    }
    throw error;
  }

  const cli = program.opts<CliOptions>();
  if (cli.debug) setLogLevel("debug");

  try {
    const cfg = loadConfigFile(cli.cfg);
    const merged = mergeConfig(withParsedLists(cli), cfg, (key) => program.getOptionValueSource(key) === "cli");
    await runTree(merged, { ...deps, writeErr });
    return 0;
  } catch (error) {
    writeErr(`Error: ${getErrorMessage(error)}\n`);
    return isConfigurationError(error) ? 2 : 1;
  }
}
