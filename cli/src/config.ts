import fs from "node:fs";

import { z } from "zod";

import { TEXT_SORT_KEYS, TREE } from "../../src/constants";
import { TreeError } from "../../src/file-ops/errors";
import { getErrorMessage } from "../../src/utils/error-utils";

// Keys mirror the CLI option names (camelCase)
export const treeConfigFileSchema = z
  .object({
    rootDir: z.string().min(1).optional(),
    filepath: z.string().min(1).optional(),
    ignoreDirs: z.array(z.string()).optional(),
    ignoreFiles: z.array(z.string()).optional(),
    includeDirs: z.array(z.string()).optional(),
    includeFiles: z.array(z.string()).optional(),
    style: z.string().min(1).optional(),
    indent: z.number().int().min(TREE.MIN_INDENT).max(TREE.MAX_INDENT).optional(),
    filesFirst: z.boolean().optional(),
    skipSorting: z.boolean().optional(),
    sortKey: z.enum(TEXT_SORT_KEYS).optional(),
    reverse: z.boolean().optional(),
    save: z.boolean().optional(),
    printout: z.boolean().optional(),
    stream: z.boolean().optional(),
    count: z.boolean().optional(),
    followSymlinks: z.boolean().optional(),
  })
  .strict();

export type TreeConfigFile = z.infer<typeof treeConfigFileSchema>;
export type ConfigKey = keyof TreeConfigFile;

/** Options as commander hands them over */
export interface CliOptions {
  cfg?: string;
  rootDir?: string;
  filepath?: string;
  ignoreDirs?: string[];
  ignoreFiles?: string[];
  includeDirs?: string[];
  includeFiles?: string[];
  style: string;
  indent: number;
  filesFirst: boolean;
  skipSorting: boolean;
  sortKey: string;
  reverse: boolean;
  save: boolean;
  printout: boolean;
  stream: boolean;
  count: boolean;
  followSymlinks: boolean;
  debug: boolean;
}

export type MergedOptions = Omit<CliOptions, "cfg" | "debug">;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Read and validate a JSON config file. No path means no config.
 */
export function loadConfigFile(cfgPath?: string): TreeConfigFile {
  if (!cfgPath) return {};

  let raw: string;
  try {
    raw = fs.readFileSync(cfgPath, "utf8");
  } catch (error) {
    throw new TreeError("INVALID_CONFIG", `Cannot read config file '${cfgPath}': ${getErrorMessage(error)}`, { cfgPath });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new TreeError("INVALID_CONFIG", `Config file '${cfgPath}' is not valid JSON: ${getErrorMessage(error)}`, { cfgPath });
  }

  const parsed = treeConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new TreeError("INVALID_CONFIG", `Invalid config file '${cfgPath}': ${formatIssues(parsed.error)}`, { cfgPath });
  }
  return parsed.data;
}

/**
 * Merge CLI options with a config file.
 * Flags the user typed win over the file; CLI defaults do not.
 */
export function mergeConfig(
  cli: CliOptions,
  cfg: TreeConfigFile,
  isExplicit: (key: ConfigKey) => boolean
): MergedOptions {
  const take = <T>(key: ConfigKey, cliValue: T, fileValue: T | undefined): T =>
    isExplicit(key) || fileValue === undefined ? cliValue : fileValue;

  return {
    rootDir: take("rootDir", cli.rootDir, cfg.rootDir),
    filepath: take("filepath", cli.filepath, cfg.filepath),
    ignoreDirs: take("ignoreDirs", cli.ignoreDirs, cfg.ignoreDirs),
    ignoreFiles: take("ignoreFiles", cli.ignoreFiles, cfg.ignoreFiles),
    includeDirs: take("includeDirs", cli.includeDirs, cfg.includeDirs),
    includeFiles: take("includeFiles", cli.includeFiles, cfg.includeFiles),
    style: take("style", cli.style, cfg.style),
    indent: take("indent", cli.indent, cfg.indent),
    filesFirst: take("filesFirst", cli.filesFirst, cfg.filesFirst),
    skipSorting: take("skipSorting", cli.skipSorting, cfg.skipSorting),
    sortKey: take("sortKey", cli.sortKey, cfg.sortKey),
    reverse: take("reverse", cli.reverse, cfg.reverse),
    save: take("save", cli.save, cfg.save),
    printout: take("printout", cli.printout, cfg.printout),
    stream: take("stream", cli.stream, cfg.stream),
    count: take("count", cli.count, cfg.count),
    followSymlinks: take("followSymlinks", cli.followSymlinks, cfg.followSymlinks),
  };
}
