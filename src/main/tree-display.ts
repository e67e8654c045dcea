/**
 * TreeDisplay: holds a tree configuration, keeps the derived state (filters,
 * styles, comparator) in sync with it, and runs one of the output modes.
 */
import fs from 'node:fs';
import path from 'node:path';

import { DEFAULT_SORT_KEY, DEFAULT_STYLE, PACKAGE, TREE } from '../constants';
import { StyleRegistry, type StyleSpec } from '../file-ops/connector-styles';
import { TreeError } from '../file-ops/errors';
import { buildNameFilters, type FilterPair } from '../file-ops/filters';
import {
  assembleTree,
  countEntries,
  formatEntryCount,
  streamTree,
  type TreeSink,
} from '../file-ops/output-assembler';
import { rootLabel } from '../file-ops/path';
import { resolveSortKey, type NameComparator } from '../file-ops/sort-keys';
import { buildTree as buildTreeLines } from '../file-ops/tree-builder';
import type { DirectoryReader, TreeConfiguration } from '../file-ops/tree-types';
import { getErrorMessage, hasErrorCode } from '../utils/error-utils';
import { logger } from '../utils/logger';

import { consoleSink, fileSink, type FileSink } from './sinks';

export interface TreeDisplayOptions {
  rootDir?: string;
  /** Destination used when `saveToFile` is on */
  filepath?: string | null;
  ignoreDirs?: Iterable<string>;
  ignoreFiles?: Iterable<string>;
  includeDirs?: Iterable<string>;
  includeFiles?: Iterable<string>;
  style?: string;
  indent?: number;
  filesFirst?: boolean;
  skipSorting?: boolean;
  sortKey?: string;
  customSort?: NameComparator | null;
  reverse?: boolean;
  saveToFile?: boolean;
  printout?: boolean;
  /** Print lines while traversing instead of assembling; `display()` then returns '' */
  streamOutput?: boolean;
  entryCount?: boolean;
  followSymlinks?: boolean;
  sink?: TreeSink;
  fileSink?: FileSink;
  readDirectory?: DirectoryReader;
}

export class TreeDisplay {
  rootDir = process.cwd();
  filepath: string | null = null;
  ignoreDirs = new Set<string>();
  ignoreFiles = new Set<string>();
  includeDirs = new Set<string>();
  includeFiles = new Set<string>();
  style: string = DEFAULT_STYLE;
  filesFirst = false;
  skipSorting = false;
  sortKey: string = DEFAULT_SORT_KEY;
  customSort: NameComparator | null = null;
  reverse = false;
  saveToFile = true;
  printout = false;
  streamOutput = false;
  entryCount = false;
  followSymlinks = false;
  sink: TreeSink = consoleSink;
  fileSink: FileSink = fileSink;
  readDirectory: DirectoryReader | undefined;

  styles: StyleRegistry = new StyleRegistry();
  filters: FilterPair = buildNameFilters();

  constructor(options: TreeDisplayOptions = {}) {
    this.init(options);
  }

  static getVersion(): string {
    return PACKAGE.VERSION;
  }

  /**
   * Reset every setting to its default, apply `options`, and rebuild the
   * derived state. Styles registered earlier are kept.
   */
  init(options: TreeDisplayOptions = {}): this {
    this.rootDir = options.rootDir ?? process.cwd();
    this.filepath = options.filepath ?? null;
    this.ignoreDirs = new Set(options.ignoreDirs ?? []);
    this.ignoreFiles = new Set(options.ignoreFiles ?? []);
    this.includeDirs = new Set(options.includeDirs ?? []);
    this.includeFiles = new Set(options.includeFiles ?? []);
    this.style = options.style ?? DEFAULT_STYLE;
    this.filesFirst = options.filesFirst ?? false;
    this.skipSorting = options.skipSorting ?? false;
    this.sortKey = options.sortKey ?? DEFAULT_SORT_KEY;
    this.customSort = options.customSort ?? null;
    this.reverse = options.reverse ?? false;
    this.saveToFile = options.saveToFile ?? true;
    this.printout = options.printout ?? false;
    this.streamOutput = options.streamOutput ?? false;
    this.entryCount = options.entryCount ?? false;
    this.followSymlinks = options.followSymlinks ?? false;
    this.sink = options.sink ?? consoleSink;
    this.fileSink = options.fileSink ?? fileSink;
    this.readDirectory = options.readDirectory;

    this.styles = this.styles.withIndent(options.indent ?? TREE.DEFAULT_INDENT);
    this.updatePredicates();
    return this;
  }

  get indent(): number {
    return this.styles.indent;
  }

  /**
   * Rebuild both name predicates from the current ignore/include sets.
   * Call after mutating the sets; traversals already started keep the old pair.
   */
  updatePredicates(): FilterPair {
    this.filters = buildNameFilters({
      ignoreDirs: this.ignoreDirs,
      ignoreFiles: this.ignoreFiles,
      includeDirs: this.includeDirs,
      includeFiles: this.includeFiles,
    });
    return this.filters;
  }

  registerStyle(name: string, branch: string, end: string, verticalGlyph?: string): StyleSpec {
    return this.styles.register(name, branch, end, verticalGlyph);
  }

  formatStyle(): StyleSpec {
    return this.styles.resolve(this.style);
  }

  resolveSortKey(): NameComparator {
    return resolveSortKey(this.sortKey, this.customSort);
  }

  /**
   * Validate everything a traversal needs and freeze it. Throws before any
   * output is produced.
   */
  resolveConfiguration(): TreeConfiguration {
    const rootDir = path.resolve(this.rootDir);
    assertDirectory(rootDir);

    return Object.freeze({
      rootDir,
      style: this.formatStyle(),
      sortKey: this.sortKey,
      compare: this.resolveSortKey(),
      filesFirst: this.filesFirst,
      reverse: this.reverse,
      skipSorting: this.skipSorting,
      filters: this.filters,
      followSymlinks: this.followSymlinks,
    });
  }

  /**
   * Lazy line sequence for the configured root (root label not included).
   */
  buildTree(config: TreeConfiguration = this.resolveConfiguration()): Generator<string, void, undefined> {
    return buildTreeLines(config.rootDir, '', { ...config, readDirectory: this.readDirectory });
  }

  async display(): Promise<string> {
    const config = this.resolveConfiguration();
    const label = rootLabel(config.rootDir);
    const lines = this.buildTree(config);

    if (this.streamOutput) {
      return streamTree(lines, label, this.sink);
    }

    const info = assembleTree(lines, label);

    if (this.saveToFile && this.filepath) {
      await this.saveTree(info, this.filepath);
    }
    if (this.printout) {
      this.sink.print(info);
    }
    if (this.entryCount) {
      this.sink.print(formatEntryCount(countEntries(info)));
    }
    return info;
  }

  private async saveTree(text: string, destination: string): Promise<void> {
    const result = await this.fileSink.write(destination, text);
    if (!result.ok) {
      const message = getErrorMessage(result.error);
      logger.error(`Failed to save tree to ${result.path}: ${message}`);
      throw new TreeError('WRITE_FAILED', `Could not write '${result.path}': ${message}`, { path: result.path });
    }
    logger.info(`Saved tree to ${result.path} (${result.bytes} bytes)`);
  }
}

function assertDirectory(rootDir: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(rootDir);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      throw new TreeError('INVALID_ROOT', `The path '${rootDir}' does not exist.`, { rootDir });
    }
    throw error;
  }
  if (!stats.isDirectory()) {
    throw new TreeError('INVALID_ROOT', `The path '${rootDir}' is not a directory.`, { rootDir });
  }
}
