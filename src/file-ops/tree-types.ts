/**
 * Types shared by the tree builder, the assembler and the facade
 */
import type { StyleSpec } from './connector-styles';
import type { FilterPair } from './filters';
import type { NameComparator } from './sort-keys';

export type EntryKind = 'directory' | 'file';

/**
 * A child found while listing a directory. Lives for one listing only.
 */
export interface DirectoryEntry {
  name: string;
  kind: EntryKind;
  /** Set when the entry is a symbolic link; `kind` describes its target */
  isSymlink: boolean;
}

/**
 * Lists the immediate children of a directory. Throws the fs error when the
 * directory cannot be read.
 */
export type DirectoryReader = (dirPath: string) => DirectoryEntry[];

export interface BuildOptions {
  style: StyleSpec;
  compare: NameComparator;
  filesFirst: boolean;
  reverse: boolean;
  skipSorting: boolean;
  filters: FilterPair;
  followSymlinks?: boolean;
  readDirectory?: DirectoryReader;
}

/**
 * Fully resolved, frozen inputs for one traversal.
 */
export interface TreeConfiguration extends Readonly<Omit<BuildOptions, 'readDirectory'>> {
  readonly rootDir: string;
  readonly sortKey: string;
}

export interface EntryCount {
  directories: number;
  files: number;
}
