/**
 * Depth-first, pre-order directory traversal producing tree lines lazily
 */
import fs from 'node:fs';
import * as nodePath from 'node:path';

import { SENTINELS, TREE } from '../constants';
import { hasErrorCode, isFileSystemError } from '../utils/error-utils';
import { logger } from '../utils/logger';

import type { BuildOptions, DirectoryEntry } from './tree-types';

const PERMISSION_CODES = ['EACCES', 'EPERM'] as const;

function entryKindOf(dirPath: string, dirent: fs.Dirent): Pick<DirectoryEntry, 'kind' | 'isSymlink'> {
  if (!dirent.isSymbolicLink()) {
    return { kind: dirent.isDirectory() ? 'directory' : 'file', isSymlink: false };
  }
  try {
    const target = fs.statSync(nodePath.join(dirPath, dirent.name));
    return { kind: target.isDirectory() ? 'directory' : 'file', isSymlink: true };
  } catch {
    // dangling link
    return { kind: 'file', isSymlink: true };
  }
}

/**
 * Default reader: opens a directory handle, drains it and always closes it.
 */
export function readDirectoryEntries(dirPath: string): DirectoryEntry[] {
  const dir = fs.opendirSync(dirPath);
  const entries: DirectoryEntry[] = [];
  try {
    let dirent = dir.readSync();
    while (dirent !== null) {
      entries.push({ name: dirent.name, ...entryKindOf(dirPath, dirent) });
      dirent = dir.readSync();
    }
  } finally {
    dir.closeSync();
  }
  return entries;
}

/**
 * Filtered, ordered children of one directory.
 */
export function orderEntries(entries: readonly DirectoryEntry[], options: BuildOptions): DirectoryEntry[] {
  const { filters, compare, filesFirst, reverse, skipSorting } = options;
  const admitted = (entry: DirectoryEntry) =>
    entry.kind === 'directory' ? filters.dirFilter(entry.name) : filters.fileFilter(entry.name);

  if (skipSorting) {
    return entries.filter(admitted);
  }

  const byName = (a: DirectoryEntry, b: DirectoryEntry) => compare(a.name, b.name);
  const dirs = entries.filter((e) => e.kind === 'directory' && admitted(e)).sort(byName);
  const files = entries.filter((e) => e.kind !== 'directory' && admitted(e)).sort(byName);

  if (reverse) {
    dirs.reverse();
    files.reverse();
  }

  return filesFirst ? [...files, ...dirs] : [...dirs, ...files];
}

/**
 * Yield one line per visible entry under `dirPath`, recursing into each
 * directory right after its own line.
 *
 * A directory that cannot be listed yields a single sentinel line instead of
 * its children: `[Permission Denied]` for EACCES/EPERM, `[Error reading
 * directory]` for any other fs error. Errors without an errno code propagate.
 *
 * The sequence lists the filesystem as it is consumed and cannot be replayed.
 */
export function* buildTree(dirPath: string, prefix: string, options: BuildOptions): Generator<string, void, undefined> {
  const { style } = options;
  const readDirectory = options.readDirectory ?? readDirectoryEntries;

  let entries: DirectoryEntry[];
  try {
    entries = readDirectory(dirPath);
  } catch (error) {
    if (hasErrorCode(error, ...PERMISSION_CODES)) {
      logger.debug(`Permission denied: ${dirPath}`);
      yield `${prefix}${style.end}${SENTINELS.PERMISSION_DENIED}`;
      return;
    }
    if (isFileSystemError(error)) {
      logger.debug(`Cannot read directory ${dirPath}: ${error.code}`);
      yield `${prefix}${style.end}${SENTINELS.READ_ERROR}`;
      return;
    }
    throw error;
  }

  const ordered = orderEntries(entries, options);
  const lastIndex = ordered.length - 1;

  for (const [index, entry] of ordered.entries()) {
    const isLast = index === lastIndex;
    const connector = isLast ? style.end : style.branch;

    if (entry.kind !== 'directory') {
      yield `${prefix}${connector}${entry.name}`;
      continue;
    }

    yield `${prefix}${connector}${entry.name}${TREE.DIRECTORY_MARKER}`;
    if (entry.isSymlink && !options.followSymlinks) continue;

    const childPrefix = prefix + (isLast ? style.space : style.vertical);
    yield* buildTree(nodePath.join(dirPath, entry.name), childPrefix, options);
  }
}
