/**
 * Path utilities for root labels and output destinations
 */
import * as nodePath from 'node:path';

import { TREE } from '../constants';

/**
 * Extract the basename from a path string
 * @param path The path to extract the basename from
 * @returns The basename (last part of the path)
 */
export function basename(path: string | null | undefined): string {
  if (!path) return "";
  return nodePath.basename(String(path));
}

/**
 * Normalizes a file path to use forward slashes and no trailing slash
 * @param path The path to normalize
 * @returns Normalized path
 */
export function normalizePath(path: string | null | undefined): string {
  if (!path) return '';
  const norm = nodePath.normalize(String(path)).replace(/\\/g, '/');
  return norm === '/' ? '/' : norm.replace(/\/$/, '');
}

/**
 * First line of the rendered tree: the root directory's name plus the
 * directory marker. A filesystem root has no name and renders as itself.
 */
export function rootLabel(rootPath: string): string {
  const resolved = nodePath.resolve(rootPath);
  const name = basename(resolved);
  if (!name) return normalizePath(resolved);
  return `${name}${TREE.DIRECTORY_MARKER}`;
}

/**
 * Where a tree is saved when no path is given: next to the root directory,
 * named after it, e.g. `/work/project` → `/work/project_filetree.txt`.
 */
export function defaultOutputPath(rootPath: string, suffix: string = TREE.DEFAULT_OUTPUT_SUFFIX): string {
  const resolved = nodePath.resolve(rootPath);
  const name = basename(resolved) || 'root';
  return nodePath.join(nodePath.dirname(resolved), `${name}${suffix}`);
}
