/**
 * Turns a lazy line sequence into output: one text block, a stream of
 * printed lines, or entry counts.
 */
import { SENTINELS, TREE } from '../constants';

import type { EntryCount } from './tree-types';

export interface TreeSink {
  print: (text: string) => void;
}

/**
 * Root label, a line break, then every line. `k` lines give `k + 1` lines of
 * text and no trailing line break.
 */
export function assembleTree(lines: Iterable<string>, rootLabel: string): string {
  const buffer = [rootLabel];
  for (const line of lines) {
    buffer.push(line);
  }
  return buffer.join(TREE.LINE_BREAK);
}

/**
 * Print the root label and each line as soon as it is produced. Nothing is
 * buffered, so there is no text to return.
 */
export function streamTree(lines: Iterable<string>, rootLabel: string, sink: TreeSink): '' {
  sink.print(rootLabel);
  for (const line of lines) {
    sink.print(line);
  }
  return '';
}

const SENTINEL_LABELS: readonly string[] = Object.values(SENTINELS);

function isSentinelLine(line: string): boolean {
  return SENTINEL_LABELS.some((label) => line.endsWith(label));
}

/**
 * Count directory and file lines in assembled text (the root line excluded).
 * Directory lines end with the directory marker; sentinel lines count as neither.
 */
export function countEntries(text: string): EntryCount {
  const count: EntryCount = { directories: 0, files: 0 };
  const lines = text.split(TREE.LINE_BREAK).slice(1);

  for (const line of lines) {
    if (!line || isSentinelLine(line)) continue;
    if (line.endsWith(TREE.DIRECTORY_MARKER)) {
      count.directories += 1;
    } else {
      count.files += 1;
    }
  }
  return count;
}

const plural = (n: number, singular: string, pluralForm: string) => `${n} ${n === 1 ? singular : pluralForm}`;

export function formatEntryCount(count: EntryCount): string {
  return `${plural(count.directories, 'directory', 'directories')}, ${plural(count.files, 'file', 'files')}`;
}
