/**
 * Sort resolution for directory entry names.
 */
import { SORT_KEYS, type SortKeyName } from '../constants';

import { TreeError } from './errors';

export type NameComparator = (a: string, b: string) => number;

/**
 * Plain code-point order (not UTF-16 unit order, which misplaces astral characters).
 */
export function compareCodePoints(a: string, b: string): number {
  if (a === b) return 0;
  const left = [...a];
  const right = [...b];
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  if (left.length === right.length) return 0;
  return left.length < right.length ? -1 : 1;
}

/** Numeric comparison of two digit runs of any length */
function compareDigitRuns(a: string, b: string): number {
  const left = a.replace(/^0+(?=\d)/, '');
  const right = b.replace(/^0+(?=\d)/, '');
  if (left.length !== right.length) return left.length < right.length ? -1 : 1;
  return compareCodePoints(left, right);
}

const DIGIT_RUN = /(\d+)/;

/**
 * Numeric-aware ordering: `file2` before `file10`, letters case-insensitive.
 * Names that only differ in case or leading zeros fall back to code-point order.
 */
export function compareNatural(a: string, b: string): number {
  // split with a capture group alternates text, digits, text, ... starting with text
  const left = a.split(DIGIT_RUN);
  const right = b.split(DIGIT_RUN);
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    const result = i % 2 === 1
      ? compareDigitRuns(left[i], right[i])
      : compareCodePoints(left[i].toLowerCase(), right[i].toLowerCase());
    if (result !== 0) return result;
  }

  if (left.length !== right.length) return left.length < right.length ? -1 : 1;
  return compareCodePoints(a, b);
}

export function isSortKeyName(name: string): name is SortKeyName {
  return SORT_KEYS.some((key) => key === name);
}

/**
 * Map a sort-key name to a comparator. Fails before any traversal starts.
 */
export function resolveSortKey(name: string, customComparator?: NameComparator | null): NameComparator {
  if (!isSortKeyName(name)) {
    throw new TreeError('UNKNOWN_SORT_KEY', `Invalid sort key name '${name}'. Expected one of: ${SORT_KEYS.join(', ')}`, { sortKey: name });
  }

  switch (name) {
    case 'natural': {
      return compareNatural;
    }
    case 'lex': {
      return compareCodePoints;
    }
    case 'custom': {
      if (!customComparator) {
        throw new TreeError('MISSING_COMPARATOR', "A custom comparator must be specified when sort key is 'custom'");
      }
      return customComparator;
    }
  }
}
