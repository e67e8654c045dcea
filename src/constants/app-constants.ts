/**
 * Centralized constants for treeline
 */

// ==================== PACKAGE ====================

export const PACKAGE = {
  NAME: 'treeline',
  VERSION: '0.1.0',
} as const;

// ==================== TREE RENDERING ====================

export const TREE = {
  /** Horizontal fill characters per connector */
  DEFAULT_INDENT: 2,
  MIN_INDENT: 1,
  MAX_INDENT: 16,
  /** Marker appended to directory names and the root label */
  DIRECTORY_MARKER: '/',
  LINE_BREAK: '\n',
  /** Appended to the root directory name when no output path is given */
  DEFAULT_OUTPUT_SUFFIX: '_filetree.txt',
} as const;

export const SENTINELS = {
  PERMISSION_DENIED: '[Permission Denied]',
  READ_ERROR: '[Error reading directory]',
} as const;

// ==================== STYLES & SORTING ====================

export const BUILT_IN_STYLES = ['classic', 'dash', 'arrow', 'plus'] as const;
export type BuiltInStyleName = typeof BUILT_IN_STYLES[number];

export const DEFAULT_STYLE: BuiltInStyleName = 'classic';

export const SORT_KEYS = ['natural', 'lex', 'custom'] as const;
export type SortKeyName = typeof SORT_KEYS[number];

/** Sort keys reachable from text configuration (custom needs a function) */
export const TEXT_SORT_KEYS = ['natural', 'lex'] as const;

export const DEFAULT_SORT_KEY: SortKeyName = 'natural';

// ==================== LOGGING ====================

export const LOGGING = {
  ENV_VAR: 'TREELINE_LOG_LEVEL',
  DEFAULT_LEVEL: 'warn',
  PREFIX: '[treeline]',
} as const;
