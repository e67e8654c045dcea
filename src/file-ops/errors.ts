/**
 * Fatal errors raised before (or instead of) a traversal.
 *
 * Per-directory listing failures are not represented here: the tree
 * builder turns them into sentinel lines and keeps going.
 */

export type TreeErrorCode =
  | 'INVALID_ROOT'
  | 'UNKNOWN_STYLE'
  | 'UNKNOWN_SORT_KEY'
  | 'MISSING_COMPARATOR'
  | 'INVALID_FILTER_SYNTAX'
  | 'INVALID_CONFIG'
  | 'WRITE_FAILED';

export class TreeError extends Error {
  readonly code: TreeErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: TreeErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'TreeError';
    this.code = code;
    this.details = details;
  }
}

export function isTreeError(error: unknown): error is TreeError {
  return error instanceof TreeError;
}

/** Codes caused by bad input rather than a runtime failure */
const CONFIGURATION_CODES: ReadonlySet<TreeErrorCode> = new Set<TreeErrorCode>([
  'INVALID_ROOT',
  'UNKNOWN_STYLE',
  'UNKNOWN_SORT_KEY',
  'MISSING_COMPARATOR',
  'INVALID_FILTER_SYNTAX',
  'INVALID_CONFIG',
]);

export function isConfigurationError(error: unknown): error is TreeError {
  return isTreeError(error) && CONFIGURATION_CODES.has(error.code);
}
