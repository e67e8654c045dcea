/**
 * Error helpers shared by the library and the CLI.
 */

/**
 * Get a safe, human-readable error message from an unknown error.
 * Standardize on this helper instead of ad-hoc `(error as Error)?.message`.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Errors raised by Node's fs layer carry a string errno `code`.
 */
export interface FileSystemError extends Error {
  code: string;
}

export function isFileSystemError(error: unknown): error is FileSystemError {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return isFileSystemError(error) && codes.includes(error.code);
}
