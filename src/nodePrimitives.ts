/**
 * Errno-flavoured error as thrown by the `node:fs` promise API. Only the
 * properties inspected by the pipeline are listed.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows `error` to an {@link ErrnoException} carrying the given `code`. */
export function hasErrnoCode(error: unknown, code: string): error is ErrnoException {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === code
  );
}
