/**
 * Error types raised while reading bundles and extracting entries.
 */

export type FormatErrorCode = 'BAD_SIGNATURE' | 'UNSUPPORTED_VARIANT' | 'TRUNCATED';

/**
 * The bundle header or directory cannot be trusted. Always fatal: no partial
 * entry table is ever returned alongside one.
 */
export class FormatError extends Error {
  constructor(
    public readonly code: FormatErrorCode,
    message: string,
    /** Header field or directory part that failed validation. */
    public readonly field: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'FormatError';
  }
}

export type IoErrorCode = 'UNSAFE_PATH' | 'READ' | 'WRITE';

/**
 * Failure while materializing an entry on disk. `UNSAFE_PATH` only skips the
 * entry; `READ` and `WRITE` abort the run.
 */
export class IoError extends Error {
  constructor(
    public readonly code: IoErrorCode,
    message: string,
    public readonly entryPath: string,
    /** Files fully written before the failure. */
    public readonly completed: number = 0,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'IoError';
  }
}

export function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
