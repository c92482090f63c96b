/**
 * Inputs and outputs of an extraction run.
 */

export interface ExtractionRequest {
  /** Shell-style glob matched against the full entry path. Absent matches everything. */
  readonly pattern?: string;
  /** Root directory under which entry paths are recreated. */
  readonly destination: string;
}

export type SkipReason = 'unsafe-path' | 'compressed';

export interface SkippedEntry {
  readonly path: string;
  readonly reason: SkipReason;
}

export interface ExtractionResult {
  /** Number of files written. */
  readonly written: number;
  /** Absolute paths of the written files, in table order. */
  readonly files: readonly string[];
  readonly skipped: readonly SkippedEntry[];
}
