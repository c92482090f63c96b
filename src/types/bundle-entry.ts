/**
 * One packed file described by an LPAK directory record.
 */
export interface BundleEntry {
  /** Position of the record in the directory. */
  readonly index: number;
  /** Stored relative path with forward-slash separators. */
  readonly path: string;
  /** Absolute byte offset of the stored data. */
  readonly offset: number;
  /** Number of stored bytes (the compressed size for compressed entries). */
  readonly size: number;
  readonly uncompressedSize: number;
  readonly compressed: boolean;
}
