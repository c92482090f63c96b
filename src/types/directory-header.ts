/**
 * Fixed-layout LPAK header describing where the directory lives.
 */

/** Byte order selected by the bundle signature. */
export type ByteOrder = 'big' | 'little';

export interface DirectoryHeader {
  readonly byteOrder: ByteOrder;
  readonly version: number;
  readonly startOfFileEntries: number;
  readonly startOfFileNames: number;
  readonly startOfData: number;
  readonly sizeOfFileEntries: number;
  readonly entryCount: number;
}

/**
 * Layout family identified by the header, decided once before any record is read.
 */
export type BundleVariant =
  | { readonly kind: 'primary'; readonly byteOrder: ByteOrder; readonly version: number }
  | { readonly kind: 'unsupported-sibling'; readonly byteOrder: ByteOrder; readonly version: number };
