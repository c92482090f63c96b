/**
 * LPAK wire-format constants (pre-Full Throttle layout).
 */

/** Signature of big-endian bundles. */
export const LPAK_SIGNATURE_BIG_ENDIAN = 'LPAK';

/** Signature of little-endian bundles (the same marker, byte-swapped). */
export const LPAK_SIGNATURE_LITTLE_ENDIAN = 'KAPL';

export const SIGNATURE_SIZE = 4;
export const HEADER_SIZE = 40;

export const VERSION_OFFSET = 6;
export const START_OF_FILE_ENTRIES_OFFSET = 12;
export const START_OF_FILE_NAMES_OFFSET = 16;
export const START_OF_DATA_OFFSET = 20;
export const SIZE_OF_FILE_ENTRIES_OFFSET = 28;

/**
 * First version number of the post-Full Throttle layout, which stores its
 * directory differently and is not supported.
 */
export const SIBLING_VARIANT_MIN_VERSION = 16320;

/** dataOffset, nameOffset, size, compressedSize, compressed: five u32 fields. */
export const FILE_RECORD_SIZE = 20;
export const RECORD_DATA_OFFSET = 0;
export const RECORD_SIZE = 8;
export const RECORD_COMPRESSED_SIZE = 12;
export const RECORD_COMPRESSED_FLAG = 16;

/** Longest file name in bytes, excluding its NUL terminator. */
export const MAX_NAME_LENGTH = 255;
