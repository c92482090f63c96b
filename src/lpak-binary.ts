/**
 * LPAK directory reader for Double Fine bundles.
 */
import { withBundle, type Bundle } from './bundle.js';
import {
  FILE_RECORD_SIZE,
  HEADER_SIZE,
  LPAK_SIGNATURE_BIG_ENDIAN,
  LPAK_SIGNATURE_LITTLE_ENDIAN,
  MAX_NAME_LENGTH,
  RECORD_COMPRESSED_FLAG,
  RECORD_COMPRESSED_SIZE,
  RECORD_DATA_OFFSET,
  RECORD_SIZE,
  SIBLING_VARIANT_MIN_VERSION,
  SIGNATURE_SIZE,
  SIZE_OF_FILE_ENTRIES_OFFSET,
  START_OF_DATA_OFFSET,
  START_OF_FILE_ENTRIES_OFFSET,
  START_OF_FILE_NAMES_OFFSET,
  VERSION_OFFSET
} from './constants/lpak-layout.js';
import { FormatError } from './errors.js';
import type { BundleEntry } from './types/bundle-entry.js';
import type { BundleVariant, ByteOrder, DirectoryHeader } from './types/directory-header.js';
import type { EntryTable } from './types/entry-table.js';

function readU16(buffer: Buffer, offset: number, byteOrder: ByteOrder): number {
  return byteOrder === 'big' ? buffer.readUInt16BE(offset) : buffer.readUInt16LE(offset);
}

function readU32(buffer: Buffer, offset: number, byteOrder: ByteOrder): number {
  return byteOrder === 'big' ? buffer.readUInt32BE(offset) : buffer.readUInt32LE(offset);
}

/**
 * Reads exactly `length` bytes or fails as truncated. The caller has already
 * checked the range against the bundle size, so a short read means the file
 * changed underneath us.
 */
async function readExact(bundle: Bundle, position: number, length: number, field: string): Promise<Buffer> {
  const buffer: Buffer = await bundle.read(position, length);
  if (buffer.length !== length) {
    throw new FormatError('TRUNCATED', `Bundle ended while reading ${field}: needed ${length} bytes at offset ${position}, got ${buffer.length}`, field);
  }
  return buffer;
}

/**
 * Maps the signature to the byte order used by every other field.
 * @throws {FormatError} BAD_SIGNATURE if the signature is missing or unknown
 */
function detectByteOrder(signatureBytes: Buffer): ByteOrder {
  const signature: string = signatureBytes.toString('latin1');
  if (signatureBytes.length === SIGNATURE_SIZE && signature === LPAK_SIGNATURE_BIG_ENDIAN) {
    return 'big';
  }
  if (signatureBytes.length === SIGNATURE_SIZE && signature === LPAK_SIGNATURE_LITTLE_ENDIAN) {
    return 'little';
  }
  throw new FormatError('BAD_SIGNATURE', `Not an LPAK bundle: signature ${JSON.stringify(signature)} is neither "${LPAK_SIGNATURE_BIG_ENDIAN}" nor "${LPAK_SIGNATURE_LITTLE_ENDIAN}"`, 'signature');
}

function detectVariant(header: Buffer, byteOrder: ByteOrder): BundleVariant {
  const version: number = readU16(header, VERSION_OFFSET, byteOrder);
  if (version >= SIBLING_VARIANT_MIN_VERSION) {
    return { kind: 'unsupported-sibling', byteOrder, version };
  }
  return { kind: 'primary', byteOrder, version };
}

/**
 * Reads and validates the fixed 40-byte header.
 *
 * @throws {FormatError} On a bad signature, the sibling layout, a short header,
 * or a record table that extends past the end of the bundle
 */
async function readDirectoryHeader(bundle: Bundle): Promise<DirectoryHeader> {
  const byteOrder: ByteOrder = detectByteOrder(await bundle.read(0, SIGNATURE_SIZE));
  if (bundle.size < HEADER_SIZE) {
    throw new FormatError('TRUNCATED', `Bundle is ${bundle.size} bytes, too small for the ${HEADER_SIZE}-byte header`, 'header');
  }
  const header: Buffer = await readExact(bundle, 0, HEADER_SIZE, 'header');

  const variant: BundleVariant = detectVariant(header, byteOrder);
  if (variant.kind === 'unsupported-sibling') {
    throw new FormatError('UNSUPPORTED_VARIANT', `Bundle version ${variant.version} uses the post-Full Throttle layout, which is not supported`, 'version');
  }

  const startOfFileEntries: number = readU32(header, START_OF_FILE_ENTRIES_OFFSET, byteOrder);
  const startOfFileNames: number = readU32(header, START_OF_FILE_NAMES_OFFSET, byteOrder);
  const startOfData: number = readU32(header, START_OF_DATA_OFFSET, byteOrder);
  const sizeOfFileEntries: number = readU32(header, SIZE_OF_FILE_ENTRIES_OFFSET, byteOrder);

  if (startOfFileEntries + sizeOfFileEntries > bundle.size) {
    throw new FormatError('TRUNCATED', `Directory extends beyond bundle bounds: offset=${startOfFileEntries}, size=${sizeOfFileEntries}, bundleSize=${bundle.size}`, 'directory');
  }

  return {
    byteOrder,
    version: variant.version,
    startOfFileEntries,
    startOfFileNames,
    startOfData,
    sizeOfFileEntries,
    entryCount: Math.floor(sizeOfFileEntries / FILE_RECORD_SIZE)
  };
}

/**
 * Loads the region holding every name. Each name takes at most
 * MAX_NAME_LENGTH + 1 bytes, so the block is clamped to that bound and the
 * bundle end.
 */
async function readNameBlock(bundle: Bundle, header: DirectoryHeader): Promise<Buffer> {
  if (header.entryCount === 0) {
    return Buffer.alloc(0);
  }
  if (header.startOfFileNames >= bundle.size) {
    throw new FormatError('TRUNCATED', `Name block offset ${header.startOfFileNames} is beyond bundle size ${bundle.size}`, 'name');
  }
  const end: number = Math.min(bundle.size, header.startOfFileNames + header.entryCount * (MAX_NAME_LENGTH + 1));
  return readExact(bundle, header.startOfFileNames, end - header.startOfFileNames, 'name');
}

/**
 * Decodes the NUL-terminated name starting at `cursor`.
 * @returns The normalized path and the cursor just past the terminator
 */
function readName(names: Buffer, cursor: number, index: number): { readonly path: string; readonly next: number } {
  const limit: number = Math.min(names.length, cursor + MAX_NAME_LENGTH + 1);
  const terminator: number = names.indexOf(0, cursor);
  if (terminator === -1 || terminator >= limit) {
    const reason: string = cursor + MAX_NAME_LENGTH + 1 > names.length
      ? 'runs past the end of the bundle'
      : `is longer than ${MAX_NAME_LENGTH} bytes`;
    throw new FormatError('TRUNCATED', `Name of record ${index} ${reason}`, 'name');
  }
  const path: string = names.toString('utf8', cursor, terminator).replace(/\\/g, '/');
  return { path, next: terminator + 1 };
}

/**
 * Decodes one 20-byte record into a BundleEntry.
 *
 * @throws {FormatError} TRUNCATED if the entry data extends beyond the bundle
 */
function parseEntry(records: Buffer, index: number, path: string, header: DirectoryHeader, bundleSize: number): BundleEntry {
  const recordOffset: number = index * FILE_RECORD_SIZE;
  const byteOrder: ByteOrder = header.byteOrder;
  const dataOffset: number = readU32(records, recordOffset + RECORD_DATA_OFFSET, byteOrder);
  const uncompressedSize: number = readU32(records, recordOffset + RECORD_SIZE, byteOrder);
  const compressedSize: number = readU32(records, recordOffset + RECORD_COMPRESSED_SIZE, byteOrder);
  const compressed: boolean = readU32(records, recordOffset + RECORD_COMPRESSED_FLAG, byteOrder) !== 0;

  const offset: number = header.startOfData + dataOffset;
  const size: number = compressed ? compressedSize : uncompressedSize;

  if (offset + size > bundleSize) {
    throw new FormatError('TRUNCATED', `Entry "${path}" extends beyond bundle bounds: offset=${offset}, size=${size}, bundleSize=${bundleSize}`, 'entry');
  }

  return { index, path, offset, size, uncompressedSize, compressed };
}

async function parseEntries(bundle: Bundle, header: DirectoryHeader): Promise<BundleEntry[]> {
  const records: Buffer = await readExact(bundle, header.startOfFileEntries, header.entryCount * FILE_RECORD_SIZE, 'directory');
  const names: Buffer = await readNameBlock(bundle, header);

  const entries: BundleEntry[] = [];
  let nameCursor = 0;
  for (let index = 0; index < header.entryCount; index++) {
    const { path, next } = readName(names, nameCursor, index);
    nameCursor = next;
    entries.push(parseEntry(records, index, path, header, bundle.size));
  }
  return entries;
}

/**
 * LPAK (Double Fine bundle) directory parsing.
 * Reads only the header, record table and name block; never entry payloads.
 */
export class LpakBinary {
  /**
   * Parses the directory of an open bundle.
   *
   * @param bundle - Byte source positioned anywhere; reads are absolute
   * @returns Frozen entry table in directory order
   * @throws {FormatError} If the header or any record is invalid
   */
  static async parse(bundle: Bundle): Promise<EntryTable> {
    const header: DirectoryHeader = await readDirectoryHeader(bundle);
    const entries: BundleEntry[] = await parseEntries(bundle, header);
    return Object.freeze({
      header: Object.freeze(header),
      entries: Object.freeze(entries.map((entry: BundleEntry) => Object.freeze(entry))),
      totalSize: bundle.size
    });
  }

  /**
   * Opens a bundle file, parses its directory and closes it again.
   *
   * @param filePath - Path to the bundle file
   * @throws {FormatError} If the bundle is malformed
   */
  static async read({ filePath }: { readonly filePath: string }): Promise<EntryTable> {
    return withBundle(filePath, (bundle) => LpakBinary.parse(bundle));
  }
}
