/**
 * LPAK Tools - Main entry point
 *
 * Reads Double Fine LPAK bundles: lists their contents and extracts entries
 * as opaque byte ranges.
 *
 * @example
 * ```ts
 * import { withBundle, LpakBinary, extractEntries } from 'lpak-tools';
 *
 * await withBundle('classic.lpak', async (bundle) => {
 *   const table = await LpakBinary.parse(bundle);
 *   await extractEntries(bundle, table, { pattern: 'audio/*', destination: './out' });
 * });
 * ```
 */

// Bundle byte sources
export { FileBundle, BufferBundle, withBundle } from './bundle.js';
export type { Bundle } from './bundle.js';

// Directory parsing
export { LpakBinary } from './lpak-binary.js';

// Listing and extraction
export { listEntries, extractEntries, resolveEntryDestination, COPY_CHUNK_SIZE } from './extract.js';
export type { ExtractOptions } from './extract.js';
export { createEntryMatcher, matchesPattern, filterEntries } from './entry-filter.js';

export { FormatError, IoError } from './errors.js';
export type { FormatErrorCode, IoErrorCode } from './errors.js';
export { consoleLogger, silentLogger } from './utils/console-logger.js';
export type { Logger } from './utils/console-logger.js';

export type { BundleEntry } from './types/bundle-entry.js';
export type { BundleVariant, ByteOrder, DirectoryHeader } from './types/directory-header.js';
export type { EntryTable } from './types/entry-table.js';
export type { ExtractionRequest, ExtractionResult, SkipReason, SkippedEntry } from './types/extraction.js';
