/**
 * Extraction engine - lists entries and copies their byte ranges to disk
 *
 * Payloads are copied verbatim; nothing is decompressed or decoded. Entry
 * paths are recreated under a destination root and never allowed to escape it.
 */

import { mkdir, open, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import type { Bundle } from './bundle.js';
import { filterEntries } from './entry-filter.js';
import { IoError, describeCause } from './errors.js';
import type { BundleEntry } from './types/bundle-entry.js';
import type { EntryTable } from './types/entry-table.js';
import type { ExtractionRequest, ExtractionResult, SkippedEntry } from './types/extraction.js';
import { consoleLogger, type Logger } from './utils/console-logger.js';

/** Largest slice of an entry held in memory at once. */
export const COPY_CHUNK_SIZE = 1024 * 1024;

export interface ExtractOptions {
  readonly logger?: Logger;
}

/**
 * Enumerates entry paths in table order, optionally filtered by a glob.
 * Each iteration starts over from the first entry.
 *
 * @param table - Parsed entry table
 * @param pattern - Glob pattern; absent lists everything
 */
export function listEntries(table: EntryTable, pattern?: string): Iterable<string> {
  return {
    *[Symbol.iterator](): Iterator<string> {
      for (const entry of filterEntries(table.entries, pattern)) {
        yield entry.path;
      }
    }
  };
}

/**
 * Joins an entry path under the destination root.
 *
 * @param destination - Destination root directory
 * @param entryPath - Stored relative path of the entry
 * @returns Absolute destination file path
 * @throws {IoError} UNSAFE_PATH if the path is absolute, empty, or resolves outside the root
 */
export function resolveEntryDestination(destination: string, entryPath: string): string {
  const root: string = resolve(destination);
  if (entryPath.length === 0 || isAbsolute(entryPath) || /^[\\/]/.test(entryPath) || /^[A-Za-z]:/.test(entryPath)) {
    throw new IoError('UNSAFE_PATH', `Refusing to extract "${entryPath}": not a relative path`, entryPath);
  }

  const target: string = resolve(root, entryPath);
  const fromRoot: string = relative(root, target);
  if (fromRoot === '' || fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
    throw new IoError('UNSAFE_PATH', `Refusing to extract "${entryPath}": resolves outside ${root}`, entryPath);
  }
  return target;
}

async function readChunk(bundle: Bundle, entry: BundleEntry, position: number, length: number, completed: number): Promise<Buffer> {
  let chunk: Buffer;
  try {
    chunk = await bundle.read(position, length);
  } catch (error) {
    throw new IoError('READ', `Failed to read "${entry.path}" at offset ${position}: ${describeCause(error)}`, entry.path, completed, error);
  }
  if (chunk.length !== length) {
    throw new IoError('READ', `Failed to read "${entry.path}": bundle ended at offset ${position + chunk.length}, expected ${length} bytes from ${position}`, entry.path, completed);
  }
  return chunk;
}

async function openDestination(entry: BundleEntry, target: string, completed: number): Promise<FileHandle> {
  try {
    await mkdir(dirname(target), { recursive: true });
    return await open(target, 'w');
  } catch (error) {
    throw new IoError('WRITE', `Failed to create ${target} for "${entry.path}": ${describeCause(error)}`, entry.path, completed, error);
  }
}

/**
 * Removes the partially written target, then rethrows the copy failure.
 */
async function discardPartial(target: string, failure: IoError): Promise<never> {
  try {
    await rm(target, { force: true });
  } catch (error) {
    throw new IoError(failure.code, `${failure.message} (partial file left at ${target}: ${describeCause(error)})`, failure.entryPath, failure.completed, failure);
  }
  throw failure;
}

/**
 * Copies exactly `entry.size` bytes from the bundle into `target`, replacing
 * any existing file. On failure no partial file is left behind.
 *
 * @param completed - Files written so far, reported if this copy fails
 * @throws {IoError} READ or WRITE on any I/O failure
 */
async function copyEntry(bundle: Bundle, entry: BundleEntry, target: string, completed: number): Promise<void> {
  const output: FileHandle = await openDestination(entry, target, completed);
  let failure: IoError | undefined;
  try {
    let copied = 0;
    while (copied < entry.size) {
      const length: number = Math.min(COPY_CHUNK_SIZE, entry.size - copied);
      const chunk: Buffer = await readChunk(bundle, entry, entry.offset + copied, length, completed);
      const { bytesWritten } = await output.write(chunk, 0, length);
      if (bytesWritten !== length) {
        throw new Error(`wrote ${bytesWritten} of ${length} bytes`);
      }
      copied += length;
    }
  } catch (error) {
    failure = error instanceof IoError
      ? error
      : new IoError('WRITE', `Failed to write ${target} for "${entry.path}": ${describeCause(error)}`, entry.path, completed, error);
  }

  try {
    await output.close();
  } catch (error) {
    failure ??= new IoError('WRITE', `Failed to close ${target} for "${entry.path}": ${describeCause(error)}`, entry.path, completed, error);
  }

  if (failure) {
    await discardPartial(target, failure);
  }
}

/**
 * Extracts every entry matching the request's pattern, in table order.
 *
 * Compressed entries and entries whose path would escape the destination are
 * skipped with a warning. Any read or write failure stops the run.
 *
 * @param bundle - Open bundle the table was parsed from
 * @param table - Parsed entry table
 * @param request - Pattern and destination root
 * @returns Count and paths of written files, plus skipped entries
 * @throws {IoError} READ or WRITE, carrying the number of files completed before the failure
 */
export async function extractEntries(
  bundle: Bundle,
  table: EntryTable,
  request: ExtractionRequest,
  options: ExtractOptions = {}
): Promise<ExtractionResult> {
  const logger: Logger = options.logger ?? consoleLogger;
  const root: string = resolve(request.destination);
  const files: string[] = [];
  const skipped: SkippedEntry[] = [];

  for (const entry of filterEntries(table.entries, request.pattern)) {
    let target: string;
    try {
      target = resolveEntryDestination(root, entry.path);
    } catch (error) {
      if (error instanceof IoError && error.code === 'UNSAFE_PATH') {
        logger.warn(`${error.message}, skipping`);
        skipped.push({ path: entry.path, reason: 'unsafe-path' });
        continue;
      }
      throw error;
    }

    if (entry.compressed) {
      logger.warn(`${entry.path}: compressed entries are not supported, skipping`);
      skipped.push({ path: entry.path, reason: 'compressed' });
      continue;
    }

    await copyEntry(bundle, entry, target, files.length);
    files.push(target);
    logger.info(`  - ${entry.path}`);
  }

  return { written: files.length, files, skipped };
}
