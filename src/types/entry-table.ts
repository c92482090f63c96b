/**
 * Parsed LPAK directory: header plus entries in directory order.
 */
import type { BundleEntry } from './bundle-entry.js';
import type { DirectoryHeader } from './directory-header.js';

export interface EntryTable {
  readonly header: DirectoryHeader;
  readonly entries: readonly BundleEntry[];
  readonly totalSize: number;
}
