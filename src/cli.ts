#!/usr/bin/env node
/**
 * LPAK Tools - CLI Interface
 *
 * Command-line interface for listing and extracting Double Fine LPAK bundles.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { withBundle } from './bundle.js';
import { filterEntries } from './entry-filter.js';
import { IoError } from './errors.js';
import { extractEntries, listEntries } from './extract.js';
import { LpakBinary } from './lpak-binary.js';
import type { BundleEntry } from './types/bundle-entry.js';

interface ListCommandOptions {
  readonly filter?: string;
  readonly long?: boolean;
}

interface ExtractCommandOptions {
  readonly filter?: string;
  readonly output?: string;
}

const program = new Command();

// Version is set at build time
const version = '0.1.0';

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function formatLongEntry(entry: BundleEntry): string {
  return `${formatSize(entry.size).padStart(10)}  ${entry.compressed ? 'C' : ' '}  ${entry.path}`;
}

program
  .name('lpak-tools')
  .description('List or extract files from a Double Fine LPAK bundle, as found in Day of the Tentacle Remastered')
  .version(version);

program
  .command('list')
  .description('List bundle content in directory order')
  .argument('<bundle>', 'Path to the bundle file')
  .option('-F, --filter <pattern>', 'Only list files whose path matches the given glob pattern')
  .option('-l, --long', 'Show stored size and a C marker for compressed files')
  .action(async (bundleFile: string, options: ListCommandOptions) => {
    try {
      const table = await LpakBinary.read({ filePath: resolve(bundleFile) });

      if (!options.long) {
        for (const path of listEntries(table, options.filter)) {
          console.log(path);
        }
        return;
      }

      let count = 0;
      let totalBytes = 0;
      for (const entry of filterEntries(table.entries, options.filter)) {
        console.log(formatLongEntry(entry));
        count += 1;
        totalBytes += entry.size;
      }
      console.log('');
      console.log(`${count} file(s), ${formatSize(totalBytes)}`);

    } catch (error) {
      console.error('❌ List failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program
  .command('extract')
  .description('Extract bundle content, preserving stored relative paths')
  .argument('<bundle>', 'Path to the bundle file')
  .option('-F, --filter <pattern>', 'Only extract files whose path matches the given glob pattern')
  .option('-o, --output <dir>', 'Destination root (defaults to the current directory)')
  .action(async (bundleFile: string, options: ExtractCommandOptions) => {
    const destination = resolve(options.output ?? process.cwd());
    try {
      console.log(`Extracting bundle: ${bundleFile}`);
      console.log(`Output will be written to: ${destination}`);
      console.log('');

      const result = await withBundle(resolve(bundleFile), async (bundle) => {
        const table = await LpakBinary.parse(bundle);
        return extractEntries(bundle, table, { pattern: options.filter, destination });
      });

      console.log('');
      console.log(`✅ Extracted ${result.written} file(s)${result.skipped.length > 0 ? `, skipped ${result.skipped.length}` : ''}`);

    } catch (error) {
      if (error instanceof IoError) {
        console.error(`❌ Extract failed after ${error.completed} file(s): ${error.message}`);
      } else {
        console.error('❌ Extract failed:', error instanceof Error ? error.message : String(error));
      }
      process.exit(1);
    }
  });

await program.parseAsync();
