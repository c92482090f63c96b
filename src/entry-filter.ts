/**
 * Shell-style glob matching of entry paths.
 *
 * Patterns follow fnmatch rules rather than path-glob rules: `*` and `?`
 * also match `/`, a pattern must match the whole path, `[!seq]` negates a
 * class while `[^seq]` does not, and `\` is an ordinary character.
 * Matching is case-sensitive.
 */
import { Minimatch } from 'minimatch';
import type { MinimatchOptions } from 'minimatch';
import type { BundleEntry } from './types/bundle-entry.js';

// Names are NUL-terminated on disk, so NUL never occurs inside a path.
const SEPARATOR_MASK = '\u0000';

// Literal lead-in on both sides, so a wildcard never starts a segment and
// `.`, `..` and the empty path stay matchable.
const ANCHOR = '\u0001';

const MATCH_OPTIONS: MinimatchOptions = {
  dot: true,
  nobrace: true,
  noext: true,
  noglobstar: true,
  nocomment: true,
  nonegate: true
};

function maskPath(path: string): string {
  return ANCHOR + path.replace(/\//g, SEPARATOR_MASK);
}

/**
 * Index of the `]` closing the class opened at `start`, or -1 when the `[`
 * is literal. A `]` right after `[` or `[!` belongs to the class.
 */
function findClassEnd(pattern: string, start: number): number {
  let cursor: number = start + 1;
  if (pattern[cursor] === '!') cursor++;
  if (pattern[cursor] === ']') cursor++;
  return pattern.indexOf(']', cursor);
}

function translateClass(body: string): string {
  const negated: boolean = body.startsWith('!');
  const members: string = (negated ? body.slice(1) : body).replace(/\\/g, '\\\\');
  return `[${negated ? '!' : ''}${members.startsWith('^') ? `\\${members}` : members}]`;
}

/**
 * Rewrites an fnmatch pattern into minimatch syntax with separators masked.
 */
function translatePattern(pattern: string): string {
  let translated = '';
  let cursor = 0;
  while (cursor < pattern.length) {
    const char: string = pattern.charAt(cursor);
    if (char === '[') {
      const end: number = findClassEnd(pattern, cursor);
      if (end === -1) {
        translated += '\\[';
        cursor++;
      } else {
        translated += translateClass(pattern.slice(cursor + 1, end));
        cursor = end + 1;
      }
      continue;
    }
    translated += char === '\\' ? '\\\\' : char;
    cursor++;
  }
  return ANCHOR + translated.replace(/\//g, SEPARATOR_MASK);
}

/**
 * Compiles a pattern once for repeated matching.
 *
 * @param pattern - Glob pattern; `undefined` matches every path
 */
export function createEntryMatcher(pattern?: string): (path: string) => boolean {
  if (pattern === undefined) {
    return () => true;
  }
  const matcher: Minimatch = new Minimatch(translatePattern(pattern), MATCH_OPTIONS);
  return (path: string): boolean => matcher.match(maskPath(path));
}

export function matchesPattern(path: string, pattern?: string): boolean {
  return createEntryMatcher(pattern)(path);
}

/**
 * Lazily yields the entries whose path matches `pattern`, in table order.
 */
export function* filterEntries(entries: readonly BundleEntry[], pattern?: string): Generator<BundleEntry> {
  const matches = createEntryMatcher(pattern);
  for (const entry of entries) {
    if (matches(entry.path)) {
      yield entry;
    }
  }
}
