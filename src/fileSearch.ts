import path from 'node:path';

import { type DirEntry, readEntries } from './directoryEntry';
import { globToRegExp, matchesCustomPattern, shouldIgnoreDir } from './ignoreRules';
import { ConsoleSink, type LineSink } from './lineSink';
import { formatSize } from './sizeAccountant';
import { childPrefix, connector, createStyles, displayName, type Styles } from './treeRenderer';

export interface SearchOptions {
  // Children of the start path are at depth 1
  maxDepth?: number;
  flat?: boolean;
  customIgnorePatterns?: readonly RegExp[];
  sink?: LineSink;
  styles?: Styles;
}

export interface SearchMatch {
  path: string;
  isDirectory: boolean;
  // Always 0 for directories
  size: number;
}

/**
 * Tests every entry below `startPath` against `pattern` by base name. Descent
 * stops at default-ignored directory names and custom pattern matches, but the
 * entry itself is still tested before its descent is skipped.
 */
export function collectMatches(
  startPath: string,
  pattern: RegExp,
  maxDepth = Infinity,
  customIgnorePatterns: readonly RegExp[] = [],
): SearchMatch[] {
  const matches: SearchMatch[] = [];

  const visit = (dirPath: string, depth: number): void => {
    for (const entry of readEntries(dirPath)) {
      if (pattern.test(entry.name)) {
        matches.push({ path: entry.path, isDirectory: entry.isDirectory, size: entry.isDirectory ? 0 : entry.size });
      }

      const descend =
        entry.isDirectory &&
        depth < maxDepth &&
        !shouldIgnoreDir(entry.name) &&
        !matchesCustomPattern(entry.name, customIgnorePatterns);
      if (descend) {
        visit(entry.path, depth + 1);
      }
    }
  };

  if (maxDepth >= 1) {
    visit(startPath, 1);
  }
  return matches;
}

// Matches plus every ancestor directory up to, but not including, the start path
export function buildKeepSet(matches: readonly SearchMatch[], startPath: string): Set<string> {
  const keep = new Set<string>();
  for (const match of matches) {
    keep.add(match.path);

    let parent = path.dirname(match.path);
    while (parent !== startPath && !keep.has(parent)) {
      keep.add(parent);
      const next = path.dirname(parent);
      if (next === parent) break;
      parent = next;
    }
  }
  return keep;
}

// Component-wise, so `a/b` sorts before `a-c`
export function comparePaths(a: string, b: string): number {
  const left = a.split(path.sep);
  const right = b.split(path.sep);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    if (left[i] < right[i]) return -1;
    if (left[i] > right[i]) return 1;
  }
  return left.length - right.length;
}

export class FileSearch {
  pattern: string;
  startPath: string;
  private maxDepth: number;
  private flat: boolean;
  private customIgnorePatterns: readonly RegExp[];
  private sink: LineSink;
  private styles: Styles;

  constructor(pattern: string, startPath: string, options: SearchOptions = {}) {
    this.pattern = pattern;
    this.startPath = path.resolve(startPath);
    this.maxDepth = options.maxDepth ?? Infinity;
    this.flat = options.flat ?? false;
    this.customIgnorePatterns = options.customIgnorePatterns ?? [];
    this.sink = options.sink ?? new ConsoleSink();
    this.styles = options.styles ?? createStyles();
  }

  // Returns the matches found, or null when the pattern did not compile
  run(): SearchMatch[] | null {
    let regex: RegExp;
    try {
      regex = globToRegExp(this.pattern);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.sink.error(this.styles.error(`invalid pattern: ${reason}`));
      return null;
    }

    const matches = collectMatches(this.startPath, regex, this.maxDepth, this.customIgnorePatterns);

    if (matches.length === 0) {
      this.sink.write(this.styles.warning(`no files or directories matching '${this.pattern}' found`));
      return matches;
    }

    this.sink.write(`${this.styles.success(`found ${matches.length} item(s) matching`)} ${this.styles.accent(this.pattern)}`);
    this.sink.write('');

    if (this.flat) {
      this.renderFlat(matches);
    } else {
      this.renderKept(this.startPath, buildKeepSet(matches, this.startPath), '');
    }
    return matches;
  }

  private renderFlat(matches: readonly SearchMatch[]): void {
    const sorted = [...matches].sort((a, b) => comparePaths(a.path, b.path));
    for (const match of sorted) {
      this.sink.write(`${this.styles.accent(match.path)}${this.styles.muted(` (${formatSize(match.size)})`)}`);
    }
  }

  // Only kept entries are listed; no ignore rule applies here
  private renderKept(dirPath: string, keep: ReadonlySet<string>, prefix: string): void {
    const entries = readEntries(dirPath).filter((entry) => keep.has(entry.path));

    entries.forEach((entry, index) => {
      const isLast = index === entries.length - 1;

      if (entry.isDirectory) {
        this.sink.write(`${prefix}${connector(isLast)}${displayName(entry, this.styles)}`);
        this.renderKept(entry.path, keep, childPrefix(prefix, isLast));
      } else {
        this.sink.write(`${prefix}${connector(isLast)}${this.matchName(entry)}${this.styles.muted(` (${formatSize(entry.size)})`)}`);
      }
    });
  }

  private matchName(entry: DirEntry): string {
    if (entry.isSymlink || entry.isExecutable) {
      return displayName(entry, this.styles);
    }
    return this.styles.match(entry.name);
  }
}
