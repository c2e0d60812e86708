import { IGNORE_DIR_SUFFIX, IGNORE_DIRS, IGNORE_FILE_EXTENSIONS, IGNORE_FILE_NAMES } from './constants';
import type { DirEntry } from './directoryEntry';
import type { WalkConfig } from './walkConfig';

export type Classification = 'visible' | 'ignored-default' | 'ignored-pattern' | 'ignored-size' | 'ignored-git';

/**
 * Glob-style pattern to an anchored regular expression. Only `*` (any run of
 * characters) and `?` (exactly one character) are translated; every other
 * character is handed to RegExp unchanged, so there are no bracket classes
 * and no escaping. Throws a SyntaxError when the result does not compile.
 */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern.trim().replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${source}$`);
}

// Invalid and empty patterns are dropped without notice
export function compileIgnorePatterns(patterns: readonly string[]): RegExp[] {
  const compiled: RegExp[] = [];
  for (const pattern of patterns) {
    if (!pattern.trim()) continue;
    try {
      compiled.push(globToRegExp(pattern));
    } catch {
      continue;
    }
  }
  return compiled;
}

export function splitPatternList(value: string): string[] {
  return value
    .split(',')
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0);
}

export function shouldIgnoreDir(name: string): boolean {
  return IGNORE_DIRS.has(name) || name.endsWith(IGNORE_DIR_SUFFIX);
}

export function shouldIgnoreFile(name: string): boolean {
  const extension = name.split('.').pop() ?? '';
  return IGNORE_FILE_EXTENSIONS.has(extension) || IGNORE_FILE_NAMES.has(name);
}

export function matchesCustomPattern(name: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(name));
}

function isDefaultIgnoredDir(name: string, config: WalkConfig): boolean {
  if (config.ignoreDefaultsDisabled) return false;
  if (config.ignoreOnlyPattern !== undefined && name === config.ignoreOnlyPattern) return false;
  return shouldIgnoreDir(name);
}

function customPatternsActive(config: WalkConfig): boolean {
  return config.ignoreOnlyPattern === undefined && !config.bypassCustomPatterns;
}

/**
 * Decides the visibility of one entry. The checks run in a fixed order and the
 * first one that fires wins: git restriction, default directory names, custom
 * patterns, default file names, then the subtree size limit.
 */
export function classify(entry: DirEntry, config: WalkConfig): Classification {
  const gitPaths = config.gitPathSet;
  if (config.gitRelationship !== 'none' && gitPaths) {
    const tracked = entry.isDirectory ? gitPaths.containsUnder(entry.path) : gitPaths.has(entry.path);
    return tracked ? 'visible' : 'ignored-git';
  }

  if (entry.isDirectory && isDefaultIgnoredDir(entry.name, config)) {
    return 'ignored-default';
  }

  if (customPatternsActive(config) && matchesCustomPattern(entry.name, config.customIgnorePatterns)) {
    return 'ignored-pattern';
  }

  if (!entry.isDirectory && shouldIgnoreFile(entry.name)) {
    return 'ignored-default';
  }

  if (entry.isDirectory && config.maxSubtreeBytes !== undefined && entry.size > config.maxSubtreeBytes) {
    return 'ignored-size';
  }

  return 'visible';
}
