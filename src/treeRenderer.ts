import chalk from 'chalk';

import { SYMBOLS } from './constants';
import type { DirEntry } from './directoryEntry';
import { formatSize } from './sizeAccountant';

export interface Styles {
  header(text: string): string;
  directory(text: string): string;
  symlink(text: string): string;
  executable(text: string): string;
  match(text: string): string;
  accent(text: string): string;
  muted(text: string): string;
  success(text: string): string;
  warning(text: string): string;
  error(text: string): string;
}

export function createStyles(c: chalk.Chalk = chalk): Styles {
  return {
    header: (text) => c.cyan.bold(text),
    directory: (text) => c.blue.bold(text),
    symlink: (text) => c.cyan(text),
    executable: (text) => c.green.bold(text),
    match: (text) => c.cyan.bold(text),
    accent: (text) => c.cyan(text),
    muted: (text) => c.gray(text),
    success: (text) => c.green(text),
    warning: (text) => c.yellow(text),
    error: (text) => c.red(text),
  };
}

export type RenderDecision =
  | { kind: 'shown'; entry: DirEntry; sizeSuffix?: string }
  | { kind: 'pruned-ignored'; entry: DirEntry; fileCount: number; bytes?: number }
  | { kind: 'pruned-oversized'; entry: DirEntry; megabytes: number }
  | { kind: 'skipped' };

export type RenderedDecision = Exclude<RenderDecision, { kind: 'skipped' }>;

export function isRendered(decision: RenderDecision): decision is RenderedDecision {
  return decision.kind !== 'skipped';
}

export function connector(isLast: boolean): string {
  return isLast ? SYMBOLS.LAST_BRANCH : SYMBOLS.BRANCH;
}

export function childPrefix(prefix: string, isLast: boolean): string {
  return prefix + (isLast ? SYMBOLS.INDENT_EMPTY : SYMBOLS.INDENT);
}

// `name/` for directories, `name -> target` for symlinks
export function displayName(entry: DirEntry, styles: Styles): string {
  if (entry.isSymlink) {
    const target = entry.linkTarget;
    return styles.symlink(target === null ? entry.name : `${entry.name} -> ${target}`);
  }
  if (entry.isDirectory) {
    return styles.directory(`${entry.name}/`);
  }
  if (entry.isExecutable) {
    return styles.executable(entry.name);
  }
  return entry.name;
}

function suffix(decision: RenderedDecision, styles: Styles): string {
  switch (decision.kind) {
    case 'shown':
      return decision.sizeSuffix === undefined ? '' : styles.muted(` (${decision.sizeSuffix})`);
    case 'pruned-ignored':
      return decision.bytes === undefined
        ? styles.muted(` (${decision.fileCount} files ignored)`)
        : styles.muted(` (${formatSize(decision.bytes)}, ${decision.fileCount} files ignored)`);
    case 'pruned-oversized':
      return styles.muted(` (${decision.megabytes}MB, skipped)`);
  }
}

export function renderLine(decision: RenderedDecision, prefix: string, isLast: boolean, styles: Styles): string {
  return `${prefix}${connector(isLast)}${displayName(decision.entry, styles)}${suffix(decision, styles)}`;
}
