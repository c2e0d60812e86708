import fs from 'node:fs';
import path from 'node:path';

import { TOP_EXTENSION_COUNT } from './constants';
import { type DirEntry, listEntries, readEntries } from './directoryEntry';
import type { GitStatusOracle } from './gitStatus';
import { matchesCustomPattern, shouldIgnoreDir, shouldIgnoreFile } from './ignoreRules';
import { ConsoleSink, type LineSink } from './lineSink';
import { countFiles, fileSize, formatSize, subtreeBytes, type SubtreeStats, subtreeStats } from './sizeAccountant';
import { createStyles, displayName, type Styles } from './treeRenderer';

export interface DirectorySummaryOptions {
  sink?: LineSink;
  styles?: Styles;
  oracle?: GitStatusOracle;
}

const LABEL_WIDTH = 9;

function canonicalPath(target: string): string {
  try {
    return fs.realpathSync(target);
  } catch {
    return path.resolve(target);
  }
}

function countParts(dirs: number, files: number, bytes: number, keepZeroCounts: boolean): string {
  const parts: string[] = [];
  if (keepZeroCounts || dirs > 0) parts.push(`${dirs} dirs`);
  if (keepZeroCounts || files > 0) parts.push(`${files} files`);
  parts.push(formatSize(bytes));
  return parts.join(' · ');
}

// Most frequent first, ties by extension name
export function topExtensions(extensions: ReadonlyMap<string, number>, limit = TOP_EXTENSION_COUNT): [string, number][] {
  return [...extensions.entries()]
    .sort(([extA, countA], [extB, countB]) => countB - countA || (extA < extB ? -1 : extA > extB ? 1 : 0))
    .slice(0, limit);
}

/**
 * One-level overview of a directory: every immediate child becomes a block
 * with its recursive totals, and ignored children are folded into a single
 * closing line. Custom patterns always apply here, whatever --no-ignore says.
 */
export class DirectorySummary {
  rootPath: string;
  private customIgnorePatterns: readonly RegExp[];
  private sink: LineSink;
  private styles: Styles;
  private oracle: GitStatusOracle | undefined;

  constructor(rootPath: string, customIgnorePatterns: readonly RegExp[] = [], options: DirectorySummaryOptions = {}) {
    this.rootPath = rootPath;
    this.customIgnorePatterns = customIgnorePatterns;
    this.sink = options.sink ?? new ConsoleSink();
    this.styles = options.styles ?? createStyles();
    this.oracle = options.oracle;
  }

  render(): void {
    this.writeHeader();

    let entries: DirEntry[];
    try {
      entries = listEntries(this.rootPath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.sink.error(this.styles.error(`failed to read directory: ${reason}`));
      return;
    }

    let ignoredFiles = 0;
    let ignoredBytes = 0;
    const ignoredNames: string[] = [];

    for (const entry of entries) {
      if (this.isIgnored(entry)) {
        if (entry.isDirectory) {
          const fileCount = countFiles(entry.path);
          ignoredFiles += fileCount;
          ignoredBytes += subtreeBytes(entry.path);
          ignoredNames.push(`${entry.name}(${fileCount} files)`);
        } else {
          ignoredFiles += 1;
          ignoredBytes += fileSize(entry.path);
          ignoredNames.push(entry.name);
        }
        continue;
      }

      if (entry.isDirectory) {
        this.writeDirectoryBlock(entry);
      } else {
        this.writeFileBlock(entry);
      }
    }

    if (ignoredFiles > 0) {
      const { muted } = this.styles;
      this.sink.write(muted('── ignored (top level) ──'));
      this.sink.write(`  ${muted(ignoredNames.join(', '))} · ${muted(`${ignoredFiles} files`)} · ${muted(formatSize(ignoredBytes))}`);
    }
  }

  isIgnored(entry: DirEntry): boolean {
    const defaultIgnored = entry.isDirectory ? shouldIgnoreDir(entry.name) : shouldIgnoreFile(entry.name);
    return defaultIgnored || matchesCustomPattern(entry.name, this.customIgnorePatterns);
  }

  private writeHeader(): void {
    const absolute = canonicalPath(this.rootPath);
    const branch = this.oracle?.currentBranch(this.rootPath) ?? null;
    const header = branch === null ? this.styles.header(absolute) : `${this.styles.header(absolute)} ${this.styles.muted(`(${branch})`)}`;

    this.sink.write(header);
    this.sink.write('');
  }

  private label(text: string): string {
    return this.styles.muted(text.padEnd(LABEL_WIDTH));
  }

  private writeDirectoryBlock(entry: DirEntry): void {
    const skipDirectory = (name: string) => shouldIgnoreDir(name) || matchesCustomPattern(name, this.customIgnorePatterns);
    const skipFile = (name: string) => shouldIgnoreFile(name) || matchesCustomPattern(name, this.customIgnorePatterns);

    const total = subtreeStats(entry.path);
    const visible = subtreeStats(entry.path, { skipDirectory, skipFile });
    const ignoredSubdirs = readEntries(entry.path)
      .filter((child) => child.isDirectory && skipDirectory(child.name))
      .map((child) => `${child.name}(${countFiles(child.path)} files)`);

    this.sink.write(displayName(entry, this.styles));
    this.sink.write(`  ${this.styles.muted(canonicalPath(entry.path))}`);

    if (hasHiddenContent(total, visible)) {
      this.sink.write(`  ${this.label('total:')} ${this.styles.warning(countParts(total.dirs, total.files, total.bytes, true))}`);
      this.sink.write(`  ${this.label('visible:')} ${this.styles.success(countParts(visible.dirs, visible.files, visible.bytes, false))}`);
    } else {
      this.sink.write(`  ${this.label('total:')} ${this.styles.warning(countParts(total.dirs, total.files, total.bytes, false))}`);
    }

    const types = topExtensions(visible.extensions);
    if (types.length > 0) {
      const summary = types.map(([extension, count]) => `${extension}(${count})`).join(' ');
      this.sink.write(`  ${this.label('types:')} ${this.styles.accent(summary)}`);
    }

    if (ignoredSubdirs.length > 0) {
      this.sink.write(`  ${this.label('ignored:')} ${this.styles.muted(ignoredSubdirs.join(', '))}`);
    }

    this.sink.write('');
  }

  private writeFileBlock(entry: DirEntry): void {
    this.sink.write(displayName(entry, this.styles));
    this.sink.write(`  ${this.styles.muted(canonicalPath(entry.path))}`);
    this.sink.write(`  ${this.styles.muted(formatSize(entry.size))}`);
    this.sink.write('');
  }
}

function hasHiddenContent(total: SubtreeStats, visible: SubtreeStats): boolean {
  return visible.dirs < total.dirs || visible.files < total.files || visible.bytes < total.bytes;
}
