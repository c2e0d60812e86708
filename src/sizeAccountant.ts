import fs from 'node:fs';
import path from 'node:path';

export interface SubtreeStats {
  dirs: number;
  files: number;
  bytes: number;
  // lower-cased extension -> number of files carrying it
  extensions: Map<string, number>;
}

export interface SubtreeFilter {
  skipDirectory?: (name: string) => boolean;
  skipFile?: (name: string) => boolean;
}

const SIZE_UNITS = ['K', 'M', 'G'];

/**
 * Walks everything below `rootPath` without following symlinks. The root
 * itself is not counted as a directory. Symlinks count as neither files nor
 * directories, and unreadable directories contribute nothing.
 */
export function subtreeStats(rootPath: string, filter: SubtreeFilter = {}): SubtreeStats {
  const stats: SubtreeStats = { dirs: 0, files: 0, bytes: 0, extensions: new Map() };

  const visit = (dirPath: string): void => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dirPath, { withFileTypes: true });
    } catch {
      // Unreadable or vanished: counts as empty
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);

      if (entry.isDirectory()) {
        if (filter.skipDirectory?.(entry.name)) continue;
        stats.dirs++;
        visit(fullPath);
      } else if (entry.isFile()) {
        if (filter.skipFile?.(entry.name)) continue;
        stats.files++;
        stats.bytes += fileSize(fullPath);

        const extension = path.extname(entry.name).slice(1).toLowerCase();
        if (extension) {
          stats.extensions.set(extension, (stats.extensions.get(extension) ?? 0) + 1);
        }
      }
    }
  };

  visit(rootPath);
  return stats;
}

export function subtreeBytes(rootPath: string): number {
  return subtreeStats(rootPath).bytes;
}

// Unfiltered: nested ignore rules do not apply here
export function countFiles(rootPath: string): number {
  return subtreeStats(rootPath).files;
}

// Byte length of the entry itself, symlinks not followed; 0 when it is gone
export function fileSize(filePath: string): number {
  try {
    return fs.lstatSync(filePath).size;
  } catch {
    return 0;
  }
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes}B`;
  }

  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)}${SIZE_UNITS[unit]}`;
}
