import fs from 'node:fs';
import path from 'node:path';

import { WINDOWS_EXECUTABLE_EXTENSIONS } from './constants';
import { fileSize, subtreeBytes } from './sizeAccountant';

export class DirEntry {
  path: string;
  name: string;
  // Always false for symlinks, whatever they point at
  isDirectory: boolean;
  isSymlink: boolean;
  private cachedSize: number | undefined;
  private cachedExecutable: boolean | undefined;

  constructor(path: string, name: string, isDirectory: boolean, isSymlink = false) {
    this.path = path;
    this.name = name;
    this.isDirectory = isDirectory && !isSymlink;
    this.isSymlink = isSymlink;
  }

  static fromDirent(parentPath: string, dirent: fs.Dirent): DirEntry {
    return new DirEntry(path.join(parentPath, dirent.name), dirent.name, dirent.isDirectory(), dirent.isSymbolicLink());
  }

  // Recursive byte total for directories, own length otherwise
  get size(): number {
    if (this.cachedSize === undefined) {
      this.cachedSize = this.isDirectory ? subtreeBytes(this.path) : fileSize(this.path);
    }
    return this.cachedSize;
  }

  get isExecutable(): boolean {
    if (this.cachedExecutable === undefined) {
      this.cachedExecutable = !this.isDirectory && isExecutable(this.path);
    }
    return this.cachedExecutable;
  }

  get linkTarget(): string | null {
    if (!this.isSymlink) return null;
    try {
      return fs.readlinkSync(this.path);
    } catch {
      return null;
    }
  }
}

export function isExecutable(filePath: string): boolean {
  if (process.platform === 'win32') {
    const extension = path.extname(filePath).slice(1).toLowerCase();
    return WINDOWS_EXECUTABLE_EXTENSIONS.has(extension);
  }

  try {
    return (fs.statSync(filePath).mode & 0o111) !== 0;
  } catch {
    return false;
  }
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// Directories first, then case-insensitive by name
export function compareEntries(a: DirEntry, b: DirEntry): number {
  if (a.isDirectory && !b.isDirectory) return -1;
  if (!a.isDirectory && b.isDirectory) return 1;
  return compareText(a.name.toLowerCase(), b.name.toLowerCase()) || compareText(a.name, b.name);
}

export function listEntries(dirPath: string): DirEntry[] {
  const entries = fs.readdirSync(dirPath, { withFileTypes: true }).map((dirent) => DirEntry.fromDirent(dirPath, dirent));
  return entries.sort(compareEntries);
}

// Same as listEntries, but a directory that cannot be read is simply empty
export function readEntries(dirPath: string): DirEntry[] {
  try {
    return listEntries(dirPath);
  } catch {
    return [];
  }
}
