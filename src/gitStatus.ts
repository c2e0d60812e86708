import { execFileSync } from 'node:child_process';
import path from 'node:path';

import type { GitRelationship } from './walkConfig';

/**
 * Immutable snapshot of the absolute paths that satisfy one git relationship,
 * plus every directory that has at least one of them beneath it.
 */
export class GitPathSet {
  private readonly files: ReadonlySet<string>;
  private readonly directories: ReadonlySet<string>;

  constructor(paths: Iterable<string>) {
    const files = new Set<string>();
    const directories = new Set<string>();

    for (const filePath of paths) {
      const absolute = path.resolve(filePath);
      files.add(absolute);

      let parent = path.dirname(absolute);
      while (!directories.has(parent)) {
        directories.add(parent);
        const next = path.dirname(parent);
        if (next === parent) break;
        parent = next;
      }
    }

    this.files = files;
    this.directories = directories;
  }

  has(filePath: string): boolean {
    return this.files.has(path.resolve(filePath));
  }

  // True when some path in the set lies strictly inside `dirPath`
  containsUnder(dirPath: string): boolean {
    return this.directories.has(path.resolve(dirPath));
  }
}

export interface GitStatusOracle {
  repositoryRoot(startPath: string): string | null;
  // null when the relationship does not restrict the walk
  pathsFor(root: string, relationship: GitRelationship): GitPathSet | null;
  currentBranch(startPath: string): string | null;
}

const LIST_ARGS: Record<Exclude<GitRelationship, 'none' | 'history'>, string[]> = {
  tracked: ['ls-files', '-z'],
  untracked: ['ls-files', '--others', '--exclude-standard', '-z'],
  staged: ['diff', '--cached', '--name-only', '-z'],
  changed: ['diff', '--name-only', '-z'],
};

export function splitNulList(output: string): string[] {
  return output.split('\0').filter((entry) => entry.length > 0);
}

// Drives the git executable; any failure reads as "not in a repository"
export class GitCli implements GitStatusOracle {
  private readonly gitBinary: string;

  constructor(gitBinary = 'git') {
    this.gitBinary = gitBinary;
  }

  repositoryRoot(startPath: string): string | null {
    const output = this.run(startPath, ['rev-parse', '--show-toplevel']);
    return output ? path.resolve(output.trim()) : null;
  }

  pathsFor(root: string, relationship: GitRelationship): GitPathSet | null {
    if (relationship === 'none' || relationship === 'history') return null;

    const output = this.run(root, LIST_ARGS[relationship]);
    if (output === null) return null;
    return new GitPathSet(splitNulList(output).map((relative) => path.join(root, relative)));
  }

  currentBranch(startPath: string): string | null {
    const output = this.run(startPath, ['rev-parse', '--abbrev-ref', 'HEAD']);
    const branch = output?.trim();
    return branch ? branch : null;
  }

  private run(cwd: string, args: string[]): string | null {
    try {
      return execFileSync(this.gitBinary, args, {
        cwd,
        encoding: 'utf8',
        stdio: ['ignore', 'pipe', 'ignore'],
        maxBuffer: 256 * 1024 * 1024,
      });
    } catch {
      return null;
    }
  }
}
