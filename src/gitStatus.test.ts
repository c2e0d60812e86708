import { describe, expect, it } from 'vitest';

import { GitCli, GitPathSet, splitNulList } from './gitStatus';
import { resolveGitRelationship } from './walkConfig';

describe('GitPathSet', () => {
  const paths = new GitPathSet(['/repo/a/b/c.txt', '/repo/readme.md']);

  it('holds exactly the given files', () => {
    expect(paths.has('/repo/a/b/c.txt')).toBe(true);
    expect(paths.has('/repo/a/b')).toBe(false);
  });

  it('knows every directory with a path beneath it', () => {
    expect(paths.containsUnder('/repo')).toBe(true);
    expect(paths.containsUnder('/repo/a')).toBe(true);
    expect(paths.containsUnder('/repo/a/b')).toBe(true);
  });

  it('does not count a path as being inside itself or a sibling', () => {
    expect(paths.containsUnder('/repo/a/b/c.txt')).toBe(false);
    expect(paths.containsUnder('/repo/x')).toBe(false);
    expect(paths.containsUnder('/repo/a/b/c')).toBe(false);
  });
});

describe('splitNulList', () => {
  it('splits NUL-terminated output and keeps spaces in names', () => {
    expect(splitNulList('a.txt\0dir/b c.txt\0')).toEqual(['a.txt', 'dir/b c.txt']);
    expect(splitNulList('')).toEqual([]);
  });
});

describe('resolveGitRelationship', () => {
  it('prefers changed over staged over untracked over tracked over history', () => {
    expect(resolveGitRelationship(new Set(['tracked', 'changed']))).toBe('changed');
    expect(resolveGitRelationship(new Set(['history', 'staged', 'untracked']))).toBe('staged');
    expect(resolveGitRelationship(new Set(['history', 'tracked']))).toBe('tracked');
    expect(resolveGitRelationship(new Set())).toBe('none');
  });
});

describe('GitCli', () => {
  it('reports no path set for relationships that do not restrict the walk', () => {
    const git = new GitCli();

    expect(git.pathsFor('/repo', 'none')).toBeNull();
    expect(git.pathsFor('/repo', 'history')).toBeNull();
  });

  it('reads a git failure as not being in a repository', () => {
    const git = new GitCli('arbor-no-such-git-binary');

    expect(git.repositoryRoot('/')).toBeNull();
    expect(git.currentBranch('/')).toBeNull();
    expect(git.pathsFor('/', 'tracked')).toBeNull();
  });
});
