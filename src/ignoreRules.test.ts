import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';

import { DirEntry } from './directoryEntry';
import { GitPathSet } from './gitStatus';
import {
  classify,
  compileIgnorePatterns,
  globToRegExp,
  matchesCustomPattern,
  shouldIgnoreDir,
  shouldIgnoreFile,
  splitPatternList,
} from './ignoreRules';
import { createFixture, removeFixture } from './testFixtures';
import { createWalkConfig } from './walkConfig';

const dir = (name: string, parent = '/work') => new DirEntry(path.join(parent, name), name, true);
const file = (name: string, parent = '/work') => new DirEntry(path.join(parent, name), name, false);

describe('globToRegExp', () => {
  it('anchors the whole name and expands * to any run', () => {
    const pattern = globToRegExp('*.log');

    expect(pattern.test('app.log')).toBe(true);
    expect(pattern.test('app.log.1')).toBe(false);
  });

  it('expands ? to exactly one character', () => {
    const pattern = globToRegExp('file?.txt');

    expect(pattern.test('file1.txt')).toBe(true);
    expect(pattern.test('file10.txt')).toBe(false);
  });

  it('passes other characters through to the regular expression', () => {
    expect(globToRegExp('a.b').test('axb')).toBe(true);
  });

  it('trims surrounding whitespace', () => {
    expect(globToRegExp('  tmp*  ').test('tmp-1')).toBe(true);
  });
});

describe('compileIgnorePatterns', () => {
  it('drops patterns that do not compile and empty ones', () => {
    const compiled = compileIgnorePatterns(['*.log', '+', '  ', 'tmp*']);

    expect(compiled.map((pattern) => pattern.source)).toEqual(['^.*.log$', '^tmp.*$']);
  });

  it('matches names against any compiled pattern', () => {
    const compiled = compileIgnorePatterns(['*.log', 'tmp*']);

    expect(matchesCustomPattern('tmpfile', compiled)).toBe(true);
    expect(matchesCustomPattern('main.ts', compiled)).toBe(false);
  });
});

describe('splitPatternList', () => {
  it('splits on commas and drops blanks', () => {
    expect(splitPatternList(' *.log, ,tmp* ')).toEqual(['*.log', 'tmp*']);
  });
});

describe('default ignores', () => {
  it('knows the built-in directory names and the egg-info suffix', () => {
    expect(shouldIgnoreDir('node_modules')).toBe(true);
    expect(shouldIgnoreDir('.git')).toBe(true);
    expect(shouldIgnoreDir('mypkg.egg-info')).toBe(true);
    expect(shouldIgnoreDir('src')).toBe(false);
  });

  it('knows the built-in file extensions and names', () => {
    expect(shouldIgnoreFile('module.pyc')).toBe(true);
    expect(shouldIgnoreFile('.main.rs.swp')).toBe(true);
    expect(shouldIgnoreFile('package-lock.json')).toBe(true);
    expect(shouldIgnoreFile('.DS_Store')).toBe(true);
    expect(shouldIgnoreFile('main.py')).toBe(false);
  });
});

describe('classify', () => {
  let root = '';

  afterEach(() => {
    if (root) removeFixture(root);
    root = '';
  });

  it('ignores default directories unless defaults are disabled', () => {
    expect(classify(dir('node_modules'), createWalkConfig())).toBe('ignored-default');
    expect(classify(dir('node_modules'), createWalkConfig({ ignoreDefaultsDisabled: true }))).toBe('visible');
  });

  it('re-enables exactly the one name given as ignoreOnlyPattern', () => {
    const config = createWalkConfig({ ignoreOnlyPattern: 'node_modules' });

    expect(classify(dir('node_modules'), config)).toBe('visible');
    expect(classify(dir('.git'), config)).toBe('ignored-default');
  });

  it('applies custom patterns unless they are bypassed', () => {
    const customIgnorePatterns = compileIgnorePatterns(['*.log']);

    expect(classify(file('a.log'), createWalkConfig({ customIgnorePatterns }))).toBe('ignored-pattern');
    expect(classify(file('a.log'), createWalkConfig({ customIgnorePatterns, bypassCustomPatterns: true }))).toBe(
      'visible',
    );
    expect(classify(file('a.log'), createWalkConfig({ customIgnorePatterns, ignoreOnlyPattern: 'dist' }))).toBe(
      'visible',
    );
  });

  it('checks default directory names before custom patterns', () => {
    const config = createWalkConfig({ customIgnorePatterns: compileIgnorePatterns(['build']) });

    expect(classify(dir('build'), config)).toBe('ignored-default');
  });

  it('ignores default file names', () => {
    expect(classify(file('cache.pyc'), createWalkConfig())).toBe('ignored-default');
    expect(classify(file('cache.pyc'), createWalkConfig({ ignoreDefaultsDisabled: true }))).toBe('ignored-default');
  });

  it('restricts everything to the git path set when one is present', () => {
    const config = createWalkConfig({
      gitRelationship: 'tracked',
      gitPathSet: new GitPathSet(['/repo/src/a.ts', '/repo/dist/out.js']),
    });

    expect(classify(dir('src', '/repo'), config)).toBe('visible');
    expect(classify(dir('dist', '/repo'), config)).toBe('visible');
    expect(classify(dir('docs', '/repo'), config)).toBe('ignored-git');
    expect(classify(file('a.ts', '/repo/src'), config)).toBe('visible');
    expect(classify(file('b.ts', '/repo/src'), config)).toBe('ignored-git');
  });

  it('falls back to the regular rules when git yields no path set', () => {
    const config = createWalkConfig({ gitRelationship: 'history' });

    expect(classify(dir('node_modules'), config)).toBe('ignored-default');
  });

  it('prunes directories strictly larger than the size limit', () => {
    root = createFixture({ big: { 'data.bin': 'x'.repeat(10) } });
    const big = new DirEntry(path.join(root, 'big'), 'big', true);

    expect(classify(big, createWalkConfig({ maxSubtreeBytes: 10 }))).toBe('visible');
    expect(classify(new DirEntry(big.path, 'big', true), createWalkConfig({ maxSubtreeBytes: 9 }))).toBe(
      'ignored-size',
    );
  });
});
