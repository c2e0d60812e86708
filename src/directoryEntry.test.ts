import chalk from 'chalk';
import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DirEntry, isExecutable } from './directoryEntry';
import { createFixture, removeFixture } from './testFixtures';
import { createStyles, displayName } from './treeRenderer';

describe('executable files', () => {
  let root = '';
  let script = '';
  let notes = '';

  beforeEach(() => {
    root = createFixture({ 'run.sh': 'echo hi', 'notes.txt': 'plain' });
    script = path.join(root, 'run.sh');
    notes = path.join(root, 'notes.txt');
    fs.chmodSync(script, 0o755);
    fs.chmodSync(notes, 0o644);
  });

  afterEach(() => {
    removeFixture(root);
  });

  it('reads the execute bits', () => {
    expect(isExecutable(script)).toBe(true);
    expect(isExecutable(notes)).toBe(false);
    expect(isExecutable(path.join(root, 'gone'))).toBe(false);
  });

  it('styles executables apart from plain files', () => {
    const colors = new chalk.Instance({ level: 1 });
    const styles = createStyles(colors);

    const scriptName = displayName(new DirEntry(script, 'run.sh', false), styles);

    expect(scriptName).toBe(colors.green.bold('run.sh'));
    expect(scriptName).not.toBe('run.sh');
    expect(displayName(new DirEntry(notes, 'notes.txt', false), styles)).toBe('notes.txt');
  });
});
