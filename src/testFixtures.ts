import chalk from 'chalk';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { createStyles, type Styles } from './treeRenderer';

// A string is a file with that content, an object is a directory
export interface FixtureTree {
  [name: string]: string | FixtureTree;
}

export function writeFixture(dirPath: string, tree: FixtureTree): void {
  for (const [name, content] of Object.entries(tree)) {
    const target = path.join(dirPath, name);
    if (typeof content === 'string') {
      fs.writeFileSync(target, content);
    } else {
      fs.mkdirSync(target);
      writeFixture(target, content);
    }
  }
}

// Real, canonical temporary directory holding `tree`
export function createFixture(tree: FixtureTree): string {
  const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'arbor-')));
  writeFixture(root, tree);
  return root;
}

export function removeFixture(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

export function plainStyles(): Styles {
  return createStyles(new chalk.Instance({ level: 0 }));
}
