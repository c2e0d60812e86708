import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { PATTERN_FILE_NAME } from './constants';

export function defaultConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.ARBOR_CONFIG_DIR) return env.ARBOR_CONFIG_DIR;
  const configHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(configHome, 'arbor');
}

/**
 * User-saved ignore patterns, one per line. They are applied exactly like
 * --ignore patterns and come before them.
 */
export class PatternStore {
  readonly filePath: string;

  constructor(configDir: string = defaultConfigDir()) {
    this.filePath = path.join(configDir, PATTERN_FILE_NAME);
  }

  load(): string[] {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf8');
    } catch {
      // Nothing saved yet
      return [];
    }
    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  // Returns the patterns that were not already stored
  add(patterns: readonly string[]): string[] {
    const current = this.load();
    const added: string[] = [];
    for (const pattern of patterns.map((p) => p.trim())) {
      if (pattern && !current.includes(pattern) && !added.includes(pattern)) {
        added.push(pattern);
      }
    }
    if (added.length > 0) {
      this.save([...current, ...added]);
    }
    return added;
  }

  // Returns the patterns that were actually removed
  remove(patterns: readonly string[]): string[] {
    const current = this.load();
    const wanted = new Set(patterns.map((p) => p.trim()));
    const removed = current.filter((pattern) => wanted.has(pattern));
    if (removed.length > 0) {
      this.save(current.filter((pattern) => !wanted.has(pattern)));
    }
    return removed;
  }

  // False when there was nothing to clear
  clear(): boolean {
    if (!fs.existsSync(this.filePath)) return false;
    fs.rmSync(this.filePath);
    return true;
  }

  private save(patterns: readonly string[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, patterns.map((pattern) => `${pattern}\n`).join(''));
  }
}
