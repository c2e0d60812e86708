import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { defaultConfigDir, PatternStore } from './patternStore';
import { createFixture, removeFixture } from './testFixtures';

describe('PatternStore', () => {
  let configDir = '';
  let store: PatternStore;

  beforeEach(() => {
    configDir = createFixture({});
    store = new PatternStore(path.join(configDir, 'arbor'));
  });

  afterEach(() => {
    removeFixture(configDir);
  });

  it('starts empty', () => {
    expect(store.load()).toEqual([]);
  });

  it('appends new patterns once, in order', () => {
    expect(store.add(['*.log', 'tmp*', '*.log'])).toEqual(['*.log', 'tmp*']);
    expect(store.add(['*.log'])).toEqual([]);
    expect(store.load()).toEqual(['*.log', 'tmp*']);
    expect(fs.readFileSync(store.filePath, 'utf8')).toBe('*.log\ntmp*\n');
  });

  it('removes only the patterns it holds', () => {
    store.add(['*.log', 'tmp*']);

    expect(store.remove(['tmp*', 'nope'])).toEqual(['tmp*']);
    expect(store.load()).toEqual(['*.log']);
  });

  it('clears everything', () => {
    store.add(['*.log']);

    expect(store.clear()).toBe(true);
    expect(store.load()).toEqual([]);
    expect(store.clear()).toBe(false);
  });
});

describe('defaultConfigDir', () => {
  it('prefers ARBOR_CONFIG_DIR, then XDG_CONFIG_HOME', () => {
    expect(defaultConfigDir({ ARBOR_CONFIG_DIR: '/custom' })).toBe('/custom');
    expect(defaultConfigDir({ XDG_CONFIG_HOME: '/cfg' })).toBe(path.join('/cfg', 'arbor'));
  });
});
