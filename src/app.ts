import fs from 'node:fs';
import path from 'node:path';

import { type CliCommand, HELP_TEXT, parseArgs, type SearchCommandOptions, type TreeOptions } from './cli';
import { BYTES_PER_MEGABYTE, VERSION } from './constants';
import { DirectorySummary } from './directorySummary';
import { DirectoryTree } from './directoryTree';
import { ArborError, NotARepositoryError } from './errors';
import { FileSearch } from './fileSearch';
import type { GitPathSet, GitStatusOracle } from './gitStatus';
import { compileIgnorePatterns } from './ignoreRules';
import type { LineSink } from './lineSink';
import type { PatternStore } from './patternStore';
import type { Styles } from './treeRenderer';
import { createWalkConfig, type WalkConfig } from './walkConfig';

export interface AppDependencies {
  sink: LineSink;
  styles: Styles;
  oracle: GitStatusOracle;
  store: PatternStore;
  confirm: (message: string) => Promise<boolean>;
}

interface ResolvedTree {
  rootPath: string;
  label: string;
  config: WalkConfig;
}

function canonicalPath(target: string): string {
  try {
    return fs.realpathSync(path.resolve(target));
  } catch {
    return path.resolve(target);
  }
}

/**
 * Turns parsed options into the walk root and an immutable WalkConfig. The
 * git snapshot is taken here, once, before anything is printed.
 */
export function resolveTree(options: TreeOptions, deps: Pick<AppDependencies, 'oracle' | 'store'>): ResolvedTree {
  const noIgnore = options.noIgnore;
  const storePatterns = noIgnore === undefined || noIgnore.kind === 'defaults' ? deps.store.load() : [];

  let rootPath = options.path;
  let label = options.path;
  let gitPathSet: GitPathSet | undefined;

  if (options.gitRelationship !== 'none') {
    const repositoryRoot = deps.oracle.repositoryRoot(canonicalPath(options.path));
    if (repositoryRoot === null) {
      throw new NotARepositoryError();
    }

    // Walk canonical paths so entries line up with what git reports
    rootPath = options.gitRoot ? repositoryRoot : canonicalPath(options.path);
    if (options.gitRoot) label = repositoryRoot;
    gitPathSet = deps.oracle.pathsFor(repositoryRoot, options.gitRelationship) ?? undefined;
  }

  const config = createWalkConfig({
    maxDepth: options.depth ?? Infinity,
    customIgnorePatterns: compileIgnorePatterns([...storePatterns, ...options.ignorePatterns]),
    bypassCustomPatterns: noIgnore !== undefined,
    maxSubtreeBytes: options.skipLargeMb === undefined ? undefined : options.skipLargeMb * BYTES_PER_MEGABYTE,
    gitRelationship: options.gitRelationship,
    gitPathSet,
    showSizes: options.showSizes,
    ignoreDefaultsDisabled: noIgnore?.kind === 'all' || noIgnore?.kind === 'defaults',
    ignoreOnlyPattern: noIgnore?.kind === 'name' ? noIgnore.name : undefined,
  });

  return { rootPath, label, config };
}

function runTree(options: TreeOptions, deps: AppDependencies): number {
  const { rootPath, label, config } = resolveTree(options, deps);

  if (options.depth === 0) {
    // The summary applies saved and --ignore patterns whatever --no-ignore says
    const patterns = compileIgnorePatterns([...deps.store.load(), ...options.ignorePatterns]);
    new DirectorySummary(rootPath, patterns, { sink: deps.sink, styles: deps.styles, oracle: deps.oracle }).render();
    return 0;
  }

  new DirectoryTree(rootPath, config, { sink: deps.sink, styles: deps.styles, label }).render();
  return 0;
}

function runSearch(options: SearchCommandOptions, deps: AppDependencies): number {
  const search = new FileSearch(options.pattern, options.path, {
    maxDepth: options.maxDepth,
    flat: options.flat,
    customIgnorePatterns: compileIgnorePatterns(deps.store.load()),
    sink: deps.sink,
    styles: deps.styles,
  });
  search.run();
  return 0;
}

async function runCommand(command: CliCommand, deps: AppDependencies): Promise<number> {
  const { sink, styles, store } = deps;

  switch (command.kind) {
    case 'help':
      sink.write(HELP_TEXT.trim());
      return 0;

    case 'version':
      sink.write(VERSION);
      return 0;

    case 'tree':
      return runTree(command.options, deps);

    case 'search':
      return runSearch(command.options, deps);

    case 'add': {
      const added = store.add(command.patterns);
      if (added.length === 0) {
        sink.write(styles.warning('patterns already saved'));
      } else {
        sink.write(styles.success(`added: ${added.join(', ')}`));
      }
      return 0;
    }

    case 'remove': {
      const removed = store.remove(command.patterns);
      if (removed.length === 0) {
        sink.write(styles.warning('no matching saved patterns'));
      } else {
        sink.write(styles.success(`removed: ${removed.join(', ')}`));
      }
      return 0;
    }

    case 'list': {
      const patterns = store.load();
      if (patterns.length === 0) {
        sink.write(styles.warning('no saved patterns'));
      } else {
        patterns.forEach((pattern) => sink.write(pattern));
      }
      return 0;
    }

    case 'clear': {
      const confirmed = command.confirmed || (await deps.confirm('Remove all saved ignore patterns?'));
      if (!confirmed) {
        sink.write(styles.warning('cancelled'));
        return 0;
      }
      sink.write(store.clear() ? styles.success('cleared saved patterns') : styles.warning('no saved patterns'));
      return 0;
    }
  }
}

// Returns the process exit code; only unexpected failures escape
export async function runApp(args: string[], deps: AppDependencies): Promise<number> {
  try {
    return await runCommand(parseArgs(args), deps);
  } catch (error) {
    if (error instanceof ArborError) {
      deps.sink.error(deps.styles.error(`error: ${error.message}`));
      if (error.exitCode === 2) {
        deps.sink.error("Run 'arbor --help' for usage.");
      }
      return error.exitCode;
    }
    throw error;
  }
}
