import { UsageError } from './errors';
import { splitPatternList } from './ignoreRules';
import { type GitRelationship, resolveGitRelationship } from './walkConfig';

export const HELP_TEXT = `
arbor - a directory tree with sensible ignores

Usage:
  arbor [DEPTH] [PATH] [options]
  arbor search PATTERN [PATH] [--depth N] [--flat]
  arbor add PATTERN...        Save ignore patterns
  arbor remove PATTERN...     Forget saved ignore patterns
  arbor list                  Show saved ignore patterns
  arbor clear [--yes]         Forget every saved ignore pattern

DEPTH is the number of directory levels to expand (default: unlimited).
DEPTH 0 prints a summary of the immediate children instead of a tree.

Options:
  -p, --path <dir>           Starting directory (default: .)
  -g, --git                  Only files tracked by git
      --gu                   Only untracked files
      --gs                   Only staged files
      --gc                   Only changed (unstaged) files
      --gh                   Git history mode
      --gr, --gur, --gsr, --gcr, --ghr
                             Same as above, starting at the repository root
  -i, --ignore <patterns>    Comma-separated patterns to ignore, e.g. "*.log,temp*"
  -s, --skip-large <MB>      Skip directories larger than MB megabytes
  -z, --size                 Show file sizes
  -n, --no-ignore <what>     all | defaults | config | a directory name to un-ignore
  -h, --help                 Show this help message
  -v, --version              Show the version

Examples:
  arbor 2
  arbor -g src
  arbor 3 -i "*.log,tmp*" -z
  arbor --no-ignore node_modules 1
  arbor search "*.env" --flat
`;

export type NoIgnoreMode =
  | { kind: 'all' }
  | { kind: 'defaults' }
  | { kind: 'config' }
  | { kind: 'name'; name: string };

export interface TreeOptions {
  // undefined means unlimited
  depth?: number;
  path: string;
  gitRelationship: GitRelationship;
  gitRoot: boolean;
  ignorePatterns: string[];
  skipLargeMb?: number;
  showSizes: boolean;
  noIgnore?: NoIgnoreMode;
}

export interface SearchCommandOptions {
  pattern: string;
  path: string;
  maxDepth?: number;
  flat: boolean;
}

export type CliCommand =
  | { kind: 'tree'; options: TreeOptions }
  | { kind: 'search'; options: SearchCommandOptions }
  | { kind: 'add'; patterns: string[] }
  | { kind: 'remove'; patterns: string[] }
  | { kind: 'list' }
  | { kind: 'clear'; confirmed: boolean }
  | { kind: 'help' }
  | { kind: 'version' };

const GIT_FLAGS = new Map<string, { relationship: GitRelationship; root: boolean }>([
  ['-g', { relationship: 'tracked', root: false }],
  ['--git', { relationship: 'tracked', root: false }],
  ['--gu', { relationship: 'untracked', root: false }],
  ['--gs', { relationship: 'staged', root: false }],
  ['--gc', { relationship: 'changed', root: false }],
  ['--gh', { relationship: 'history', root: false }],
  ['--gr', { relationship: 'tracked', root: true }],
  ['--gur', { relationship: 'untracked', root: true }],
  ['--gsr', { relationship: 'staged', root: true }],
  ['--gcr', { relationship: 'changed', root: true }],
  ['--ghr', { relationship: 'history', root: true }],
]);

export function parseNonNegativeInt(value: string, flag: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`${flag} expects a non-negative integer, got '${value}'`);
  }
  return parseInt(value, 10);
}

export function parseNoIgnore(value: string): NoIgnoreMode {
  switch (value) {
    case 'all':
    case 'defaults':
    case 'config':
      return { kind: value };
    default:
      return { kind: 'name', name: value };
  }
}

/**
 * Walks an argument list, splitting `--flag=value` and handing out option
 * values so every command parser reads its arguments the same way.
 */
class ArgReader {
  private args: string[];
  private index = 0;
  private inlineValue: string | undefined;

  constructor(args: string[]) {
    this.args = args;
  }

  next(): string | undefined {
    const arg = this.args[this.index++];
    this.inlineValue = undefined;
    if (arg !== undefined && arg.startsWith('--') && arg.includes('=')) {
      const separator = arg.indexOf('=');
      this.inlineValue = arg.slice(separator + 1);
      return arg.slice(0, separator);
    }
    return arg;
  }

  value(flag: string): string {
    if (this.inlineValue !== undefined) {
      const value = this.inlineValue;
      this.inlineValue = undefined;
      return value;
    }
    const value = this.args[this.index++];
    if (value === undefined) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  }
}

function isOption(arg: string): boolean {
  return arg.startsWith('-') && arg !== '-';
}

function parseTree(args: string[]): CliCommand {
  const options: TreeOptions = {
    path: '.',
    gitRelationship: 'none',
    gitRoot: false,
    ignorePatterns: [],
    showSizes: false,
  };
  const requested = new Set<GitRelationship>();
  // -p only fills the path; a positional path also ends the depth slot
  let pathOptionGiven = false;
  let positionalPathGiven = false;

  const reader = new ArgReader(args);
  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    const gitFlag = GIT_FLAGS.get(arg);
    if (gitFlag) {
      requested.add(gitFlag.relationship);
      options.gitRoot = options.gitRoot || gitFlag.root;
      continue;
    }

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };

      case '-v':
      case '--version':
        return { kind: 'version' };

      case '-p':
      case '--path':
        options.path = reader.value(arg);
        pathOptionGiven = true;
        break;

      case '-i':
      case '--ignore':
        options.ignorePatterns.push(...splitPatternList(reader.value(arg)));
        break;

      case '-s':
      case '--skip-large':
        options.skipLargeMb = parseNonNegativeInt(reader.value(arg), arg);
        break;

      case '-z':
      case '--size':
        options.showSizes = true;
        break;

      case '-n':
      case '--no-ignore':
        options.noIgnore = parseNoIgnore(reader.value(arg));
        break;

      default:
        if (isOption(arg)) {
          throw new UsageError(`unknown option '${arg}'`);
        }
        if (options.depth === undefined && !positionalPathGiven && /^\d+$/.test(arg)) {
          options.depth = parseInt(arg, 10);
        } else if (!positionalPathGiven && !pathOptionGiven) {
          options.path = arg;
          positionalPathGiven = true;
        } else {
          throw new UsageError(`unexpected argument '${arg}'`);
        }
    }
  }

  options.gitRelationship = resolveGitRelationship(requested);
  return { kind: 'tree', options };
}

function parseSearch(args: string[]): CliCommand {
  let pattern: string | undefined;
  let searchPath: string | undefined;
  let maxDepth: number | undefined;
  let flat = false;

  const reader = new ArgReader(args);
  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };

      case '-d':
      case '--depth':
        maxDepth = parseNonNegativeInt(reader.value(arg), arg);
        break;

      case '-f':
      case '--flat':
        flat = true;
        break;

      default:
        if (isOption(arg)) {
          throw new UsageError(`unknown option '${arg}'`);
        }
        if (pattern === undefined) {
          pattern = arg;
        } else if (searchPath === undefined) {
          searchPath = arg;
        } else {
          throw new UsageError(`unexpected argument '${arg}'`);
        }
    }
  }

  if (pattern === undefined) {
    throw new UsageError('search requires a PATTERN');
  }
  return { kind: 'search', options: { pattern, path: searchPath ?? '.', maxDepth, flat } };
}

function parsePatternList(command: 'add' | 'remove', args: string[]): CliCommand {
  const patterns = args.flatMap(splitPatternList);
  if (patterns.length === 0) {
    throw new UsageError(`${command} requires at least one PATTERN`);
  }
  return { kind: command, patterns };
}

export function parseArgs(args: string[]): CliCommand {
  const [command, ...rest] = args;

  switch (command) {
    case 'search':
      return parseSearch(rest);

    case 'add':
    case 'remove':
      return parsePatternList(command, rest);

    case 'list':
      return { kind: 'list' };

    case 'clear':
      return { kind: 'clear', confirmed: rest.includes('-y') || rest.includes('--yes') };

    default:
      return parseTree(args);
  }
}
