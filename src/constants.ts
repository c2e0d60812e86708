export const SYMBOLS: Symbols = {
  BRANCH: '├── ',
  LAST_BRANCH: '└── ',
  INDENT: '│   ',
  INDENT_EMPTY: '    ',
};

// Directories skipped by default: VCS metadata, dependency and build output,
// language caches and editor state
export const IGNORE_DIRS: ReadonlySet<string> = new Set([
  '__pycache__',
  '.pytest_cache',
  '.mypy_cache',
  '.ruff_cache',
  '.tox',
  'dist',
  'build',
  '.coverage',
  'venv',
  '.venv',
  'env',
  '.env',
  'virtualenv',
  'node_modules',
  '.npm',
  '.yarn',
  '.git',
  '.svn',
  '.hg',
  '.vscode',
  '.idea',
  'target',
  'bin',
  'obj',
  '.next',
  '.nuxt',
  '.DS_Store',
]);

export const IGNORE_DIR_SUFFIX = '.egg-info';

// Compiled artifacts and editor swap files
export const IGNORE_FILE_EXTENSIONS: ReadonlySet<string> = new Set(['pyc', 'pyo', 'pyd', 'swp', 'swo']);

export const IGNORE_FILE_NAMES: ReadonlySet<string> = new Set(['package-lock.json', '.DS_Store']);

export const WINDOWS_EXECUTABLE_EXTENSIONS: ReadonlySet<string> = new Set(['exe', 'bat', 'cmd', 'sh', 'py', 'ps1']);

export const BYTES_PER_MEGABYTE = 1024 * 1024;

export const TOP_EXTENSION_COUNT = 10;

export const PATTERN_FILE_NAME = 'ignores.txt';

export const VERSION = '0.1.0';
