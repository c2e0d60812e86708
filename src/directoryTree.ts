import { BYTES_PER_MEGABYTE } from './constants';
import { type DirEntry, readEntries } from './directoryEntry';
import { classify } from './ignoreRules';
import { ConsoleSink, type LineSink } from './lineSink';
import { countFiles, formatSize } from './sizeAccountant';
import { childPrefix, createStyles, isRendered, type RenderDecision, renderLine, type Styles } from './treeRenderer';
import type { WalkConfig } from './walkConfig';

export interface DirectoryTreeOptions {
  sink?: LineSink;
  styles?: Styles;
  // Printed as the first line instead of the root path
  label?: string;
}

const SKIPPED: RenderDecision = { kind: 'skipped' };

export class DirectoryTree {
  rootPath: string;
  config: WalkConfig;
  private sink: LineSink;
  private styles: Styles;
  private label: string;

  constructor(rootPath: string, config: WalkConfig, options: DirectoryTreeOptions = {}) {
    this.rootPath = rootPath;
    this.config = config;
    this.sink = options.sink ?? new ConsoleSink();
    this.styles = options.styles ?? createStyles();
    this.label = options.label ?? rootPath;
  }

  render(): void {
    this.sink.write(this.styles.header(this.label));
    this.renderDirectory(this.rootPath, 0, '');
  }

  decide(entry: DirEntry): RenderDecision {
    switch (classify(entry, this.config)) {
      case 'ignored-default':
      case 'ignored-pattern':
        if (!entry.isDirectory) return SKIPPED;
        return {
          kind: 'pruned-ignored',
          entry,
          fileCount: countFiles(entry.path),
          bytes: this.config.showSizes ? entry.size : undefined,
        };

      case 'ignored-size':
        return { kind: 'pruned-oversized', entry, megabytes: Math.floor(entry.size / BYTES_PER_MEGABYTE) };

      case 'ignored-git':
        return SKIPPED;

      case 'visible':
        return {
          kind: 'shown',
          entry,
          // Symlinks are never sized
          sizeSuffix: this.config.showSizes && !entry.isDirectory && !entry.isSymlink ? formatSize(entry.size) : undefined,
        };
    }
  }

  renderDirectory(dirPath: string, depth: number, prefix: string): void {
    if (depth >= this.config.maxDepth) return;

    // Every sibling is decided before the first line is written, so the
    // last connector goes to the last entry that is actually shown
    const decisions = readEntries(dirPath)
      .map((entry) => this.decide(entry))
      .filter(isRendered);

    decisions.forEach((decision, index) => {
      const isLast = index === decisions.length - 1;
      this.sink.write(renderLine(decision, prefix, isLast, this.styles));

      if (decision.kind === 'shown' && decision.entry.isDirectory) {
        this.renderDirectory(decision.entry.path, depth + 1, childPrefix(prefix, isLast));
      }
    });
  }
}
