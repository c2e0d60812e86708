import type { GitPathSet } from './gitStatus';

export type GitRelationship = 'none' | 'tracked' | 'untracked' | 'staged' | 'changed' | 'history';

// When several relationships are requested, the first one listed here wins
export const GIT_RELATIONSHIP_PRECEDENCE: readonly GitRelationship[] = [
  'changed',
  'staged',
  'untracked',
  'tracked',
  'history',
];

export interface WalkConfig {
  readonly maxDepth: number;
  readonly customIgnorePatterns: readonly RegExp[];
  // Set whenever --no-ignore is given, whatever its value
  readonly bypassCustomPatterns: boolean;
  readonly maxSubtreeBytes?: number;
  readonly gitRelationship: GitRelationship;
  readonly gitPathSet?: GitPathSet;
  readonly showSizes: boolean;
  readonly ignoreDefaultsDisabled: boolean;
  // Re-enables exactly this one default-ignored directory name
  readonly ignoreOnlyPattern?: string;
}

export function createWalkConfig(input: Partial<WalkConfig> = {}): WalkConfig {
  return Object.freeze({
    maxDepth: input.maxDepth ?? Infinity,
    customIgnorePatterns: Object.freeze([...(input.customIgnorePatterns ?? [])]),
    bypassCustomPatterns: input.bypassCustomPatterns ?? false,
    maxSubtreeBytes: input.maxSubtreeBytes,
    gitRelationship: input.gitRelationship ?? 'none',
    gitPathSet: input.gitPathSet,
    showSizes: input.showSizes ?? false,
    ignoreDefaultsDisabled: input.ignoreDefaultsDisabled ?? false,
    ignoreOnlyPattern: input.ignoreOnlyPattern,
  });
}

export function resolveGitRelationship(requested: ReadonlySet<GitRelationship>): GitRelationship {
  return GIT_RELATIONSHIP_PRECEDENCE.find((relationship) => requested.has(relationship)) ?? 'none';
}
