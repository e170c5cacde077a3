import type { FileMergeResult } from './conflict';

/**
 * A finite, ordered, restartable collection that knows its own cardinality.
 * Every `[Symbol.iterator]()` call starts over and yields the same sequence.
 *
 * `size()` is a double so that products of many sizes never throw; beyond
 * 2^53 the value is approximate, beyond ~1.8e308 it is `Infinity`.
 */
export interface SizedIterable<T> extends Iterable<T> {
  size(): number;
}

/**
 * Explicit-cursor iteration: check `hasNext()` before `next()`.
 * `next()` past exhaustion returns `null`.
 */
export interface Cursor<T> {
  hasNext(): boolean;
  next(): T | null;
}

/**
 * A commit as seen by the analysis: its full hash and its parents.
 */
export interface Commit {
  id: string;
  parents: string[];
}

/**
 * Read access to historical file content.
 */
export interface Repository {
  /** Display name, usually the work tree's directory name */
  readonly name: string;
  /** Content of `filePath` at `revision`. Throws RepositoryReadError. */
  readBlob(revision: string, filePath: string): string;
}

/**
 * Outcome of a three-way merge of one file.
 */
export interface MergeResult {
  containsConflicts(): boolean;
}

/**
 * A repository that can enumerate merge commits and re-run their merges.
 */
export interface MergeHistory extends Repository {
  /** Two-parent merge commits, most recent first. */
  listMergeCommits(limit?: number): Commit[];
  /** Per-path result of merging the commit's two parents. */
  computeMergeResults(commit: Commit): Map<string, FileMergeResult>;
}

/**
 * Options for the `analyze` command
 */
export interface AnalyzeOptions {
  /** Stop searching a merge's space after this many candidates */
  maxCandidates: number;
  /** Inspect at most this many merge commits per repository */
  maxMerges?: number;
  /** Compare file content with whitespace runs collapsed */
  ignoreWhitespace?: boolean;
  verbose?: boolean;
}

/**
 * Where the actual resolution sits in a merge's resolution space.
 */
export interface MatchResult {
  /** Zero-based traversal index of the first equal candidate, or null */
  index: number | null;
  /** Candidates compared before stopping */
  examined: number;
  /** True when the whole space was compared (or a match was found) */
  exhaustive: boolean;
}

/**
 * Per-merge analysis record
 */
export interface MergeAnalysis {
  commit: string;
  shortId: string;
  files: string[];
  conflicts: number;
  resolutions: number;
  match?: MatchResult;
  errorMessage?: string;
}

/**
 * Overall summary of one repository's analysis
 */
export interface AnalysisSummary {
  repository: string;
  /** Merge commits inspected */
  total: number;
  /** Merges that re-merged with at least one conflicting file */
  conflicting: number;
  /** Actual resolution found in the space */
  found: number;
  /** Space fully searched without a match */
  notFound: number;
  /** Search stopped at the candidate limit */
  undecided: number;
  failed: number;
  merges: MergeAnalysis[];
}
