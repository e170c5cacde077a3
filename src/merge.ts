import { ConflictingFile, type FileMergeResult } from './conflict';
import { InvariantError } from './errors';
import { ProductSpace } from './product';
import { type CompareOptions, type ResolutionFile, ResolutionMerge } from './resolution';
import type { Commit, Cursor, MatchResult, Repository, SizedIterable } from './types';

export const SHORT_ID_LENGTH = 7;

export interface SearchOptions extends CompareOptions {
  /** Give up after comparing this many candidates */
  limit?: number;
}

/**
 * A merge commit whose re-merge produced conflicts.
 *
 * Conflicting files are discovered once, in the constructor. Iterating yields
 * every whole-merge resolution (one candidate per conflicting file); the
 * resolution space is rebuilt from the file list on every call.
 */
export class ConflictingMerge implements SizedIterable<ResolutionMerge> {
  private readonly conflictingFiles: ConflictingFile[];

  constructor(
    private readonly repository: Repository,
    readonly commit: Commit,
    private readonly mergeResults: Map<string, FileMergeResult>,
  ) {
    this.conflictingFiles = this.findConflictingFiles();
  }

  getConflictingFiles(): readonly ConflictingFile[] {
    return this.conflictingFiles;
  }

  getCommitId(): string {
    return this.commit.id;
  }

  getCommitIdShort(): string {
    const id = this.getCommitId();
    if (id.length < SHORT_ID_LENGTH) {
      throw new InvariantError(`Commit id "${id}" is shorter than ${SHORT_ID_LENGTH} characters`);
    }
    return id.slice(0, SHORT_ID_LENGTH);
  }

  /**
   * Number of whole-merge resolutions: 0 without conflicts, otherwise the
   * product of every conflicting file's candidate count.
   */
  size(): number {
    return this.buildResolutions().size();
  }

  /** Total conflict regions over all conflicting files. */
  getConflictCount(): number {
    return this.conflictingFiles.reduce((count, file) => count + file.getConflictCount(), 0);
  }

  /**
   * A fresh cursor over every possible resolution. `next()` returns null once
   * the space is exhausted.
   */
  iterator(): Cursor<ResolutionMerge> {
    const cursor = this.buildResolutions().traverse();
    return {
      hasNext: () => cursor.hasNext(),
      next: () => {
        const files = cursor.next();
        return files === null ? null : new ResolutionMerge(files);
      },
    };
  }

  *[Symbol.iterator](): Iterator<ResolutionMerge> {
    for (const files of this.buildResolutions()) {
      yield new ResolutionMerge(files);
    }
  }

  /**
   * The resolution that was actually committed, assembled from each file's
   * content at the merge commit.
   * @throws RepositoryReadError if any file cannot be read
   */
  getActualResolution(): ResolutionMerge {
    const resolutionMerge = new ResolutionMerge();
    for (const conflictingFile of this.conflictingFiles) {
      resolutionMerge.add(conflictingFile.getActualResolutionFile());
    }
    return resolutionMerge;
  }

  /**
   * Walk the resolution space looking for the committed resolution.
   * Stops at the first match or after `limit` candidates.
   */
  findActualResolution(options: SearchOptions = {}): MatchResult {
    const actual = this.getActualResolution();
    const limit = options.limit ?? Infinity;
    const cursor = this.iterator();
    let examined = 0;

    while (examined < limit && cursor.hasNext()) {
      const candidate = cursor.next();
      if (candidate === null) break;
      if (candidate.equals(actual, options)) {
        return { index: examined, examined: examined + 1, exhaustive: true };
      }
      examined++;
    }

    return { index: null, examined, exhaustive: !cursor.hasNext() };
  }

  private findConflictingFiles(): ConflictingFile[] {
    const conflictingFiles: ConflictingFile[] = [];
    for (const [fileName, mergeResult] of this.mergeResults) {
      if (!mergeResult.containsConflicts()) continue;
      conflictingFiles.push(
        new ConflictingFile(this.repository, this.commit, mergeResult, fileName),
      );
    }
    return conflictingFiles;
  }

  private buildResolutions(): ProductSpace<ResolutionFile> {
    const space = new ProductSpace<ResolutionFile>();
    for (const conflictingFile of this.conflictingFiles) {
      space.connect(conflictingFile);
    }
    return space;
  }
}
