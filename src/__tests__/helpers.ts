/**
 * In-process stand-ins for the git-backed repository.
 */

import { FileMergeResult } from '../conflict';
import { RepositoryReadError } from '../errors';
import type { RunLogger } from '../logger';
import type { Commit, MergeHistory } from '../types';

export function makeId(prefix: string): string {
  return prefix.padEnd(40, '0');
}

/** Marker-annotated merge output for a single conflict */
export function conflict(ours: string, theirs: string): string {
  return `<<<<<<< ours\n${ours}=======\n${theirs}>>>>>>> theirs\n`;
}

export class MemoryHistory implements MergeHistory {
  readonly blobs = new Map<string, string>();
  readonly commits: Commit[] = [];
  private readonly merges = new Map<string, Record<string, string> | Error>();

  constructor(readonly name = 'memory') {}

  /** Register a merge commit with its re-merge outputs (path → marker text). */
  addMerge(id: string, outputs: Record<string, string> | Error, committed: Record<string, string> = {}): Commit {
    const commit = { id, parents: [`${id}-ours`, `${id}-theirs`] };
    this.commits.push(commit);
    this.merges.set(id, outputs);
    for (const [filePath, content] of Object.entries(committed)) {
      this.blobs.set(`${id}:${filePath}`, content);
    }
    return commit;
  }

  readBlob(revision: string, filePath: string): string {
    const content = this.blobs.get(`${revision}:${filePath}`);
    if (content === undefined) {
      throw new RepositoryReadError(revision, filePath, 'missing');
    }
    return content;
  }

  listMergeCommits(limit?: number): Commit[] {
    return limit === undefined ? [...this.commits] : this.commits.slice(0, limit);
  }

  computeMergeResults(commit: Commit): Map<string, FileMergeResult> {
    const outputs = this.merges.get(commit.id);
    if (outputs instanceof Error) throw outputs;
    const results = new Map<string, FileMergeResult>();
    for (const [filePath, text] of Object.entries(outputs ?? {})) {
      results.set(filePath, new FileMergeResult(text));
    }
    return results;
  }
}

export class MemoryLogger implements RunLogger {
  readonly lines: string[] = [];

  log(message: string): void {
    this.lines.push(message);
  }
}
