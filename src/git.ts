import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { FileMergeResult } from './conflict';
import { RepositoryReadError } from './errors';
import type { Commit, MergeHistory } from './types';

interface GitOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Run a git command synchronously, returning { stdout, stderr, exitCode } */
export function runGit(args: string[], cwd?: string, maxBuffer?: number): GitOutput {
  const result = spawnSync('git', args, {
    cwd,
    encoding: 'utf8',
    windowsHide: true,
    maxBuffer: maxBuffer ?? 64 * 1024 * 1024, // 64 MB default
  });

  if (result.error) {
    throw new Error(`Failed to spawn git: ${result.error.message}`);
  }
  // output of a killed process may be truncated
  if (result.signal !== null) {
    throw new Error(`git ${args[0]} was terminated by ${result.signal}`);
  }

  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    exitCode: result.status ?? 1,
  };
}

/**
 * Verify that the given directory is inside a git work tree.
 * Throws if not valid.
 */
export function verifyRepository(workTree: string): void {
  const { stdout, stderr, exitCode } = runGit(['rev-parse', '--is-inside-work-tree'], workTree);
  if (exitCode !== 0 || stdout.trim() !== 'true') {
    throw new Error(`"${workTree}" is not a git work tree:\n${stderr.trim()}`);
  }
}

/**
 * Clone `url` into `target`. Throws with git's stderr on failure.
 */
export function cloneRepository(url: string, target: string): void {
  const { stderr, exitCode } = runGit(['clone', '--quiet', url, target]);
  if (exitCode !== 0) {
    throw new Error(`git clone ${url} failed:\n${stderr.trim()}`);
  }
}

function splitLines(stdout: string): string[] {
  return stdout
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
}

/** Paths from a `-z` listing: verbatim, unquoted, NUL-terminated. */
function splitPaths(stdout: string): string[] {
  return stdout.split('\0').filter((p) => p !== '');
}

/**
 * Three-way merge of in-memory contents with `git merge-file --diff3`.
 * The inputs are staged in a temporary directory that is always removed.
 */
export function mergeContents(ours: string, base: string, theirs: string): FileMergeResult {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mergeres-'));
  try {
    const files = { ours, base, theirs };
    for (const [name, content] of Object.entries(files)) {
      fs.writeFileSync(path.join(dir, name), content, 'utf8');
    }
    const { stdout, stderr, exitCode } = runGit(
      ['merge-file', '-p', '--diff3', '-L', 'ours', '-L', 'base', '-L', 'theirs', 'ours', 'base', 'theirs'],
      dir,
    );
    // exit code is the number of conflicts (capped at 127); negative means error
    if (exitCode < 0 || exitCode > 127) {
      throw new Error(`git merge-file failed:\n${stderr.trim()}`);
    }
    return new FileMergeResult(stdout);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * A local git work tree, driven through the git command line.
 */
export class GitRepository implements MergeHistory {
  readonly name: string;

  constructor(readonly workTree: string) {
    this.name = path.basename(path.resolve(workTree));
  }

  readBlob(revision: string, filePath: string): string {
    const { stdout, stderr, exitCode } = runGit(['show', `${revision}:${filePath}`], this.workTree);
    if (exitCode !== 0) {
      throw new RepositoryReadError(revision, filePath, stderr.trim() || `git exited with ${exitCode}`);
    }
    return stdout;
  }

  /** Like readBlob, but undefined when the path does not exist at `revision`. */
  tryReadBlob(revision: string, filePath: string): string | undefined {
    const { exitCode } = runGit(['cat-file', '-e', `${revision}:${filePath}`], this.workTree);
    if (exitCode !== 0) return undefined;
    return this.readBlob(revision, filePath);
  }

  listMergeCommits(limit?: number): Commit[] {
    const args = ['rev-list', '--merges', '--parents'];
    if (limit !== undefined) args.push(`--max-count=${limit}`);
    args.push('HEAD');

    const { stdout, stderr, exitCode } = runGit(args, this.workTree);
    if (exitCode !== 0) {
      throw new Error(`git rev-list failed in "${this.workTree}":\n${stderr.trim()}`);
    }

    return splitLines(stdout)
      .map((line) => line.split(/\s+/))
      .filter((ids) => ids.length === 3) // octopus merges are not analyzed
      .map(([id, ...parents]) => ({ id, parents }));
  }

  mergeBase(left: string, right: string): string | undefined {
    const { stdout, exitCode } = runGit(['merge-base', left, right], this.workTree);
    if (exitCode !== 0 || !stdout.trim()) return undefined;
    return stdout.trim();
  }

  changedFiles(from: string, to: string): string[] {
    const { stdout, stderr, exitCode } = runGit(
      ['diff', '--name-only', '-z', '--no-renames', from, to],
      this.workTree,
    );
    if (exitCode !== 0) {
      throw new Error(`git diff ${from} ${to} failed:\n${stderr.trim()}`);
    }
    return splitPaths(stdout);
  }

  /**
   * Re-merge the commit's two parents file by file. Only files changed on
   * both sides can conflict; files deleted on either side are skipped, files
   * absent from the merge base are merged against an empty base.
   */
  computeMergeResults(commit: Commit): Map<string, FileMergeResult> {
    const results = new Map<string, FileMergeResult>();
    if (commit.parents.length !== 2) return results;

    const [ours, theirs] = commit.parents;
    const base = this.mergeBase(ours, theirs);
    if (!base) return results;

    const theirsChanged = new Set(this.changedFiles(base, theirs));
    const candidates = this.changedFiles(base, ours).filter((f) => theirsChanged.has(f));

    for (const filePath of candidates) {
      const oursContent = this.tryReadBlob(ours, filePath);
      const theirsContent = this.tryReadBlob(theirs, filePath);
      if (oursContent === undefined || theirsContent === undefined) continue;
      const baseContent = this.tryReadBlob(base, filePath) ?? '';
      results.set(filePath, mergeContents(oursContent, baseContent, theirsContent));
    }

    return results;
  }
}
