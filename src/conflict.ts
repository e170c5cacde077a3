import { InvariantError, MergeParseError, RepositoryReadError, errorMessage } from './errors';
import { ProductSpace, choiceSet } from './product';
import { ResolutionFile } from './resolution';
import type { Commit, MergeResult, Repository, SizedIterable } from './types';

/**
 * One conflict region. Line arrays keep their line endings.
 * `base` is only present when the merge output carried a diff3 base section.
 */
export interface ConflictHunk {
  ours: string[];
  base?: string[];
  theirs: string[];
  /** 1-based line of the opening marker in the merge output */
  line: number;
}

export type MergeSegment =
  | { kind: 'stable'; lines: string[] }
  | { kind: 'conflict'; hunk: ConflictHunk };

/**
 * How a single hunk is resolved
 */
export type HunkStrategy = 'ours' | 'theirs' | 'ours-theirs' | 'theirs-ours';

export interface HunkCandidate {
  strategy: HunkStrategy;
  lines: string[];
}

const OPEN_RE = /^<{7}(?: .*)?$/;
const BASE_RE = /^\|{7}(?: .*)?$/;
const SEPARATOR_RE = /^={7}$/;
const CLOSE_RE = /^>{7}(?: .*)?$/;

/** Split text into lines, each keeping its terminator. */
function splitLines(text: string): string[] {
  return text.split(/(?<=\n)/).filter((line) => line !== '');
}

/**
 * Parse the marker-annotated output of a three-way text merge into
 * stable runs and conflict hunks.
 */
export function parseMergeOutput(text: string): MergeSegment[] {
  const segments: MergeSegment[] = [];
  let stable: string[] = [];
  let hunk: ConflictHunk | undefined;
  let section: 'ours' | 'base' | 'theirs' = 'ours';

  const lines = splitLines(text);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const bare = line.replace(/\r?\n$/, '');

    if (!hunk) {
      if (OPEN_RE.test(bare)) {
        if (stable.length > 0) segments.push({ kind: 'stable', lines: stable });
        stable = [];
        hunk = { ours: [], theirs: [], line: i + 1 };
        section = 'ours';
      } else {
        stable.push(line);
      }
      continue;
    }

    if (OPEN_RE.test(bare)) {
      throw new MergeParseError('Nested conflict marker', i + 1);
    }

    if (section === 'ours' && BASE_RE.test(bare)) {
      hunk.base = [];
      section = 'base';
    } else if (section !== 'theirs' && SEPARATOR_RE.test(bare)) {
      section = 'theirs';
    } else if (CLOSE_RE.test(bare)) {
      if (section !== 'theirs') {
        throw new MergeParseError('Closing conflict marker before separator', i + 1);
      }
      segments.push({ kind: 'conflict', hunk });
      hunk = undefined;
    } else if (section === 'base') {
      hunk.base?.push(line);
    } else {
      hunk[section].push(line);
    }
  }

  if (hunk) {
    throw new MergeParseError('Unterminated conflict', hunk.line);
  }
  if (stable.length > 0) segments.push({ kind: 'stable', lines: stable });
  return segments;
}

/**
 * Result of merging one file three ways, as marker-annotated text.
 */
export class FileMergeResult implements MergeResult {
  readonly segments: MergeSegment[];

  constructor(readonly text: string) {
    this.segments = parseMergeOutput(text);
  }

  get hunks(): ConflictHunk[] {
    const hunks: ConflictHunk[] = [];
    for (const segment of this.segments) {
      if (segment.kind === 'conflict') hunks.push(segment.hunk);
    }
    return hunks;
  }

  get conflictCount(): number {
    return this.hunks.length;
  }

  containsConflicts(): boolean {
    return this.segments.some((s) => s.kind === 'conflict');
  }
}

/**
 * Syntactically distinct resolutions of one hunk, in a fixed order:
 * ours, theirs, ours then theirs, theirs then ours. Later candidates whose
 * text equals an earlier one are dropped.
 */
export function hunkCandidates(hunk: ConflictHunk): HunkCandidate[] {
  const all: HunkCandidate[] = [
    { strategy: 'ours', lines: hunk.ours },
    { strategy: 'theirs', lines: hunk.theirs },
    { strategy: 'ours-theirs', lines: [...hunk.ours, ...hunk.theirs] },
    { strategy: 'theirs-ours', lines: [...hunk.theirs, ...hunk.ours] },
  ];
  const seen = new Set<string>();
  return all.filter((candidate) => {
    const key = candidate.lines.join('');
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * A file whose three-way merge left conflicts. Iterating it yields every
 * candidate resolution of the whole file: one candidate per hunk, combined in
 * product order with the last hunk varying fastest.
 */
export class ConflictingFile implements SizedIterable<ResolutionFile> {
  private readonly candidates: HunkCandidate[][];

  constructor(
    private readonly repository: Repository,
    private readonly commit: Commit,
    private readonly mergeResult: FileMergeResult,
    readonly path: string,
  ) {
    if (!mergeResult.containsConflicts()) {
      throw new InvariantError(`"${path}" has no conflicts in ${commit.id}`);
    }
    this.candidates = mergeResult.hunks.map(hunkCandidates);
  }

  getConflictCount(): number {
    return this.candidates.length;
  }

  size(): number {
    return this.buildSpace().size();
  }

  /**
   * The file exactly as committed in the merge commit.
   * @throws RepositoryReadError when the content cannot be read
   */
  getActualResolutionFile(): ResolutionFile {
    let content: string;
    try {
      content = this.repository.readBlob(this.commit.id, this.path);
    } catch (e: unknown) {
      if (e instanceof RepositoryReadError) throw e;
      throw new RepositoryReadError(
        this.commit.id,
        this.path,
        errorMessage(e),
        e instanceof Error ? e : undefined,
      );
    }
    return new ResolutionFile(this.path, content);
  }

  *[Symbol.iterator](): Iterator<ResolutionFile> {
    for (const choices of this.buildSpace()) {
      yield new ResolutionFile(this.path, this.render(choices));
    }
  }

  private buildSpace(): ProductSpace<HunkCandidate> {
    const space = new ProductSpace<HunkCandidate>();
    for (const options of this.candidates) {
      space.connect(choiceSet(options));
    }
    return space;
  }

  private render(choices: HunkCandidate[]): string {
    let next = 0;
    return this.mergeResult.segments
      .map((segment) =>
        segment.kind === 'stable' ? segment.lines.join('') : choices[next++].lines.join(''),
      )
      .join('');
  }
}
