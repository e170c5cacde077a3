import { describe, it, expect } from 'vitest';

import { ConflictingFile, FileMergeResult, hunkCandidates, parseMergeOutput } from '../conflict';
import { InvariantError, MergeParseError, RepositoryReadError } from '../errors';
import { MemoryHistory, conflict, makeId } from './helpers';

describe('parseMergeOutput', () => {
  it('splits stable text and a diff3 hunk', () => {
    const text = 'a\n<<<<<<< ours\nx\n||||||| base\nb\n=======\ny\n>>>>>>> theirs\nz\n';
    expect(parseMergeOutput(text)).toEqual([
      { kind: 'stable', lines: ['a\n'] },
      { kind: 'conflict', hunk: { ours: ['x\n'], base: ['b\n'], theirs: ['y\n'], line: 2 } },
      { kind: 'stable', lines: ['z\n'] },
    ]);
  });

  it('accepts hunks without a base section', () => {
    const [segment] = parseMergeOutput(conflict('x\n', 'y\n'));
    expect(segment).toEqual({ kind: 'conflict', hunk: { ours: ['x\n'], theirs: ['y\n'], line: 1 } });
  });

  it('keeps CRLF line endings in hunk content', () => {
    const text = '<<<<<<< ours\r\nx\r\n=======\r\ny\r\n>>>>>>> theirs\r\n';
    expect(parseMergeOutput(text)).toEqual([
      { kind: 'conflict', hunk: { ours: ['x\r\n'], theirs: ['y\r\n'], line: 1 } },
    ]);
  });

  it('treats a separator outside a hunk as content', () => {
    const result = new FileMergeResult('Title\n=======\n');
    expect(result.segments).toEqual([{ kind: 'stable', lines: ['Title\n', '=======\n'] }]);
    expect(result.containsConflicts()).toBe(false);
  });

  it('rejects an unterminated hunk', () => {
    expect(() => parseMergeOutput('<<<<<<< ours\nx\n')).toThrow('Unterminated conflict (line 1)');
  });

  it('rejects a closing marker before the separator', () => {
    expect(() => parseMergeOutput('<<<<<<< ours\nx\n>>>>>>> theirs\n')).toThrow(
      'Closing conflict marker before separator (line 3)',
    );
  });

  it('rejects nested hunks', () => {
    expect(() => parseMergeOutput('<<<<<<< ours\n<<<<<<< ours\n')).toThrow(MergeParseError);
  });
});

describe('FileMergeResult', () => {
  it('counts its hunks', () => {
    const result = new FileMergeResult(`a\n${conflict('x\n', 'y\n')}b\n${conflict('', 'q\n')}`);
    expect(result.containsConflicts()).toBe(true);
    expect(result.conflictCount).toBe(2);
  });
});

describe('hunkCandidates', () => {
  it('offers ours, theirs and both concatenations', () => {
    const candidates = hunkCandidates({ ours: ['x\n'], theirs: ['y\n'], line: 1 });
    expect(candidates).toEqual([
      { strategy: 'ours', lines: ['x\n'] },
      { strategy: 'theirs', lines: ['y\n'] },
      { strategy: 'ours-theirs', lines: ['x\n', 'y\n'] },
      { strategy: 'theirs-ours', lines: ['y\n', 'x\n'] },
    ]);
  });

  it('drops concatenations equal to one side when the other side is empty', () => {
    const candidates = hunkCandidates({ ours: [], theirs: ['y\n'], line: 1 });
    expect(candidates.map((c) => c.strategy)).toEqual(['ours', 'theirs']);
  });

  it('drops duplicates when both sides are equal', () => {
    const candidates = hunkCandidates({ ours: ['x\n'], theirs: ['x\n'], line: 1 });
    expect(candidates.map((c) => c.strategy)).toEqual(['ours', 'ours-theirs']);
  });
});

describe('ConflictingFile', () => {
  const id = makeId('cafe');
  const commit = { id, parents: ['p1', 'p2'] };
  const text = `a\n${conflict('x\n', 'y\n')}m\n${conflict('', 'q\n')}`;

  it('refuses a merge result without conflicts', () => {
    const history = new MemoryHistory();
    expect(() => new ConflictingFile(history, commit, new FileMergeResult('clean\n'), 'f.txt')).toThrow(
      InvariantError,
    );
  });

  it('sizes its space as the product of per-hunk candidates', () => {
    const file = new ConflictingFile(new MemoryHistory(), commit, new FileMergeResult(text), 'f.txt');
    expect(file.getConflictCount()).toBe(2);
    expect(file.size()).toBe(8);
  });

  it('renders every candidate in product order', () => {
    const file = new ConflictingFile(new MemoryHistory(), commit, new FileMergeResult(text), 'f.txt');
    const contents = [...file].map((r) => r.content);
    expect(contents).toHaveLength(8);
    expect(contents.slice(0, 3)).toEqual(['a\nx\nm\n', 'a\nx\nm\nq\n', 'a\ny\nm\n']);
    expect(contents[7]).toBe('a\ny\nx\nm\nq\n');
    expect([...file].every((r) => r.path === 'f.txt')).toBe(true);
  });

  it('yields the same sequence on every iteration', () => {
    const file = new ConflictingFile(new MemoryHistory(), commit, new FileMergeResult(text), 'f.txt');
    expect([...file].map((r) => r.content)).toEqual([...file].map((r) => r.content));
  });

  it('reads the actual resolution at the merge commit', () => {
    const history = new MemoryHistory();
    history.blobs.set(`${id}:f.txt`, 'a\nx\nm\nq\n');
    const file = new ConflictingFile(history, commit, new FileMergeResult(text), 'f.txt');
    const actual = file.getActualResolutionFile();
    expect(actual.path).toBe('f.txt');
    expect(actual.content).toBe('a\nx\nm\nq\n');
  });

  it('wraps foreign read failures as RepositoryReadError', () => {
    const history = new MemoryHistory();
    history.readBlob = () => {
      throw new Error('disk gone');
    };
    const file = new ConflictingFile(history, commit, new FileMergeResult(text), 'f.txt');
    expect(() => file.getActualResolutionFile()).toThrow(RepositoryReadError);
    expect(() => file.getActualResolutionFile()).toThrow(`Cannot read "f.txt" at ${id}: disk gone`);
  });
});
