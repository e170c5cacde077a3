import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { cloneProjects, listProjectDirs, readProjectList } from '../projects';
import { MemoryLogger } from './helpers';

let tmpDir: string;

function writeList(content: string): string {
  const file = path.join(tmpDir, 'projects.yaml');
  fs.writeFileSync(file, content, 'utf8');
  return file;
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mergeres-projects-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('readProjectList', () => {
  it('reads a plain sequence', () => {
    const file = writeList('- name: demo\n  url: https://git.example.com/demo.git\n');
    expect(readProjectList(file)).toEqual([{ name: 'demo', url: 'https://git.example.com/demo.git' }]);
  });

  it('reads a projects mapping', () => {
    const file = writeList(
      'projects:\n  - name: one\n    url: " https://git.example.com/one.git "\n  - name: two\n    url: /srv/two\n',
    );
    expect(readProjectList(file)).toEqual([
      { name: 'one', url: 'https://git.example.com/one.git' },
      { name: 'two', url: '/srv/two' },
    ]);
  });

  it('names the broken entry', () => {
    const file = writeList('- name: ok\n  url: /srv/ok\n- name: bad\n');
    expect(() => readProjectList(file)).toThrow('Project #1 ("bad")');
  });

  it('rejects names that are not plain directory names', () => {
    expect(() => readProjectList(writeList('- name: ../escape\n  url: /srv/x\n'))).toThrow('plain directory name');
  });

  it('rejects duplicate names', () => {
    const file = writeList('- name: a\n  url: /srv/a\n- name: a\n  url: /srv/b\n');
    expect(() => readProjectList(file)).toThrow('appears twice');
  });

  it('rejects a document that is not a list', () => {
    expect(() => readProjectList(writeList('name: demo\n'))).toThrow('must be a sequence');
  });
});

describe('listProjectDirs', () => {
  it('lists subdirectories holding a .git entry, sorted', () => {
    for (const name of ['zeta', 'alpha']) {
      fs.mkdirSync(path.join(tmpDir, name, '.git'), { recursive: true });
    }
    fs.mkdirSync(path.join(tmpDir, 'plain'));
    fs.writeFileSync(path.join(tmpDir, 'file.txt'), '');

    expect(listProjectDirs(tmpDir)).toEqual([path.join(tmpDir, 'alpha'), path.join(tmpDir, 'zeta')]);
  });

  it('is empty for a missing directory', () => {
    expect(listProjectDirs(path.join(tmpDir, 'absent'))).toEqual([]);
  });
});

describe('cloneProjects', () => {
  const projects = [
    { name: 'present', url: '/srv/present' },
    { name: 'fresh', url: '/srv/fresh' },
    { name: 'broken', url: '/srv/broken' },
    { name: 'never', url: '/srv/never' },
  ];

  it('skips present projects and stops at the first failure', () => {
    const projectDir = path.join(tmpDir, 'projects');
    fs.mkdirSync(path.join(projectDir, 'present'), { recursive: true });
    const calls: string[] = [];

    const summary = cloneProjects(projects, projectDir, new MemoryLogger(), (url, target) => {
      calls.push(url);
      if (url.endsWith('broken')) throw new Error('repository not found');
      fs.mkdirSync(target);
    });

    expect(calls).toEqual(['/srv/fresh', '/srv/broken']);
    expect(summary).toEqual({
      cloned: ['fresh'],
      skipped: ['present'],
      failed: { name: 'broken', errorMessage: 'repository not found' },
    });
    expect(fs.existsSync(path.join(projectDir, 'fresh'))).toBe(true);
  });
});
