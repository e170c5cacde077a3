import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { findDefaultConfig, loadConfig } from '../config';
import { ConfigError } from '../errors';

let tmpDir: string;

function writeConfig(content: string, name = 'mergeres.yaml'): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, content, 'utf8');
  return file;
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mergeres-config-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('reads every key and resolves directories against the file', () => {
    const file = writeConfig(
      [
        'projectDir: ./projects',
        'outputDir: /var/results',
        'maxCandidates: 5000',
        'maxMerges: 20',
        'ignoreWhitespace: true',
        'verbose: false',
      ].join('\n'),
    );

    expect(loadConfig(file)).toEqual({
      projectDir: path.join(tmpDir, 'projects'),
      outputDir: path.resolve('/var/results'),
      maxCandidates: 5000,
      maxMerges: 20,
      ignoreWhitespace: true,
      verbose: false,
    });
  });

  it('leaves absent keys unset', () => {
    const config = loadConfig(writeConfig('verbose: true\n'));
    expect(config.verbose).toBe(true);
    expect(config.projectDir).toBeUndefined();
    expect(config.maxCandidates).toBeUndefined();
  });

  it('rejects a non-positive candidate limit', () => {
    const file = writeConfig('maxCandidates: 0\n');
    expect(() => loadConfig(file)).toThrow(ConfigError);
    expect(() => loadConfig(file)).toThrow('"maxCandidates"');
  });

  it('rejects a non-boolean flag', () => {
    expect(() => loadConfig(writeConfig('ignoreWhitespace: "yes"\n'))).toThrow('must be true or false');
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => loadConfig(writeConfig('- a\n- b\n'))).toThrow('not a YAML mapping');
  });

  it('rejects malformed YAML', () => {
    expect(() => loadConfig(writeConfig('projectDir: [unclosed\n'))).toThrow('Failed to parse YAML config');
  });

  it('reports a missing file', () => {
    expect(() => loadConfig(path.join(tmpDir, 'absent.yaml'))).toThrow('Config file not found');
  });
});

describe('findDefaultConfig', () => {
  it('walks up to the nearest config file', () => {
    const file = writeConfig('verbose: true\n', 'mergeres.yml');
    const nested = path.join(tmpDir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    expect(findDefaultConfig(nested)).toBe(file);
  });

  it('prefers .yaml over .yml in the same directory', () => {
    writeConfig('verbose: true\n', 'mergeres.yml');
    const yaml = writeConfig('verbose: false\n', 'mergeres.yaml');
    expect(findDefaultConfig(tmpDir)).toBe(yaml);
  });
});
