import * as fs from 'fs';
import { load as yamlLoad } from 'js-yaml';
import * as path from 'path';

import { ConfigError, errorMessage } from './errors';

export const DEFAULT_MAX_CANDIDATES = 100_000;

/**
 * Values that can be loaded from a YAML config file.
 * All fields are optional; CLI arguments always take precedence.
 *
 * Config file format (mergeres.yaml):
 *
 *   projectDir: ./projects
 *   outputDir: ./results
 *   maxCandidates: 100000
 *   maxMerges: 500
 *   ignoreWhitespace: false
 */
export interface ConfigFile {
  /** Directory holding cloned projects; `analyze` without arguments scans it */
  projectDir?: string;
  /** Directory where log and report files are written */
  outputDir?: string;
  /** Candidates compared per merge before the search gives up */
  maxCandidates?: number;
  /** Merge commits inspected per repository */
  maxMerges?: number;
  ignoreWhitespace?: boolean;
  /** Mirror of the -v / --verbose CLI flag. */
  verbose?: boolean;
}

function readPositiveInteger(doc: Record<string, unknown>, key: string, file: string): number | undefined {
  const value = doc[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`"${key}" in "${file}" must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readBoolean(doc: Record<string, unknown>, key: string, file: string): boolean | undefined {
  const value = doc[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`"${key}" in "${file}" must be true or false, got ${JSON.stringify(value)}`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and parse a YAML config file.
 * Directory paths are resolved relative to the config file's directory.
 * Throws ConfigError if the file cannot be read or is malformed.
 */
export function loadConfig(configPath: string): ConfigFile {
  const resolved = path.resolve(configPath);

  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Config file not found: "${resolved}"`);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf8');
  } catch (e: unknown) {
    throw new ConfigError(`Cannot read config file "${resolved}": ${errorMessage(e)}`);
  }

  let parsed: unknown;
  try {
    parsed = yamlLoad(raw);
  } catch (e: unknown) {
    throw new ConfigError(`Failed to parse YAML config "${resolved}": ${errorMessage(e)}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file "${resolved}" is empty or not a YAML mapping.`);
  }

  const config: ConfigFile = {};
  const dir = path.dirname(resolved);

  for (const key of ['projectDir', 'outputDir'] as const) {
    const value = parsed[key];
    if (typeof value === 'string' && value.trim()) {
      config[key] = path.resolve(dir, value.trim());
    }
  }

  config.maxCandidates = readPositiveInteger(parsed, 'maxCandidates', resolved);
  config.maxMerges = readPositiveInteger(parsed, 'maxMerges', resolved);
  config.ignoreWhitespace = readBoolean(parsed, 'ignoreWhitespace', resolved);
  config.verbose = readBoolean(parsed, 'verbose', resolved);

  return config;
}

/**
 * Walk up the directory tree from `startDir`, looking for `mergeres.yaml` or `.yml`.
 * Returns the absolute path to the first match found, or undefined if none exists.
 */
export function findDefaultConfig(startDir: string = process.cwd()): string | undefined {
  const filenames = ['mergeres.yaml', 'mergeres.yml'];
  let current = path.resolve(startDir);

  while (true) {
    for (const filename of filenames) {
      const candidate = path.join(current, filename);
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}
