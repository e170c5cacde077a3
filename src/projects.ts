import * as fs from 'fs';
import { load as yamlLoad } from 'js-yaml';
import * as path from 'path';

import { ConfigError, errorMessage } from './errors';
import { cloneRepository } from './git';
import type { RunLogger } from './logger';

export interface ProjectInfo {
  name: string;
  url: string;
}

const NAME_RE = /^[A-Za-z0-9._-]+$/;

/**
 * Read a project list. Either a YAML sequence of `{ name, url }` entries or a
 * mapping whose `projects` key holds that sequence:
 *
 *   projects:
 *     - name: demo
 *       url: https://git.example.com/demo.git
 */
export function readProjectList(listPath: string): ProjectInfo[] {
  const resolved = path.resolve(listPath);

  let parsed: unknown;
  try {
    parsed = yamlLoad(fs.readFileSync(resolved, 'utf8'));
  } catch (e: unknown) {
    throw new ConfigError(`Cannot read project list "${resolved}": ${errorMessage(e)}`);
  }

  const entries =
    typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) && 'projects' in parsed
      ? parsed.projects
      : parsed;
  if (!Array.isArray(entries)) {
    throw new ConfigError(`Project list "${resolved}" must be a sequence of { name, url } entries.`);
  }

  const projects: ProjectInfo[] = [];
  const names = new Set<string>();
  entries.forEach((entry: unknown, index) => {
    if (typeof entry !== 'object' || entry === null) {
      throw new ConfigError(`Project #${index} in "${resolved}" is not a mapping.`);
    }
    const name = 'name' in entry ? entry.name : undefined;
    const url = 'url' in entry ? entry.url : undefined;
    if (typeof name !== 'string' || !NAME_RE.test(name)) {
      throw new ConfigError(`Project #${index} in "${resolved}" needs a plain directory name.`);
    }
    if (typeof url !== 'string' || !url.trim()) {
      throw new ConfigError(`Project #${index} ("${name}") in "${resolved}" has no url.`);
    }
    if (names.has(name)) {
      throw new ConfigError(`Project name "${name}" appears twice in "${resolved}".`);
    }
    names.add(name);
    projects.push({ name, url: url.trim() });
  });
  return projects;
}

/**
 * Subdirectories of `projectDir` that look like git work trees, sorted by name.
 */
export function listProjectDirs(projectDir: string): string[] {
  if (!fs.existsSync(projectDir)) return [];
  return fs
    .readdirSync(projectDir, { withFileTypes: true })
    .filter((d) => d.isDirectory() && fs.existsSync(path.join(projectDir, d.name, '.git')))
    .map((d) => path.join(projectDir, d.name))
    .sort((a, b) => a.localeCompare(b));
}

export interface CloneSummary {
  cloned: string[];
  skipped: string[];
  failed?: { name: string; errorMessage: string };
}

/**
 * Clone every project that is not already present in `projectDir`.
 * Stops at the first failing clone.
 */
export function cloneProjects(
  projects: ProjectInfo[],
  projectDir: string,
  logger: RunLogger,
  clone: (url: string, target: string) => void = cloneRepository,
): CloneSummary {
  fs.mkdirSync(projectDir, { recursive: true });
  const summary: CloneSummary = { cloned: [], skipped: [] };

  for (const project of projects) {
    const target = path.join(projectDir, project.name);
    if (fs.existsSync(target)) {
      logger.log(`${project.name}: already present at ${target}, skipped`);
      summary.skipped.push(project.name);
      continue;
    }
    try {
      logger.log(`${project.name}: cloning ${project.url}`);
      clone(project.url, target);
      summary.cloned.push(project.name);
    } catch (e: unknown) {
      summary.failed = { name: project.name, errorMessage: errorMessage(e) };
      logger.log(`${project.name}: FAILED ${summary.failed.errorMessage}`);
      break;
    }
  }

  return summary;
}
