#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import * as path from 'path';

import { analyzeRepository } from './analyzer';
import { type ConfigFile, DEFAULT_MAX_CANDIDATES, findDefaultConfig, loadConfig } from './config';
import { errorMessage } from './errors';
import { GitRepository, verifyRepository } from './git';
import { Logger } from './logger';
import { type ProjectInfo, cloneProjects, listProjectDirs, readProjectList } from './projects';
import { writeReportFile } from './report';
import type { AnalysisSummary } from './types';
import { CYAN, GREEN, RED, YELLOW, makeStartTs, relPath } from './utils';

const startTs = makeStartTs();

function fail(message: string): never {
  console.error(RED(`Error: ${message}`));
  process.exit(1);
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

/** Resolve config path: explicit -c, or auto-discover mergeres.yaml */
function resolveConfig(explicit?: string): ConfigFile {
  const configPath = explicit ?? findDefaultConfig();
  if (!configPath) return {};
  try {
    const cfg = loadConfig(configPath);
    const label = explicit ? 'Config loaded' : 'Config auto-detected';
    console.log(CYAN(`${label}: ${path.resolve(configPath)}`));
    return cfg;
  } catch (e: unknown) {
    return fail(errorMessage(e));
  }
}

const program = new Command();

program
  .name('mergeres')
  .description('Compare historical merge resolutions against every possible resolution')
  .version('0.1.0');

program
  .command('analyze')
  .description('Re-merge every merge commit and search its resolution space for the committed resolution')
  .argument('[repos...]', 'git work trees to analyze (default: every project in projectDir)')
  .option('-c, --config <path>', 'Path to YAML config file')
  .option('-o, --output-dir <path>', 'Directory for log and report files')
  .option('-m, --max-candidates <n>', 'Candidates compared per merge', parsePositiveInt)
  .option('-n, --max-merges <n>', 'Merge commits inspected per repository', parsePositiveInt)
  .option('-w, --ignore-whitespace', 'Compare file content with whitespace runs collapsed')
  .option('-v, --verbose', 'Also list clean merges on the console')
  .addHelpText(
    'after',
    `
Config file (YAML format):
  projectDir: ./projects        # analyzed when no repos are given
  outputDir: ./results          # default: ./mergeres-output
  maxCandidates: 100000
  maxMerges: 500
  ignoreWhitespace: false

Examples:
  mergeres analyze ./projects/demo
  mergeres analyze -m 5000 -n 100 ./repo-a ./repo-b
  mergeres analyze -c ./mergeres.yaml
`,
  )
  .action(
    (
      repos: string[],
      opts: {
        config?: string;
        outputDir?: string;
        maxCandidates?: number;
        maxMerges?: number;
        ignoreWhitespace?: boolean;
        verbose?: boolean;
      },
    ) => {
      const cfg = resolveConfig(opts.config);

      // CLI options take precedence over config file
      const outputDir = path.resolve(opts.outputDir ?? cfg.outputDir ?? 'mergeres-output');
      let workTrees = repos.map((r) => path.resolve(r));
      if (workTrees.length === 0) {
        if (!cfg.projectDir) {
          fail('no repositories given. Pass work trees as arguments or set projectDir in mergeres.yaml.');
        }
        workTrees = listProjectDirs(cfg.projectDir);
        if (workTrees.length === 0) {
          console.log(CYAN(`No git projects found in ${cfg.projectDir}.`));
          process.exit(0);
        }
      }

      for (const workTree of workTrees) {
        try {
          verifyRepository(workTree);
        } catch (e: unknown) {
          fail(errorMessage(e));
        }
      }

      const options = {
        maxCandidates: opts.maxCandidates ?? cfg.maxCandidates ?? DEFAULT_MAX_CANDIDATES,
        maxMerges: opts.maxMerges ?? cfg.maxMerges,
        ignoreWhitespace: opts.ignoreWhitespace ?? cfg.ignoreWhitespace ?? false,
        verbose: opts.verbose ?? cfg.verbose ?? false,
      };

      const logger = new Logger(outputDir, startTs);
      const summaries: AnalysisSummary[] = [];
      let broken = 0;

      for (const workTree of workTrees) {
        const repository = new GitRepository(workTree);
        console.log(CYAN(`\nAnalyzing ${repository.name} (${workTree})`));
        try {
          const summary = analyzeRepository(repository, options, logger);
          summaries.push(summary);
          console.log(`Report: ${relPath(writeReportFile(summary, outputDir, startTs), process.cwd())}`);
        } catch (e: unknown) {
          broken++;
          const msg = errorMessage(e);
          console.error(RED(`  ${repository.name} FAILED  ${msg}`));
          logger.log(`${repository.name} FAILED  ${msg}`);
        }
      }

      // ─── Console: done line ──────────────────────────────────────────────────
      const sum = (pick: (s: AnalysisSummary) => number) => summaries.reduce((n, s) => n + pick(s), 0);
      const failed = sum((s) => s.failed);
      console.log();
      console.log(
        [
          `Done. Merges: ${sum((s) => s.total)}`,
          `Conflicting: ${sum((s) => s.conflicting)}`,
          GREEN(`Found: ${sum((s) => s.found)}`),
          YELLOW(`Not found: ${sum((s) => s.notFound)}`),
          sum((s) => s.undecided) > 0 ? YELLOW(`Undecided: ${sum((s) => s.undecided)}`) : null,
          failed > 0 ? RED(`Failed: ${failed}`) : null,
        ]
          .filter(Boolean)
          .join('  '),
      );
      console.log(`Log: ${logger.getLogPath()}`);

      logger.close();
      process.exit(failed > 0 || broken > 0 ? 1 : 0);
    },
  );

program
  .command('clone')
  .description('Clone every project of a YAML project list')
  .argument('<projectList>', 'YAML list of { name, url } entries')
  .option('-c, --config <path>', 'Path to YAML config file')
  .option('-d, --project-dir <path>', 'Directory the projects are cloned into (default: projectDir or .)')
  .action((projectList: string, opts: { config?: string; projectDir?: string }) => {
    const cfg = resolveConfig(opts.config);
    const projectDir = path.resolve(opts.projectDir ?? cfg.projectDir ?? '.');

    let projects: ProjectInfo[];
    try {
      projects = readProjectList(projectList);
    } catch (e: unknown) {
      return fail(errorMessage(e));
    }

    const logger = new Logger(path.resolve(cfg.outputDir ?? 'mergeres-output'), startTs);
    const summary = cloneProjects(projects, projectDir, logger);
    logger.close();

    for (const name of summary.cloned) console.log(GREEN(`  ${name}  cloned`));
    for (const name of summary.skipped) console.log(CYAN(`  ${name}  already present`));
    if (summary.failed) {
      fail(`${summary.failed.name}: ${summary.failed.errorMessage}`);
    }
    console.log(`Done. Cloned: ${summary.cloned.length}  Skipped: ${summary.skipped.length}`);
  });

program.parse(process.argv);
