import { errorMessage } from './errors';
import type { RunLogger } from './logger';
import { ConflictingMerge, SHORT_ID_LENGTH } from './merge';
import type { AnalysisSummary, AnalyzeOptions, Commit, MergeAnalysis, MergeHistory } from './types';
import { GRAY, GREEN, RED, YELLOW, formatCount, formatMergeLine, matchStatus } from './utils';

/**
 * Re-merge one commit and search its resolution space.
 * Returns undefined when the re-merge is clean.
 */
export function analyzeMerge(
  history: MergeHistory,
  commit: Commit,
  options: AnalyzeOptions,
  logger: RunLogger,
): MergeAnalysis | undefined {
  const merge = new ConflictingMerge(history, commit, history.computeMergeResults(commit));
  const files = merge.getConflictingFiles().map((f) => f.path);
  if (files.length === 0) return undefined;

  const analysis: MergeAnalysis = {
    commit: merge.getCommitId(),
    shortId: merge.getCommitIdShort(),
    files,
    conflicts: merge.getConflictCount(),
    resolutions: merge.size(),
  };

  logger.log(
    `[${analysis.shortId}] ${files.length} conflicting file(s), ` +
      `${analysis.conflicts} conflict(s), ${formatCount(analysis.resolutions)} resolution(s)`,
  );
  for (const file of merge.getConflictingFiles()) {
    logger.log(`  ${file.path}  ${file.getConflictCount()} hunk(s), ${formatCount(file.size())} candidate(s)`);
  }

  try {
    analysis.match = merge.findActualResolution({
      limit: options.maxCandidates,
      ignoreWhitespace: options.ignoreWhitespace,
    });
  } catch (e: unknown) {
    analysis.errorMessage = errorMessage(e);
  }

  logger.log(`[${analysis.shortId}] ${formatMergeLine(analysis)}`);
  return analysis;
}

/**
 * Analyze every merge commit of one repository.
 * A failing merge is recorded on its own entry and does not stop the run.
 */
export function analyzeRepository(
  history: MergeHistory,
  options: AnalyzeOptions,
  logger: RunLogger,
): AnalysisSummary {
  const { maxMerges, verbose = false } = options;

  logger.log(`Repository    : ${history.name}`);
  logger.log(`Max candidates: ${options.maxCandidates}`);

  const commits = history.listMergeCommits(maxMerges);
  const merges: MergeAnalysis[] = [];
  const total = commits.length;

  for (let i = 0; i < total; i++) {
    const commit = commits[i];
    const label = `[${i + 1}/${total}] ${history.name} ${commit.id.slice(0, SHORT_ID_LENGTH)}`;

    logger.log(`\n${'─'.repeat(60)}`);
    logger.log(`Merging ${commit.parents.join(' + ')} for ${commit.id}`);

    let analysis: MergeAnalysis | undefined;
    try {
      analysis = analyzeMerge(history, commit, options, logger);
    } catch (e: unknown) {
      analysis = {
        commit: commit.id,
        shortId: commit.id.slice(0, SHORT_ID_LENGTH),
        files: [],
        conflicts: 0,
        resolutions: 0,
        errorMessage: errorMessage(e),
      };
      logger.log(`FAILED: ${analysis.errorMessage}`);
    }

    if (!analysis) {
      logger.log('Merged cleanly (no conflicts).');
      if (verbose) process.stdout.write(GRAY(`${label}  clean\n`));
      continue;
    }

    merges.push(analysis);
    const status = matchStatus(analysis);
    const color = status === 'found' ? GREEN : status === 'failed' ? RED : YELLOW;
    process.stdout.write(color(`${label}  ${formatMergeLine(analysis)}\n`));
  }

  logger.log(`\n${'─'.repeat(60)}`);
  logger.log('Analysis completed.');

  let found = 0;
  let notFound = 0;
  let undecided = 0;
  let failed = 0;
  for (const m of merges) {
    switch (matchStatus(m)) {
      case 'found':
        found++;
        break;
      case 'not-found':
        notFound++;
        break;
      case 'undecided':
        undecided++;
        break;
      case 'failed':
        failed++;
        break;
    }
  }

  return {
    repository: history.name,
    total,
    conflicting: merges.length,
    found,
    notFound,
    undecided,
    failed,
    merges,
  };
}
