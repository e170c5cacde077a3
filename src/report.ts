import * as fs from 'fs';
import { dump as yamlDump } from 'js-yaml';
import * as path from 'path';

import { errorMessage } from './errors';
import type { AnalysisSummary } from './types';
import { matchStatus } from './utils';

export function getReportFilePath(outputDir: string, repository: string, startTs: string): string {
  return path.join(outputDir, `${repository}-${startTs}.yaml`);
}

/**
 * Plain-data view of a summary, shaped for the YAML report:
 *
 *   repository: demo
 *   total: 12
 *   ...
 *   merges:
 *     - commit: 1a2b3c4d...
 *       status: found
 *       files: [src/a.ts]
 *       conflicts: 2
 *       resolutions: 9
 *       matchIndex: 4
 *       examined: 5
 */
export function toReport(summary: AnalysisSummary): Record<string, unknown> {
  return {
    repository: summary.repository,
    total: summary.total,
    conflicting: summary.conflicting,
    found: summary.found,
    notFound: summary.notFound,
    undecided: summary.undecided,
    failed: summary.failed,
    merges: summary.merges.map((m) => ({
      commit: m.commit,
      status: matchStatus(m),
      files: m.files,
      conflicts: m.conflicts,
      resolutions: m.resolutions,
      ...(m.match
        ? { matchIndex: m.match.index, examined: m.match.examined }
        : {}),
      ...(m.errorMessage !== undefined ? { error: m.errorMessage } : {}),
    })),
  };
}

/**
 * Write the YAML report for one repository and return its path.
 * A write failure is reported on stderr; the analysis itself has succeeded.
 */
export function writeReportFile(summary: AnalysisSummary, outputDir: string, startTs: string): string {
  const outPath = getReportFilePath(outputDir, summary.repository, startTs);
  try {
    fs.mkdirSync(outputDir, { recursive: true });
    fs.writeFileSync(outPath, yamlDump(toReport(summary), { lineWidth: 120, noRefs: true }), 'utf8');
  } catch (e: unknown) {
    process.stderr.write(`Warning: could not write report file "${outPath}": ${errorMessage(e)}\n`);
  }
  return outPath;
}
