import type { MutationTestResult, PipelineResult } from '../mutation/types.js';
import type { Reporter } from './reporter.js';

function mutationRow(r: MutationTestResult): string {
  const { id, location, fnName, original, mutant } = r.mutation;
  return `| #${id} | \`${location.file}:${location.line}:${location.column}\` | \`${fnName}\` | \`${original}\` → \`${mutant}\` |`;
}

function section(title: string, results: MutationTestResult[]): string[] {
  if (results.length === 0) return [];
  return [
    '<details>',
    `<summary>${title} (${results.length})</summary>`,
    '',
    '| Mutation | Location | Function | Change |',
    '| --- | --- | --- | --- |',
    ...results.map(mutationRow),
    '',
    '</details>',
    '',
  ];
}

/** Markdown summary for a pull request comment or job summary. */
export class GithubReporter implements Reporter {
  report(result: PipelineResult): string {
    const all = result.fileResults.flatMap((f) => f.results);
    const icon = result.survived + result.noCoverage === 0 ? ':white_check_mark:' : ':warning:';

    const lines: string[] = [
      '## mutswitch Report',
      '',
      `${icon} **Mutation Score: ${result.mutationScore.toFixed(1)}%**`,
      '',
      '| Killed | Survived | No coverage | Timed out | Errors |',
      '| --- | --- | --- | --- | --- |',
      `| ${result.killed} | ${result.survived} | ${result.noCoverage} | ${result.timedOut} | ${result.errors} |`,
      '',
      ...section('Surviving mutations', all.filter((r) => r.outcome === 'survived')),
      ...section('Uncovered mutations', all.filter((r) => r.outcome === 'no_coverage')),
      ...section('Killed mutations', all.filter((r) => r.outcome === 'killed')),
    ];

    return lines.join('\n');
  }
}
