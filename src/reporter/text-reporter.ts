import pc from 'picocolors';
import type { MutationOutcome, PipelineResult } from '../mutation/types.js';
import type { Reporter } from './reporter.js';

function outcomeLabel(outcome: MutationOutcome): string {
  switch (outcome) {
    case 'killed':
      return pc.green('[KILLED]   ');
    case 'survived':
      return pc.red('[SURVIVED] ');
    case 'timeout':
      return pc.yellow('[TIMEOUT]  ');
    case 'no_coverage':
      return pc.yellow('[NO COVER] ');
    case 'error':
      return pc.dim('[ERROR]    ');
    case 'pending':
      return pc.dim('[PENDING]  ');
  }
}

export class TextReporter implements Reporter {
  report(result: PipelineResult): string {
    const lines: string[] = [];

    lines.push('');
    lines.push(pc.bold('mutswitch Report'));
    lines.push('═'.repeat(50));

    const scoreColor = result.mutationScore >= 80 ? pc.green : result.mutationScore >= 50 ? pc.yellow : pc.red;
    lines.push(
      `Mutation Score: ${scoreColor(`${result.mutationScore.toFixed(1)}%`)} (${result.killed}/${result.killed + result.survived + result.noCoverage} killed)`,
    );
    lines.push('');

    for (const fileResult of result.fileResults) {
      lines.push(pc.bold(pc.underline(fileResult.filePath)));

      for (const r of fileResult.results) {
        const { id, location, fnName, family, original, mutant } = r.mutation;
        lines.push(
          `  ${outcomeLabel(r.outcome)} #${id} ${location.line}:${location.column} ${pc.dim(family)} ${fnName}: ${original} -> ${mutant} ${pc.dim(`(${r.durationMs}ms)`)}`,
        );
      }

      lines.push('');
    }

    lines.push(pc.dim('─'.repeat(50)));
    lines.push(
      pc.dim(
        `Killed ${result.killed}, survived ${result.survived}, no coverage ${result.noCoverage}, timed out ${result.timedOut}, errors ${result.errors}`,
      ),
    );
    lines.push(pc.dim(`Duration: ${(result.durationMs / 1000).toFixed(1)}s`));
    lines.push('');

    return lines.join('\n');
  }
}
