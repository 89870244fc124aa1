import type { MutationOutcome, PipelineResult } from '../mutation/types.js';
import type { Reporter } from './reporter.js';

function reached(outcome: MutationOutcome): boolean | null {
  if (outcome === 'pending') return null;
  return outcome !== 'no_coverage';
}

/** One flat record per mutation id, plus the run summary. */
export class JsonReporter implements Reporter {
  report(result: PipelineResult): string {
    const { fileResults, ...summary } = result;
    const mutations = fileResults.flatMap((f) =>
      f.results.map((r) => ({
        ...r.mutation,
        reached: reached(r.outcome),
        killed: r.outcome === 'pending' ? null : r.outcome === 'killed',
        outcome: r.outcome,
        durationMs: r.durationMs,
      })),
    );
    return JSON.stringify({ summary, mutations }, null, 2);
  }
}
