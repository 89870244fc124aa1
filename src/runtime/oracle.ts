import type { MutatorFamily, Operand } from '../family/types.js';
import { RuntimeConfig } from './config.js';
import { CoverageMap } from './coverage.js';

export class RuntimeOracle {
  constructor(
    readonly config: RuntimeConfig = RuntimeConfig.withoutMutation(),
    readonly coverage: CoverageMap = new CoverageMap(),
  ) {}

  /**
   * Evaluates one instrumented operator. The site is marked covered first,
   * whatever runs. An active id outside this site's block means the
   * original operator.
   */
  decide<Op extends string, T, R>(
    baseId: number,
    left: Operand<T>,
    right: Operand<T>,
    original: Op,
    family: MutatorFamily<Op, T, R>,
  ): R {
    const candidates = family.candidates(original);
    this.coverage.markBlock(baseId, candidates.length);

    const offset = this.config.activeOffset(baseId, candidates.length);
    const op = offset === undefined ? original : candidates[offset];
    return family.evaluate(op, left, right);
  }
}
