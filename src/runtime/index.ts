import { getFamily } from '../family/index.js';
import type { Operand } from '../family/types.js';
import { RuntimeConfig, RuntimeConfigError } from './config.js';
import type { CoverageMap } from './coverage.js';
import { CoverageWriter } from './coverage-export.js';
import { RuntimeOracle } from './oracle.js';

export interface RuntimeState {
  oracle: RuntimeOracle;
  writer: CoverageWriter | undefined;
}

declare global {
  // Shared by every copy of this module loaded into the same global scope.
  var __mutswitchRuntime: RuntimeState | undefined;
}

function createState(config: RuntimeConfig): RuntimeState {
  const dir = config.coverageDir;
  return {
    oracle: new RuntimeOracle(config),
    writer: dir === undefined ? undefined : new CoverageWriter(dir),
  };
}

function getState(): RuntimeState {
  const existing = globalThis.__mutswitchRuntime;
  if (existing) return existing;
  const state = createState(RuntimeConfig.fromEnv());
  globalThis.__mutswitchRuntime = state;
  return state;
}

export function getRuntime(): RuntimeOracle {
  return getState().oracle;
}

/** Replaces the process-wide oracle. For harnesses running tests in process. */
export function configureRuntime(config: RuntimeConfig): RuntimeOracle {
  const state = createState(config);
  globalThis.__mutswitchRuntime = state;
  return state.oracle;
}

export function getCoverage(): CoverageMap {
  return getRuntime().coverage;
}

/**
 * Entry point called by instrumented code. The first time a site is reached
 * it is appended to the coverage file, before either operand runs.
 */
export function decide(
  baseId: number,
  left: Operand<unknown>,
  right: Operand<unknown>,
  op: string,
  familyName: string,
): unknown {
  const family = getFamily(familyName);
  const original = family?.parseOperator(op);
  if (family === undefined || original === undefined) {
    throw new RuntimeConfigError(`Unknown operator ${op} in family ${familyName}`);
  }
  const { oracle, writer } = getState();
  if (writer !== undefined && !oracle.coverage.isCovered(baseId)) {
    writer.record(baseId, family.candidates(original).length);
  }
  return oracle.decide(baseId, left, right, original, family);
}

export { RuntimeConfig, RuntimeConfigError, MUTATION_ID_ENV, COVERAGE_DIR_ENV } from './config.js';
export { CoverageMap } from './coverage.js';
export { RuntimeOracle } from './oracle.js';
