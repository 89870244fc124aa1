import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { MutswitchConfig } from '../config/schema.js';
import { discoverSourceFiles } from '../files/discover.js';
import type {
  FileResult,
  Mutation,
  MutationOutcome,
  MutationTestResult,
  PipelineResult,
} from '../mutation/types.js';
import { MutationRegistry } from '../registry/registry.js';
import { executeTests, type TestExecutionResult } from '../runner/executor.js';
import { FileManager } from '../runner/file-manager.js';
import { runCoveragePass, runPreflight } from '../runner/preflight.js';
import { MUTATION_ID_ENV } from '../runtime/config.js';
import { readCoverageDir } from '../runtime/coverage-export.js';
import { SourceParseError } from '../transform/errors.js';
import { instrumentSource } from '../transform/instrument.js';
import { gitRoot } from '../utils/git.js';
import { logger } from '../utils/logger.js';

export interface InstrumentedFile {
  filePath: string;
  code: string;
  mutationCount: number;
}

function emptyResult(startTime: number): PipelineResult {
  return {
    totalMutations: 0,
    killed: 0,
    survived: 0,
    noCoverage: 0,
    timedOut: 0,
    errors: 0,
    mutationScore: 100,
    fileResults: [],
    durationMs: Date.now() - startTime,
  };
}

/**
 * Instruments `files` in the given order into one registry. Files that do
 * not parse are skipped; any other failure aborts the run.
 */
export function instrumentFiles(
  root: string,
  files: string[],
  registry: MutationRegistry,
  config: Pick<MutswitchConfig, 'families' | 'runtimeModule' | 'moduleFormat'>,
): InstrumentedFile[] {
  const instrumented: InstrumentedFile[] = [];
  for (const filePath of files) {
    const source = fs.readFileSync(path.join(root, filePath), 'utf-8');
    try {
      const result = instrumentSource(source, {
        filePath,
        registry,
        families: config.families,
        runtimeModule: config.runtimeModule,
        moduleFormat: config.moduleFormat,
      });
      if (result.mutationCount > 0) {
        instrumented.push({ filePath, code: result.code, mutationCount: result.mutationCount });
        logger.debug(`${filePath}: ${result.mutationCount} mutation(s)`);
      }
    } catch (err) {
      if (err instanceof SourceParseError) {
        logger.warn(`Skipping ${filePath}: ${err.message}`);
        continue;
      }
      throw err;
    }
  }
  return instrumented;
}

export function classifyOutcome(testResult: TestExecutionResult): MutationOutcome {
  if (testResult.timedOut) return 'timeout';
  if (testResult.exitCode === null) return 'error';
  if (testResult.passed) return 'survived';
  return 'killed';
}

export function groupByFile(results: MutationTestResult[]): FileResult[] {
  const byFile = new Map<string, MutationTestResult[]>();
  for (const result of results) {
    const filePath = result.mutation.location.file;
    const existing = byFile.get(filePath) ?? [];
    existing.push(result);
    byFile.set(filePath, existing);
  }
  return [...byFile].map(([filePath, fileResults]) => ({ filePath, results: fileResults }));
}

export function aggregateResults(fileResults: FileResult[], startTime: number): PipelineResult {
  let killed = 0;
  let survived = 0;
  let noCoverage = 0;
  let timedOut = 0;
  let errors = 0;
  let pending = 0;

  for (const fr of fileResults) {
    for (const r of fr.results) {
      switch (r.outcome) {
        case 'killed':
          killed++;
          break;
        case 'survived':
          survived++;
          break;
        case 'no_coverage':
          noCoverage++;
          break;
        case 'timeout':
          timedOut++;
          break;
        case 'error':
          errors++;
          break;
        case 'pending':
          pending++;
          break;
      }
    }
  }

  const totalMutations = killed + survived + noCoverage + timedOut + errors + pending;
  const denominator = killed + survived + noCoverage;
  const mutationScore = denominator > 0 ? (killed / denominator) * 100 : 100;

  return {
    totalMutations,
    killed,
    survived,
    noCoverage,
    timedOut,
    errors,
    mutationScore,
    fileResults,
    durationMs: Date.now() - startTime,
  };
}

export function registeredMutations(registry: MutationRegistry): Mutation[] {
  return [...registry.all()].map(([id, metadata]) => ({
    id,
    ...metadata,
    location: { ...metadata.location },
  }));
}

async function testMutation(
  mutation: Mutation,
  covered: Set<number> | undefined,
  config: MutswitchConfig,
  root: string,
): Promise<MutationTestResult> {
  if (covered !== undefined && !covered.has(mutation.id)) {
    return { mutation, outcome: 'no_coverage', durationMs: 0 };
  }

  const testResult = await executeTests(config.testCommand, config.timeout, {
    env: { [MUTATION_ID_ENV]: String(mutation.id) },
    cwd: root,
  });
  const outcome = classifyOutcome(testResult);
  return {
    mutation,
    outcome,
    durationMs: testResult.durationMs,
    testOutput: outcome === 'survived' ? testResult.stdout : outcome === 'error' ? testResult.stderr : undefined,
  };
}

/**
 * Ids reached by the coverage pass, or undefined when no runtime reported
 * anything (the test command never loaded the instrumented code, or ran it
 * somewhere the coverage directory was not passed on).
 */
async function collectCoverage(config: MutswitchConfig, root: string): Promise<Set<number> | undefined> {
  const coverageDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mutswitch-coverage-'));
  try {
    await runCoveragePass(config.testCommand, config.timeout, coverageDir, root);
    const report = readCoverageDir(coverageDir);
    return report.files > 0 ? report.ids : undefined;
  } finally {
    fs.rmSync(coverageDir, { recursive: true, force: true });
  }
}

export async function runPipeline(config: MutswitchConfig): Promise<PipelineResult> {
  const startTime = Date.now();
  const root = gitRoot();
  const fileManager = new FileManager();

  try {
    // Step 1: Find files to mutate
    const files = discoverSourceFiles(root, config);
    if (files.length === 0) {
      logger.info('No source files matched. Nothing to mutate.');
      return emptyResult(startTime);
    }
    logger.info(`Found ${files.length} source file(s)`);

    // Step 2: Pre-flight test run (skip in dry-run mode)
    if (!config.dryRun) {
      logger.info('Running pre-flight test check...');
      await runPreflight(config.testCommand, config.timeout, root);
      logger.info('Pre-flight passed.');
    }

    // Step 3: Instrument every file into one registry
    const registry = new MutationRegistry();
    const instrumented = instrumentFiles(root, files, registry, config);
    if (registry.size === 0) {
      logger.info('No mutable operators found.');
      return emptyResult(startTime);
    }
    logger.info(`Registered ${registry.size} mutation(s) in ${instrumented.length} file(s)`);

    const mutations = registeredMutations(registry);
    if (config.dryRun) {
      const pending = mutations.map((mutation) => ({ mutation, outcome: 'pending' as const, durationMs: 0 }));
      return aggregateResults(groupByFile(pending), startTime);
    }
    registry.save(path.resolve(root, config.registryFile));

    for (const file of instrumented) {
      const absPath = path.join(root, file.filePath);
      fileManager.backup(absPath);
      fileManager.write(absPath, file.code);
    }

    // Step 4: Coverage run with no mutation active
    logger.info('Running coverage pass on instrumented code...');
    const covered = await collectCoverage(config, root);
    if (covered === undefined) {
      logger.warn('Coverage pass left no coverage files. Testing every mutation.');
    } else {
      logger.info(`Coverage pass reached ${covered.size} of ${registry.size} mutation(s).`);
    }

    // Step 5: One test run per covered mutation
    const results: MutationTestResult[] = [];
    for (const [index, mutation] of mutations.entries()) {
      let result: MutationTestResult;
      try {
        result = await testMutation(mutation, covered, config, root);
      } catch (err) {
        result = { mutation, outcome: 'error', durationMs: 0, testOutput: String(err) };
      }
      results.push(result);
      logger.progress(
        index + 1,
        mutations.length,
        `#${mutation.id} ${mutation.original} -> ${mutation.mutant}: ${result.outcome} (${result.durationMs}ms)`,
      );
    }

    return aggregateResults(groupByFile(results), startTime);
  } finally {
    fileManager.restoreAll();
  }
}
