#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from './config/loader.js';
import { DEFAULTS } from './config/defaults.js';
import { groupByFile, instrumentFiles, registeredMutations, aggregateResults, runPipeline } from './pipeline/orchestrator.js';
import { MutationRegistry } from './registry/registry.js';
import { createReporter, isReportFormat } from './reporter/reporter.js';
import { logger } from './utils/logger.js';
import { isInsideGitRepo } from './utils/git.js';
import { PreflightError } from './runner/preflight.js';
import { TransformError } from './transform/errors.js';
import { filterSourceFiles } from './files/discover.js';
import { FAMILY_NAMES } from './family/index.js';

const program = new Command();

function handleError(err: unknown): never {
  if (err instanceof PreflightError) {
    logger.error(err.message);
    if (err.testOutput.trim()) {
      logger.error(err.testOutput);
    }
  } else if (err instanceof TransformError) {
    logger.error(`Internal instrumentation error${err.file ? ` in ${err.file}` : ''}: ${err.message}`);
  } else if (err instanceof Error) {
    logger.error(err.message);
  } else {
    logger.error(String(err));
  }
  process.exit(1);
}

program
  .name('mutswitch')
  .description('Operator mutation testing with runtime-switched mutants')
  .version('0.1.0')
  .option('--verbose', 'Print debug output')
  .hook('preAction', (cmd) => {
    if (cmd.opts().verbose) {
      logger.level = 'debug';
    }
  });

program
  .command('run')
  .description('Instrument source files and run the test suite once per mutation')
  .option('--test-command <cmd>', 'Shell command to run tests')
  .option('--include <glob...>', 'Mutate files matching glob')
  .option('--exclude <glob...>', 'Skip files matching glob')
  .option('--no-exclude-tests', 'Also mutate files that look like tests')
  .option('--families <name...>', 'Mutator families to apply')
  .option('--timeout <seconds>', 'Max time per test run in seconds')
  .option('--output <format>', 'Output format: text | json | github')
  .option('--module-format <format>', 'How instrumented files import the runtime: esm | commonjs')
  .option('--runtime-module <specifier>', 'Module specifier of the runtime')
  .option('--registry-file <path>', 'Where to write the mutation registry')
  .option('--fail-on-survived', 'Exit code 2 if any mutation survives')
  .option('--dry-run', 'Instrument and list mutations without running tests')
  .option('--config <path>', 'Path to config file')
  .action(async (opts) => {
    try {
      if (!isInsideGitRepo()) {
        logger.error('Not inside a git repository.');
        process.exit(1);
      }

      const config = await loadConfig(opts);
      const result = await runPipeline(config);
      const reporter = createReporter(config.output);
      const output = reporter.report(result);

      if (config.output === 'json') {
        process.stdout.write(output + '\n');
      } else {
        logger.info(output);
      }

      if (config.failOnSurvived && result.survived > 0) {
        process.exit(2);
      }
    } catch (err) {
      handleError(err);
    }
  });

program
  .command('list')
  .description('Print the mutations found in the given files without changing them')
  .argument('<files...>', 'Source files, relative to the current directory')
  .option('--families <name...>', 'Mutator families to apply')
  .option('--output <format>', 'Output format: text | json | github', 'text')
  .action((files: string[], opts: { families?: string[]; output: string }) => {
    try {
      const startTime = Date.now();
      if (!isReportFormat(opts.output)) {
        throw new Error(`Unknown output format ${opts.output}`);
      }
      const output = opts.output;
      const unknown = (opts.families ?? []).filter((name) => !FAMILY_NAMES.includes(name));
      if (unknown.length > 0) {
        throw new Error(`Unknown mutator families: ${unknown.join(', ')}`);
      }
      const registry = new MutationRegistry();
      const sources = filterSourceFiles(files, { include: ['**'], excludeTests: false });
      instrumentFiles(process.cwd(), sources, registry, {
        families: opts.families,
        runtimeModule: DEFAULTS.runtimeModule,
        moduleFormat: DEFAULTS.moduleFormat,
      });
      const pending = registeredMutations(registry).map((mutation) => ({
        mutation,
        outcome: 'pending' as const,
        durationMs: 0,
      }));
      const report = createReporter(output).report(aggregateResults(groupByFile(pending), startTime));
      process.stdout.write(report + '\n');
    } catch (err) {
      handleError(err);
    }
  });

program.parseAsync().catch(handleError);
