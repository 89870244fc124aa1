import { COVERAGE_DIR_ENV } from '../runtime/config.js';
import { executeTests } from './executor.js';

export class PreflightError extends Error {
  constructor(
    message: string,
    public readonly testOutput: string,
  ) {
    super(message);
    this.name = 'PreflightError';
  }
}

export async function runPreflight(
  testCommand: string,
  timeout: number,
  cwd?: string,
): Promise<void> {
  const result = await executeTests(testCommand, timeout, { cwd });

  if (result.timedOut) {
    throw new PreflightError(
      'Pre-flight test run timed out. Ensure your test suite completes within the timeout.',
      result.stdout + '\n' + result.stderr,
    );
  }

  if (!result.passed) {
    throw new PreflightError(
      'Pre-flight test run failed. Tests must pass on unmodified code before mutation testing.',
      result.stdout + '\n' + result.stderr,
    );
  }
}

/**
 * Runs the suite against instrumented code with no mutation active. It must
 * pass exactly like the unmodified code did; a failure means the
 * instrumentation changed behaviour.
 */
export async function runCoveragePass(
  testCommand: string,
  timeout: number,
  coverageDir: string,
  cwd?: string,
): Promise<void> {
  const result = await executeTests(testCommand, timeout, { env: { [COVERAGE_DIR_ENV]: coverageDir }, cwd });

  if (result.timedOut) {
    throw new PreflightError(
      'Coverage run timed out on instrumented code.',
      result.stdout + '\n' + result.stderr,
    );
  }

  if (!result.passed) {
    throw new PreflightError(
      'Coverage run failed on instrumented code with no mutation active. Instrumentation changed program behaviour.',
      result.stdout + '\n' + result.stderr,
    );
  }
}
