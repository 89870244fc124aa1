import { spawn } from 'node:child_process';
import { COVERAGE_DIR_ENV, MUTATION_ID_ENV } from '../runtime/config.js';

export interface TestExecutionResult {
  passed: boolean;
  durationMs: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  exitCode: number | null;
}

const MAX_OUTPUT_LENGTH = 5000;

function truncateOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_LENGTH) return output;
  return '...(truncated)\n' + output.slice(-MAX_OUTPUT_LENGTH);
}

/**
 * Environment for one test run: the parent's, minus any inherited mutation
 * settings, plus `overrides`.
 */
export function testEnv(overrides: Record<string, string> = {}): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...process.env };
  delete env[MUTATION_ID_ENV];
  delete env[COVERAGE_DIR_ENV];
  return { ...env, ...overrides };
}

export interface ExecuteOptions {
  /** Extra environment variables for the test process. */
  env?: Record<string, string>;
  /** Working directory; the current one when omitted. */
  cwd?: string;
}

export function executeTests(
  command: string,
  timeoutSeconds: number,
  options: ExecuteOptions = {},
): Promise<TestExecutionResult> {
  return new Promise((resolve) => {
    const startTime = Date.now();
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;
    let forceKill: NodeJS.Timeout | undefined;

    // Its own process group, so a timeout reaches the test runner and its
    // workers and not only the shell wrapping them.
    const child = spawn(command, {
      shell: true,
      detached: true,
      cwd: options.cwd,
      env: testEnv(options.env),
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const killGroup = (signal: NodeJS.Signals): void => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, signal);
      } catch {
        // Group already gone, or no process groups on this platform.
        child.kill(signal);
      }
    };

    const finish = (exitCode: number | null, spawnError?: Error): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(forceKill);
      resolve({
        passed: exitCode === 0 && !timedOut,
        durationMs: Date.now() - startTime,
        stdout: truncateOutput(stdout),
        stderr: spawnError ? spawnError.message : truncateOutput(stderr),
        timedOut: spawnError ? false : timedOut,
        exitCode,
      });
    };

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    const timer = setTimeout(() => {
      timedOut = true;
      killGroup('SIGTERM');
      // Force kill after 5s grace period
      forceKill = setTimeout(() => killGroup('SIGKILL'), 5000);
    }, timeoutSeconds * 1000);

    child.on('exit', (code) => {
      if (!timedOut) return;
      // Stragglers that ignored SIGTERM may still hold the pipes open.
      killGroup('SIGKILL');
      child.stdout.destroy();
      child.stderr.destroy();
      finish(code);
    });

    child.on('close', (code) => {
      finish(code);
    });

    child.on('error', (err) => {
      finish(null, err);
    });
  });
}
