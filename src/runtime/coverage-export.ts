import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { threadId } from 'node:worker_threads';
import { z } from 'zod';

const COVERAGE_FILE_PATTERN = /^coverage-\d+-\d+-[A-Za-z0-9-]+\.jsonl$/;

/** One line per reached site: `[baseId, candidateCount]`. */
const CoverageLineSchema = z.tuple([z.number().int().positive(), z.number().int().nonnegative()]);

export function coverageFileName(
  pid: number = process.pid,
  thread: number = threadId,
  instance: string = randomUUID(),
): string {
  return `coverage-${pid}-${thread}-${instance}.jsonl`;
}

/**
 * Appends each newly reached site to a file of its own, so the record
 * survives a test process that is killed or never fires `exit`. Every
 * runtime instance gets its own file, including instances sharing a pid
 * and thread in separate module contexts.
 */
export class CoverageWriter {
  readonly filePath: string;
  private dirReady = false;

  constructor(
    private readonly dir: string,
    fileName: string = coverageFileName(),
  ) {
    this.filePath = path.join(dir, fileName);
  }

  record(baseId: number, count: number): void {
    if (!this.dirReady) {
      fs.mkdirSync(this.dir, { recursive: true });
      this.dirReady = true;
    }
    fs.appendFileSync(this.filePath, `${JSON.stringify([baseId, count])}\n`, 'utf-8');
  }
}

export interface CoverageReport {
  /** Number of coverage files found; zero means no runtime reported at all. */
  files: number;
  ids: Set<number>;
}

function parseCoverageFile(filePath: string, covered: Set<number>): void {
  const lines = fs.readFileSync(filePath, 'utf-8').split('\n');
  // The last element is whatever follows the final newline: empty, or a
  // line cut short when the process was killed mid-write.
  for (const [index, line] of lines.slice(0, -1).entries()) {
    if (line.trim() === '') continue;
    let entry: [number, number];
    try {
      entry = CoverageLineSchema.parse(JSON.parse(line));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to parse coverage file ${filePath} at line ${index + 1}: ${message}`, { cause: err });
    }
    const [baseId, count] = entry;
    covered.add(baseId);
    for (let offset = 1; offset < count; offset++) {
      covered.add(baseId + offset);
    }
  }
}

/** Union of the ids written by every runtime instance of one run. */
export function readCoverageDir(dir: string): CoverageReport {
  const ids = new Set<number>();
  if (!fs.existsSync(dir)) return { files: 0, ids };

  const names = fs.readdirSync(dir).filter((name) => COVERAGE_FILE_PATTERN.test(name)).sort();
  for (const name of names) {
    parseCoverageFile(path.join(dir, name), ids);
  }
  return { files: names.length, ids };
}
