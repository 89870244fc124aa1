import path from 'node:path';
import { minimatch } from 'minimatch';
import { gitListFiles } from '../utils/git.js';
import { isTestFile } from './test-patterns.js';

const SOURCE_EXTENSIONS = new Set(['.ts', '.tsx', '.js', '.jsx', '.mts', '.cts', '.mjs', '.cjs']);

export interface FileFilter {
  include: string[];
  exclude?: string[];
  excludeTests?: boolean;
}

function matchesGlobs(filePath: string, patterns: string[]): boolean {
  return patterns.some((p) => minimatch(filePath, p));
}

export function isMutableSource(filePath: string): boolean {
  if (/\.d\.[cm]?ts$/.test(filePath)) return false;
  return SOURCE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Applies the include/exclude globs and returns the files in a fixed order,
 * so mutation ids come out the same on every run.
 */
export function filterSourceFiles(files: string[], filter: FileFilter): string[] {
  const { include, exclude, excludeTests = true } = filter;
  return files
    .map((f) => f.split(path.sep).join('/'))
    .filter((f) => isMutableSource(f))
    .filter((f) => matchesGlobs(f, include))
    .filter((f) => !(exclude && exclude.length > 0 && matchesGlobs(f, exclude)))
    .filter((f) => !(excludeTests && isTestFile(f)))
    .sort();
}

export function discoverSourceFiles(root: string, filter: FileFilter): string[] {
  return filterSourceFiles(gitListFiles(root), filter);
}
