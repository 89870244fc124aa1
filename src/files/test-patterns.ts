import { minimatch } from 'minimatch';

export const DEFAULT_TEST_EXCLUDE_PATTERNS = [
  '**/*.test.{ts,tsx,js,jsx,mts,cts,mjs,cjs}',
  '**/*.spec.{ts,tsx,js,jsx,mts,cts,mjs,cjs}',
  '**/__tests__/**',
  '**/__mocks__/**',
  '**/test/**',
  '**/tests/**',
  '**/*.stories.{ts,tsx,js,jsx}',
];

export function isTestFile(
  filePath: string,
  patterns: string[] = DEFAULT_TEST_EXCLUDE_PATTERNS,
): boolean {
  return patterns.some((p) => minimatch(filePath, p));
}
