import type { MutationMetadata } from './schemas.js';

export type { MutationMetadata, SourceLocation } from './schemas.js';

export interface Mutation extends MutationMetadata {
  id: number;
}

export type MutationOutcome = 'killed' | 'survived' | 'no_coverage' | 'timeout' | 'error' | 'pending';

export interface MutationTestResult {
  mutation: Mutation;
  outcome: MutationOutcome;
  durationMs: number;
  testOutput?: string;
}

export interface PipelineResult {
  totalMutations: number;
  killed: number;
  survived: number;
  noCoverage: number;
  timedOut: number;
  errors: number;
  mutationScore: number;
  fileResults: FileResult[];
  durationMs: number;
}

export interface FileResult {
  filePath: string;
  results: MutationTestResult[];
}
