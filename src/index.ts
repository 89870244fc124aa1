export { runPipeline, instrumentFiles } from './pipeline/orchestrator.js';
export { createReporter, isReportFormat, REPORT_FORMATS } from './reporter/reporter.js';
export type { Reporter, ReportFormat } from './reporter/reporter.js';
export { loadConfig } from './config/loader.js';
export { MutswitchConfigSchema } from './config/schema.js';
export type { MutswitchConfig } from './config/schema.js';
export { FAMILIES, FAMILY_NAMES, getFamily, binopEq, binopStrictEq, binopCmp, binopBool } from './family/index.js';
export { defineFamily } from './family/types.js';
export type { MutatorFamily, Operand, FamilyDefinition } from './family/types.js';
export { IdAllocator } from './registry/allocator.js';
export { MutationRegistry, RegistryFormatError } from './registry/registry.js';
export { transform, createMutationTransformer, RUNTIME_IDENTIFIER } from './transform/transformer.js';
export type { TransformContext, TransformerOptions } from './transform/transformer.js';
export { instrumentSource, moduleFormatFor, DEFAULT_RUNTIME_MODULE } from './transform/instrument.js';
export type { InstrumentOptions, InstrumentResult, ModuleFormat } from './transform/instrument.js';
export { TransformError, SourceParseError } from './transform/errors.js';
export { RuntimeConfig, RuntimeConfigError } from './runtime/config.js';
export { CoverageMap } from './runtime/coverage.js';
export { RuntimeOracle } from './runtime/oracle.js';
export { readCoverageDir, CoverageWriter } from './runtime/coverage-export.js';
export type {
  Mutation,
  MutationMetadata,
  SourceLocation,
  MutationOutcome,
  MutationTestResult,
  PipelineResult,
  FileResult,
} from './mutation/types.js';
