import { z } from 'zod';

export const MUTATION_ID_ENV = 'MUTSWITCH_MUTATION_ID';
export const COVERAGE_DIR_ENV = 'MUTSWITCH_COVERAGE_DIR';

export class RuntimeConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeConfigError';
  }
}

const MutationIdSchema = z
  .string()
  .regex(/^\d+$/, 'must be a positive integer')
  .transform(Number)
  .refine((id) => Number.isSafeInteger(id) && id > 0, 'must be a positive integer');

/**
 * Which mutation, if any, is active for the whole run. Set once by the
 * harness before any instrumented code executes and never changed after.
 */
export class RuntimeConfig {
  private constructor(
    readonly activeMutation: number | undefined,
    readonly coverageDir: string | undefined,
  ) {}

  static withoutMutation(coverageDir?: string): RuntimeConfig {
    return new RuntimeConfig(undefined, coverageDir);
  }

  static withMutation(id: number, coverageDir?: string): RuntimeConfig {
    if (!Number.isSafeInteger(id) || id < 1) {
      throw new RuntimeConfigError(`Mutation id must be a positive integer, got ${id}`);
    }
    return new RuntimeConfig(id, coverageDir);
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
    const coverageDir = env[COVERAGE_DIR_ENV]?.trim() || undefined;
    const raw = env[MUTATION_ID_ENV]?.trim();
    if (!raw) {
      return RuntimeConfig.withoutMutation(coverageDir);
    }
    const parsed = MutationIdSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RuntimeConfigError(`${MUTATION_ID_ENV}=${raw} ${parsed.error.issues[0].message}`);
    }
    return RuntimeConfig.withMutation(parsed.data, coverageDir);
  }

  /**
   * Index of the active candidate within the block `[baseId, baseId + count)`,
   * or undefined when the active mutation belongs to another site.
   */
  activeOffset(baseId: number, count: number): number | undefined {
    if (this.activeMutation === undefined) return undefined;
    const offset = this.activeMutation - baseId;
    return offset >= 0 && offset < count ? offset : undefined;
  }
}
