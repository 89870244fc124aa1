import { z } from 'zod';
import { FAMILY_NAMES } from '../family/index.js';
import { DEFAULTS } from './defaults.js';

export const MutswitchConfigSchema = z.object({
  testCommand: z.string().min(1),
  include: z.array(z.string()).default(DEFAULTS.include),
  exclude: z.array(z.string()).optional(),
  excludeTests: z.boolean().default(true),
  families: z
    .array(z.string())
    .refine((names) => names.every((n) => FAMILY_NAMES.includes(n)), {
      message: `families must be among: ${FAMILY_NAMES.join(', ')}`,
    })
    .optional(),
  timeout: z.number().int().positive().default(DEFAULTS.timeout),
  output: z.enum(['text', 'json', 'github']).default(DEFAULTS.output),
  moduleFormat: z.enum(['esm', 'commonjs']).default(DEFAULTS.moduleFormat),
  runtimeModule: z.string().min(1).default(DEFAULTS.runtimeModule),
  registryFile: z.string().min(1).default(DEFAULTS.registryFile),
  failOnSurvived: z.boolean().default(DEFAULTS.failOnSurvived),
  dryRun: z.boolean().default(DEFAULTS.dryRun),
});

export type MutswitchConfig = z.infer<typeof MutswitchConfigSchema>;
