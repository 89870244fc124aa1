import { z } from 'zod';

export const SourceLocationSchema = z.object({
  file: z.string().describe('Path of the source file, relative to the project root'),
  line: z.number().int().positive().describe('1-based line of the operator token'),
  column: z.number().int().positive().describe('1-based column of the operator token'),
});

export const MutationMetadataSchema = z.object({
  fnName: z.string().describe('Name of the enclosing function'),
  family: z.string().describe('Tag of the mutator family'),
  original: z.string().describe('Rendering of the original operator'),
  mutant: z.string().describe('Rendering of the substituted operator'),
  location: SourceLocationSchema,
});

export const RegistryFileSchema = z.object({
  version: z.literal(1),
  mutations: z.array(
    MutationMetadataSchema.extend({
      id: z.number().int().positive(),
    }),
  ),
});

export type SourceLocation = z.infer<typeof SourceLocationSchema>;
export type MutationMetadata = z.infer<typeof MutationMetadataSchema>;
export type RegistryFile = z.infer<typeof RegistryFileSchema>;
