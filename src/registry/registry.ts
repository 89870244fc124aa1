import fs from 'node:fs';
import path from 'node:path';
import { RegistryFileSchema, type MutationMetadata, type RegistryFile } from '../mutation/schemas.js';
import { TransformError } from '../transform/errors.js';
import { IdAllocator } from './allocator.js';

export class RegistryFormatError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = 'RegistryFormatError';
  }
}

/**
 * Append-only store of every mutation discovered by the transform pass.
 * An id, once written, always maps to the same frozen metadata.
 */
export class MutationRegistry {
  private entries = new Map<number, Readonly<MutationMetadata>>();

  constructor(private readonly allocator: IdAllocator = new IdAllocator()) {}

  get size(): number {
    return this.entries.size;
  }

  register(entries: readonly MutationMetadata[]): number {
    if (entries.length === 0) {
      throw new TransformError('Cannot register an empty block of mutations');
    }
    const baseId = this.allocator.reserve(entries.length);
    entries.forEach((entry, offset) => {
      this.entries.set(baseId + offset, freezeMetadata(entry));
    });
    return baseId;
  }

  lookup(id: number): Readonly<MutationMetadata> | undefined {
    return this.entries.get(id);
  }

  all(): Iterable<[number, Readonly<MutationMetadata>]> {
    return {
      [Symbol.iterator]: () => this.entries.entries(),
    };
  }

  toJSON(): RegistryFile {
    return {
      version: 1,
      mutations: [...this.entries].map(([id, m]) => ({ id, ...m, location: { ...m.location } })),
    };
  }

  save(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(this.toJSON(), null, 2) + '\n', 'utf-8');
  }

  static fromJSON(data: unknown, source = '<memory>'): MutationRegistry {
    const parsed = RegistryFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new RegistryFormatError(
        `Invalid mutation registry ${source}: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
        source,
      );
    }

    const mutations = [...parsed.data.mutations].sort((a, b) => a.id - b.id);
    const lastId = mutations.length > 0 ? mutations[mutations.length - 1].id : 0;
    const registry = new MutationRegistry(new IdAllocator(lastId + 1));
    for (const { id, ...metadata } of mutations) {
      if (registry.entries.has(id)) {
        throw new RegistryFormatError(`Duplicate mutation id ${id} in ${source}`, source);
      }
      registry.entries.set(id, freezeMetadata(metadata));
    }
    return registry;
  }

  static load(filePath: string): MutationRegistry {
    const content = fs.readFileSync(filePath, 'utf-8');
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new RegistryFormatError(`Failed to parse registry file ${filePath}: ${message}`, filePath);
    }
    return MutationRegistry.fromJSON(data, filePath);
  }
}

function freezeMetadata(entry: MutationMetadata): Readonly<MutationMetadata> {
  return Object.freeze({ ...entry, location: Object.freeze({ ...entry.location }) });
}
