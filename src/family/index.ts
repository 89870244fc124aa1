import { binopBool } from './binop-bool.js';
import { binopCmp } from './binop-cmp.js';
import { binopEq } from './binop-eq.js';
import { binopStrictEq } from './binop-strict-eq.js';
import type { MutatorFamily } from './types.js';

export const FAMILIES: readonly MutatorFamily[] = [binopEq, binopStrictEq, binopCmp, binopBool];

export const FAMILY_NAMES = FAMILIES.map((f) => f.name);

const familiesByName = new Map<string, MutatorFamily>(FAMILIES.map((f) => [f.name, f]));

export function getFamily(name: string): MutatorFamily | undefined {
  return familiesByName.get(name);
}

export { binopBool, binopCmp, binopEq, binopStrictEq };
export type { MutatorFamily, Operand } from './types.js';
