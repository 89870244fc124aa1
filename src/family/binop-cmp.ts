import { defineFamily } from './types.js';

export const BINOP_CMP_VARIANTS = ['Lt', 'Le', 'Ge', 'Gt'] as const;

export type BinopCmp = (typeof BINOP_CMP_VARIANTS)[number];

/**
 * Relational operators. Operands are typed as the primitives the compiler
 * accepts for `<`; at run time any value goes through the same coercion the
 * original expression would apply.
 */
export type Comparable = number | bigint | string;

export const binopCmp = defineFamily<BinopCmp, Comparable, boolean>({
  name: 'binop_cmp',
  variants: BINOP_CMP_VARIANTS,
  tokens: { Lt: '<', Le: '<=', Ge: '>=', Gt: '>' },
  evaluate(op, left, right) {
    const l = left();
    const r = right();
    switch (op) {
      case 'Lt':
        return l < r;
      case 'Le':
        return l <= r;
      case 'Ge':
        return l >= r;
      case 'Gt':
        return l > r;
    }
  },
});
