import { defineFamily } from './types.js';

export const BINOP_EQ_VARIANTS = ['Eq', 'Ne'] as const;

export type BinopEq = (typeof BINOP_EQ_VARIANTS)[number];

/** Loose equality `==` and inequality `!=`. */
export const binopEq = defineFamily<BinopEq, unknown, boolean>({
  name: 'binop_eq',
  variants: BINOP_EQ_VARIANTS,
  tokens: { Eq: '==', Ne: '!=' },
  evaluate(op, left, right) {
    const l = left();
    const r = right();
    switch (op) {
      case 'Eq':
        return l == r;
      case 'Ne':
        return l != r;
    }
  },
});
