import { defineFamily } from './types.js';

export const BINOP_STRICT_EQ_VARIANTS = ['StrictEq', 'StrictNe'] as const;

export type BinopStrictEq = (typeof BINOP_STRICT_EQ_VARIANTS)[number];

export const binopStrictEq = defineFamily<BinopStrictEq, unknown, boolean>({
  name: 'binop_strict_eq',
  variants: BINOP_STRICT_EQ_VARIANTS,
  tokens: { StrictEq: '===', StrictNe: '!==' },
  evaluate(op, left, right) {
    const l = left();
    const r = right();
    switch (op) {
      case 'StrictEq':
        return l === r;
      case 'StrictNe':
        return l !== r;
    }
  },
});
