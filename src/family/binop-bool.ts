import { defineFamily } from './types.js';

export const BINOP_BOOL_VARIANTS = ['And', 'Or'] as const;

export type BinopBool = (typeof BINOP_BOOL_VARIANTS)[number];

// The right operand is only forced when the operator would evaluate it.
export const binopBool = defineFamily<BinopBool, unknown, unknown>({
  name: 'binop_bool',
  variants: BINOP_BOOL_VARIANTS,
  tokens: { And: '&&', Or: '||' },
  evaluate(op, left, right) {
    switch (op) {
      case 'And':
        return left() && right();
      case 'Or':
        return left() || right();
    }
  },
});
