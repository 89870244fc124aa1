import ts from 'typescript';
import { binopBool, binopCmp, binopEq, binopStrictEq } from '../family/index.js';
import type { MutatorFamily } from '../family/types.js';

export interface OperatorMatch {
  family: MutatorFamily;
  op: string;
}

/** Maps an operator token to the family that owns it. */
export function matchOperator(kind: ts.SyntaxKind): OperatorMatch | undefined {
  switch (kind) {
    case ts.SyntaxKind.EqualsEqualsToken:
      return { family: binopEq, op: 'Eq' };
    case ts.SyntaxKind.ExclamationEqualsToken:
      return { family: binopEq, op: 'Ne' };
    case ts.SyntaxKind.EqualsEqualsEqualsToken:
      return { family: binopStrictEq, op: 'StrictEq' };
    case ts.SyntaxKind.ExclamationEqualsEqualsToken:
      return { family: binopStrictEq, op: 'StrictNe' };
    case ts.SyntaxKind.LessThanToken:
      return { family: binopCmp, op: 'Lt' };
    case ts.SyntaxKind.LessThanEqualsToken:
      return { family: binopCmp, op: 'Le' };
    case ts.SyntaxKind.GreaterThanEqualsToken:
      return { family: binopCmp, op: 'Ge' };
    case ts.SyntaxKind.GreaterThanToken:
      return { family: binopCmp, op: 'Gt' };
    case ts.SyntaxKind.AmpersandAmpersandToken:
      return { family: binopBool, op: 'And' };
    case ts.SyntaxKind.BarBarToken:
      return { family: binopBool, op: 'Or' };
    default:
      return undefined;
  }
}
