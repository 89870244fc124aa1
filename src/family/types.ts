/** A deferred operand. Instrumented code passes each operand as a thunk so evaluation order is kept. */
export type Operand<T> = () => T;

/**
 * One category of interchangeable operators.
 *
 * Families are pure and stateless: the variant set is closed, `candidates`
 * never contains the original operator, and `evaluate` reproduces the
 * JavaScript operator it stands for, including how many times and in which
 * order each operand is evaluated.
 */
export interface MutatorFamily<Op extends string = string, T = unknown, R = unknown> {
  readonly name: string;
  readonly variants: readonly Op[];
  candidates(original: Op): readonly Op[];
  evaluate(op: Op, left: Operand<T>, right: Operand<T>): R;
  render(op: Op): string;
  parseOperator(tag: string): Op | undefined;
}

export interface FamilyDefinition<Op extends string, T, R> {
  name: string;
  variants: readonly Op[];
  tokens: Record<Op, string>;
  evaluate(op: Op, left: Operand<T>, right: Operand<T>): R;
}

export function defineFamily<Op extends string, T, R>(
  definition: FamilyDefinition<Op, T, R>,
): MutatorFamily<Op, T, R> {
  const { name, variants, tokens } = definition;
  const candidatesByOp = new Map<Op, readonly Op[]>(
    variants.map((op) => [op, Object.freeze(variants.filter((v) => v !== op))]),
  );

  return Object.freeze({
    name,
    variants: Object.freeze([...variants]),
    candidates(original: Op): readonly Op[] {
      return candidatesByOp.get(original) ?? [];
    },
    evaluate: definition.evaluate,
    render(op: Op): string {
      return tokens[op];
    },
    parseOperator(tag: string): Op | undefined {
      return variants.find((v) => v === tag);
    },
  });
}
