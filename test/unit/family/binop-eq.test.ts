import { describe, it, expect } from 'vitest';
import { binopEq, BINOP_EQ_VARIANTS } from '../../../src/family/binop-eq.js';

const value = <T>(v: T) => () => v;

describe('binopEq', () => {
  it('lists its variants in a fixed order', () => {
    expect(binopEq.name).toBe('binop_eq');
    expect(binopEq.variants).toEqual(['Eq', 'Ne']);
    expect(BINOP_EQ_VARIANTS).toEqual(['Eq', 'Ne']);
  });

  it('offers the other operator as the only candidate', () => {
    expect(binopEq.candidates('Eq')).toEqual(['Ne']);
    expect(binopEq.candidates('Ne')).toEqual(['Eq']);
  });

  it('renders the source tokens', () => {
    expect(binopEq.render('Eq')).toBe('==');
    expect(binopEq.render('Ne')).toBe('!=');
  });

  it('evaluates with loose equality', () => {
    expect(binopEq.evaluate('Eq', value(5), value(4))).toBe(false);
    expect(binopEq.evaluate('Ne', value(5), value(4))).toBe(true);
    expect(binopEq.evaluate('Eq', value<unknown>(null), value<unknown>(undefined))).toBe(true);
    expect(binopEq.evaluate('Eq', value<unknown>('1'), value<unknown>(1))).toBe(true);
    expect(binopEq.evaluate('Ne', value<unknown>(0), value<unknown>(false))).toBe(false);
  });

  it('makes Ne the negation of Eq', () => {
    const pairs: Array<[unknown, unknown]> = [
      [1, 1],
      [1, 2],
      ['a', 'a'],
      [null, 0],
      [NaN, NaN],
      [[], ''],
    ];
    for (const [l, r] of pairs) {
      expect(binopEq.evaluate('Ne', value(l), value(r))).toBe(!binopEq.evaluate('Eq', value(l), value(r)));
    }
  });

  it('evaluates each operand once, left first', () => {
    const order: string[] = [];
    binopEq.evaluate(
      'Ne',
      () => {
        order.push('left');
        return 1;
      },
      () => {
        order.push('right');
        return 2;
      },
    );
    expect(order).toEqual(['left', 'right']);
  });

  it('parses operator tags', () => {
    expect(binopEq.parseOperator('Ne')).toBe('Ne');
    expect(binopEq.parseOperator('Lt')).toBeUndefined();
  });
});
