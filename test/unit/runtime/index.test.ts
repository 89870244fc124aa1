import { describe, it, expect, afterEach } from 'vitest';
import {
  configureRuntime,
  decide,
  getCoverage,
  getRuntime,
  RuntimeConfig,
  RuntimeConfigError,
} from '../../../src/runtime/index.js';

const value = <T>(v: T) => () => v;

afterEach(() => {
  globalThis.__mutswitchRuntime = undefined;
});

describe('process-wide runtime', () => {
  it('resolves families and operators by tag', () => {
    configureRuntime(RuntimeConfig.withMutation(1));
    expect(decide(1, value(5), value(4), 'Eq', 'binop_eq')).toBe(true);
    expect(decide(2, value(5), value(4), 'Eq', 'binop_eq')).toBe(false);
    expect(getCoverage().ids()).toEqual([1, 2]);
  });

  it('is shared through globalThis', () => {
    const oracle = configureRuntime(RuntimeConfig.withoutMutation());
    expect(getRuntime()).toBe(oracle);
    expect(globalThis.__mutswitchRuntime?.oracle).toBe(oracle);
  });

  it('creates the oracle from the environment on first use', () => {
    const saved = process.env.MUTSWITCH_MUTATION_ID;
    process.env.MUTSWITCH_MUTATION_ID = '3';
    try {
      expect(getRuntime().config.activeMutation).toBe(3);
    } finally {
      if (saved === undefined) delete process.env.MUTSWITCH_MUTATION_ID;
      else process.env.MUTSWITCH_MUTATION_ID = saved;
    }
  });

  it('rejects unknown families and operators', () => {
    configureRuntime(RuntimeConfig.withoutMutation());
    expect(() => decide(1, value(1), value(2), 'Eq', 'binop_num')).toThrow(RuntimeConfigError);
    expect(() => decide(1, value(1), value(2), 'Lt', 'binop_eq')).toThrow('Unknown operator Lt in family binop_eq');
  });
});
