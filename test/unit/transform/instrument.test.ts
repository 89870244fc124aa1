import { describe, it, expect, afterEach } from 'vitest';
import { MutationRegistry } from '../../../src/registry/registry.js';
import { configureRuntime, getCoverage, RuntimeConfig } from '../../../src/runtime/index.js';
import { SourceParseError } from '../../../src/transform/errors.js';
import { instrumentSource, moduleFormatFor, runtimeImport, syntaxErrors } from '../../../src/transform/instrument.js';
import { loadInstrumented } from './load-instrumented.js';

const IMPORT_LINE = 'import * as __mutswitch from "mutswitch/runtime";';

function instrument(code: string, filePath = 'src/sample.ts', registry = new MutationRegistry()) {
  const result = instrumentSource(code, { filePath, registry });
  return { ...result, registry };
}

afterEach(() => {
  globalThis.__mutswitchRuntime = undefined;
});

describe('instrumentSource', () => {
  it('rewrites a comparison into a runtime call', () => {
    const { code, mutationCount } = instrument('const r = a == b;\n');

    expect(mutationCount).toBe(1);
    expect(code.split('\n')).toEqual([
      IMPORT_LINE,
      'const r = __mutswitch.decide(1, () => a, () => b, "Eq", "binop_eq");',
      '',
    ]);
  });

  it('records one mutation per candidate with location and function name', () => {
    const source = ['export function inRange(x: number, max: number) {', '  return x < max;', '}', ''].join('\n');
    const { registry, mutationCount } = instrument(source);

    expect(mutationCount).toBe(3);
    expect(registry.toJSON().mutations).toEqual([
      { id: 1, fnName: 'inRange', family: 'binop_cmp', original: '<', mutant: '<=', location: { file: 'src/sample.ts', line: 2, column: 12 } },
      { id: 2, fnName: 'inRange', family: 'binop_cmp', original: '<', mutant: '>=', location: { file: 'src/sample.ts', line: 2, column: 12 } },
      { id: 3, fnName: 'inRange', family: 'binop_cmp', original: '<', mutant: '>', location: { file: 'src/sample.ts', line: 2, column: 12 } },
    ]);
  });

  it('assigns ids in source order, outer operator first', () => {
    const { registry, code } = instrument('export const ok = (a: number, b: number, c: boolean) => a == b && c;\n');

    const ops = [...registry.all()].map(([id, m]) => `${id}:${m.original}`);
    expect(ops).toEqual(['1:&&', '2:==']);
    expect(code).toContain(
      '__mutswitch.decide(1, () => __mutswitch.decide(2, () => a, () => b, "Eq", "binop_eq"), () => c, "And", "binop_bool")',
    );
  });

  it('assigns the same ids on every pass over the same source', () => {
    const source = 'export function f(a: number, b: number) {\n  return a !== b || a <= 0;\n}\n';
    const first = instrument(source);
    const second = instrument(source);

    expect(second.code).toBe(first.code);
    expect(second.registry.toJSON()).toEqual(first.registry.toJSON());
  });

  it('continues numbering across files in one registry', () => {
    const registry = new MutationRegistry();
    instrument('export const x = (a: number) => a == 1;\n', 'src/a.ts', registry);
    const { code } = instrument('export const y = (a: number) => a != 1;\n', 'src/b.ts', registry);

    expect(code).toContain('__mutswitch.decide(2, () => a, () => 1, "Ne", "binop_eq")');
    expect(registry.lookup(2)?.location.file).toBe('src/b.ts');
  });

  it('returns files without sites unchanged', () => {
    const source = 'export const total = (a: number, b: number) => a + b; // sum\n';
    const { code, mutationCount } = instrument(source);

    expect(mutationCount).toBe(0);
    expect(code).toBe(source);
  });

  it('leaves operands that await or yield in place', () => {
    const source = [
      'export async function ready(load: () => Promise<number>) {',
      '  return (await load()) === 1;',
      '}',
      'export function* gen() {',
      '  return (yield 1) === 2;',
      '}',
      '',
    ].join('\n');

    expect(instrument(source).mutationCount).toBe(0);
  });

  it('instruments await-free sites inside async functions', () => {
    const source = 'export async function run(a: number) {\n  const f = async () => (await Promise.resolve(a)) > 0;\n  return a > 1;\n}\n';
    const { registry } = instrument(source);

    expect([...registry.all()].map(([, m]) => m.location.line)).toEqual([3, 3, 3]);
  });

  it('skips enums, ambient declarations and types', () => {
    const source = [
      'enum Flag { A = 1, B = A > 0 ? 2 : 3 }',
      'declare const limit: number;',
      'type Pick = string | number;',
      'export const big = (n: number) => n >= limit;',
      '',
    ].join('\n');
    const { registry } = instrument(source);

    expect(registry.size).toBe(3);
    expect(registry.lookup(1)?.fnName).toBe('big');
  });

  it('honours the family filter', () => {
    const registry = new MutationRegistry();
    const { mutationCount } = instrumentSource('export const f = (a: number, b: boolean) => a == 1 && b || a < 2;\n', {
      filePath: 'src/f.ts',
      registry,
      families: ['binop_cmp'],
    });

    expect(mutationCount).toBe(3);
    expect([...registry.all()].every(([, m]) => m.family === 'binop_cmp')).toBe(true);
  });

  it('names methods, constructors, arrows and module scope', () => {
    const source = [
      'export class Account {',
      '  constructor(private balance: number) {',
      '    if (balance < 0) throw new Error("negative");',
      '  }',
      '  canWithdraw(amount: number) {',
      '    return amount <= this.balance;',
      '  }',
      '}',
      'export const isZero = (n: number) => n === 0;',
      'export const handlers = { check: function () { return 1 != 2; } };',
      'export const flag = 1 == 1;',
      '',
    ].join('\n');
    const { registry } = instrument(source);

    const names = new Set([...registry.all()].map(([, m]) => m.fnName));
    expect([...names]).toEqual(['Account.constructor', 'Account.canWithdraw', 'isZero', 'check', '<module>']);
  });

  it('adds the import after the directive prologue', () => {
    const { code } = instrument("'use strict';\nexport const f = (a: number) => a == 1;\n");
    const lines = code.split('\n');

    expect(lines[0]).toBe("'use strict';");
    expect(lines[1]).toBe(IMPORT_LINE);
  });

  it('can import the runtime with require', () => {
    const registry = new MutationRegistry();
    const { code } = instrumentSource('const f = (a, b) => a === b;\nmodule.exports = { f };\n', {
      filePath: 'lib/f.cjs',
      registry,
      moduleFormat: 'commonjs',
      runtimeModule: '@acme/mutswitch-runtime',
    });

    expect(code.split('\n')[0]).toBe('const __mutswitch = require("@acme/mutswitch-runtime");');
  });

  it('takes the module format from .cjs and .mjs extensions', () => {
    const source = 'export const f = (a: number, b: number) => a === b;\n';
    const cjs = new MutationRegistry();
    const mjs = new MutationRegistry();

    const fromCjs = instrumentSource('const f = (a, b) => a === b;\n', { filePath: 'lib/f.cjs', registry: cjs });
    const fromMts = instrumentSource(source, { filePath: 'src/f.mts', registry: mjs, moduleFormat: 'commonjs' });

    expect(fromCjs.code.split('\n')[0]).toBe('const __mutswitch = require("mutswitch/runtime");');
    expect(fromMts.code.split('\n')[0]).toBe(IMPORT_LINE);
  });

  it('rejects sources that do not parse', () => {
    expect(() => instrument('const = ;\n')).toThrow(SourceParseError);
  });

  it('handles JSX files', () => {
    const source = 'export const Badge = (props: { count: number }) => <span>{props.count > 9 ? "9+" : props.count}</span>;\n';
    const { code, mutationCount } = instrument(source, 'src/Badge.tsx');

    expect(mutationCount).toBe(3);
    expect(syntaxErrors(code, 'src/Badge.tsx')).toEqual([]);
  });
});

describe('moduleFormatFor', () => {
  it('lets the extension decide where Node fixes the format', () => {
    expect(moduleFormatFor('a.cjs', 'esm')).toBe('commonjs');
    expect(moduleFormatFor('a.cts', 'esm')).toBe('commonjs');
    expect(moduleFormatFor('a.mjs', 'commonjs')).toBe('esm');
    expect(moduleFormatFor('a.MTS', 'commonjs')).toBe('esm');
  });

  it('falls back to the configured format otherwise', () => {
    expect(moduleFormatFor('src/a.ts', 'commonjs')).toBe('commonjs');
    expect(moduleFormatFor('src/a.js', 'esm')).toBe('esm');
  });
});

describe('runtimeImport', () => {
  it('renders both module formats', () => {
    expect(runtimeImport('rt', 'esm')).toBe('import * as __mutswitch from "rt";');
    expect(runtimeImport('rt', 'commonjs')).toBe('const __mutswitch = require("rt");');
  });
});

describe('running instrumented code', () => {
  const source = [
    'export function isEqual(a: number, b: number): boolean {',
    '  return a == b;',
    '}',
    'export function guard(o: { x: number } | null): boolean {',
    '  return o !== null && o.x > 0;',
    '}',
    'export function ordered(log: string[]): boolean {',
    '  return step(log, "left", 1) < step(log, "right", 2);',
    '}',
    'function step(log: string[], name: string, value: number): number {',
    '  log.push(name);',
    '  return value;',
    '}',
    '',
  ].join('\n');
  // ids: 1 ==, 2 &&, 3 !==, 4-6 >, 7-9 <

  it('behaves like the original with no mutation active', () => {
    configureRuntime(RuntimeConfig.withoutMutation());
    const { code } = instrument(source);
    const exported = loadInstrumented(code);

    expect(exported('isEqual')(5, 4)).toBe(false);
    expect(exported('guard')(null)).toBe(false);
    expect(exported('guard')({ x: 1 })).toBe(true);
    expect(exported('ordered')([])).toBe(true);
  });

  it('switches only the active site', () => {
    configureRuntime(RuntimeConfig.withMutation(1));
    const exported = loadInstrumented(instrument(source).code);

    expect(exported('isEqual')(5, 4)).toBe(true);
    expect(exported('guard')({ x: 1 })).toBe(true);
  });

  it('applies the mutant short-circuit rule', () => {
    configureRuntime(RuntimeConfig.withMutation(2));
    const exported = loadInstrumented(instrument(source).code);

    expect(() => exported('guard')(null)).toThrow(TypeError);
  });

  it('selects a candidate inside a multi-mutation block', () => {
    configureRuntime(RuntimeConfig.withMutation(6));
    const exported = loadInstrumented(instrument(source).code);

    expect(exported('guard')({ x: 0 })).toBe(true);
  });

  it('keeps operand order and count under mutation', () => {
    for (const config of [RuntimeConfig.withoutMutation(), RuntimeConfig.withMutation(9)]) {
      configureRuntime(config);
      const exported = loadInstrumented(instrument(source).code);
      const log: string[] = [];
      exported('ordered')(log);
      expect(log).toEqual(['left', 'right']);
    }
  });

  it('records reached sites', () => {
    configureRuntime(RuntimeConfig.withoutMutation());
    const exported = loadInstrumented(instrument(source).code);

    exported('guard')(null);

    expect(getCoverage().ids()).toEqual([2, 3]);
  });
});
