import path from 'node:path';
import ts from 'typescript';
import type { MutationRegistry } from '../registry/registry.js';
import { SourceParseError, TransformError } from './errors.js';
import { createMutationTransformer, RUNTIME_IDENTIFIER } from './transformer.js';

export const DEFAULT_RUNTIME_MODULE = 'mutswitch/runtime';

export type ModuleFormat = 'esm' | 'commonjs';

export interface InstrumentOptions {
  /** Path recorded in mutation locations; its extension selects the parser. */
  filePath: string;
  registry: MutationRegistry;
  families?: readonly string[];
  runtimeModule?: string;
  /** Format for files whose extension does not fix one. */
  moduleFormat?: ModuleFormat;
}

export interface InstrumentResult {
  code: string;
  mutationCount: number;
}

/**
 * How the runtime is loaded into `filePath`. Node fixes the module system of
 * `.cjs`/`.cts` and `.mjs`/`.mts` files; every other extension takes `fallback`.
 */
export function moduleFormatFor(filePath: string, fallback: ModuleFormat): ModuleFormat {
  switch (path.extname(filePath).toLowerCase()) {
    case '.cjs':
    case '.cts':
      return 'commonjs';
    case '.mjs':
    case '.mts':
      return 'esm';
    default:
      return fallback;
  }
}

function scriptKindFor(filePath: string): ts.ScriptKind {
  switch (path.extname(filePath).toLowerCase()) {
    case '.tsx':
      return ts.ScriptKind.TSX;
    case '.jsx':
      return ts.ScriptKind.JSX;
    case '.js':
    case '.mjs':
    case '.cjs':
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

export function syntaxErrors(code: string, filePath: string): string[] {
  const output = ts.transpileModule(code, {
    fileName: filePath,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ESNext,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
      allowJs: true,
    },
  });
  return (output.diagnostics ?? [])
    .filter((d) => d.category === ts.DiagnosticCategory.Error)
    .map((d) => {
      const message = ts.flattenDiagnosticMessageText(d.messageText, '\n');
      if (d.file && d.start !== undefined) {
        const { line, character } = d.file.getLineAndCharacterOfPosition(d.start);
        return `${line + 1}:${character + 1} ${message}`;
      }
      return message;
    });
}

export function runtimeImport(runtimeModule: string, format: ModuleFormat): string {
  const specifier = JSON.stringify(runtimeModule);
  return format === 'commonjs'
    ? `const ${RUNTIME_IDENTIFIER} = require(${specifier});`
    : `import * as ${RUNTIME_IDENTIFIER} from ${specifier};`;
}

function isDirective(statement: ts.Statement): boolean {
  return ts.isExpressionStatement(statement) && ts.isStringLiteral(statement.expression);
}

/** Inserts `line` after the shebang and directive prologue of `code`. */
function insertAfterPrologue(code: string, filePath: string, line: string): string {
  const sourceFile = ts.createSourceFile(filePath, code, ts.ScriptTarget.Latest, false, scriptKindFor(filePath));
  let end = 0;
  for (const statement of sourceFile.statements) {
    if (!isDirective(statement)) break;
    end = statement.end;
  }
  if (end === 0) {
    const shebang = /^#!.*(\r?\n|$)/.exec(code);
    if (shebang) end = shebang[0].length;
    return `${code.slice(0, end)}${line}\n${code.slice(end)}`;
  }
  return `${code.slice(0, end)}\n${line}${code.slice(end)}`;
}

/**
 * Instruments one source file: every mutable operator becomes a call into
 * the runtime, and the runtime import is added. The output is re-parsed and
 * rejected if it does not parse.
 */
export function instrumentSource(code: string, options: InstrumentOptions): InstrumentResult {
  const { filePath, registry } = options;

  const inputErrors = syntaxErrors(code, filePath);
  if (inputErrors.length > 0) {
    throw new SourceParseError(`Cannot parse ${filePath}: ${inputErrors[0]}`, filePath, inputErrors);
  }

  const sourceFile = ts.createSourceFile(filePath, code, ts.ScriptTarget.Latest, true, scriptKindFor(filePath));
  const before = registry.size;
  const result = ts.transform(sourceFile, [
    createMutationTransformer({ filePath, registry, families: options.families }),
  ]);

  let printed: string;
  try {
    const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
    printed = printer.printFile(result.transformed[0]);
  } finally {
    result.dispose();
  }

  const mutationCount = registry.size - before;
  if (mutationCount === 0) {
    return { code, mutationCount };
  }

  const instrumented = insertAfterPrologue(
    printed,
    filePath,
    runtimeImport(options.runtimeModule ?? DEFAULT_RUNTIME_MODULE, moduleFormatFor(filePath, options.moduleFormat ?? 'esm')),
  );

  const outputErrors = syntaxErrors(instrumented, filePath);
  if (outputErrors.length > 0) {
    throw new TransformError(`Instrumented ${filePath} does not parse: ${outputErrors.join('; ')}`, filePath);
  }

  return { code: instrumented, mutationCount };
}
