import ts from 'typescript';
import type { MutationMetadata } from '../mutation/schemas.js';
import type { MutationRegistry } from '../registry/registry.js';
import { TransformError } from './errors.js';
import { functionScopeName, MODULE_SCOPE } from './function-name.js';
import { matchOperator, type OperatorMatch } from './operator-match.js';

export const RUNTIME_IDENTIFIER = '__mutswitch';

export interface TransformContext {
  readonly sourceFile: ts.SourceFile;
  /** Path recorded in each mutation's location. */
  readonly filePath: string;
  readonly registry: MutationRegistry;
  /** Enabled family names; every known family when undefined. */
  readonly families?: ReadonlySet<string>;
  readonly runtimeIdentifier: string;
  readonly factory: ts.NodeFactory;
  readonly transformation: ts.TransformationContext;
  readonly fnName: string;
}

function isAmbient(node: ts.Node): boolean {
  return (
    ts.canHaveModifiers(node) &&
    (ts.getModifiers(node)?.some((m) => m.kind === ts.SyntaxKind.DeclareKeyword) ?? false)
  );
}

/** True when an operand suspends (await/yield) and so cannot move into a thunk. */
function suspends(node: ts.Node): boolean {
  if (ts.isAwaitExpression(node) || ts.isYieldExpression(node)) return true;
  if (ts.isFunctionLike(node) || ts.isClassLike(node)) return false;
  return ts.forEachChild(node, suspends) ?? false;
}

function buildMetadata(
  node: ts.BinaryExpression,
  match: OperatorMatch,
  candidates: readonly string[],
  context: TransformContext,
): MutationMetadata[] {
  const { family, op } = match;
  const position = node.operatorToken.getStart(context.sourceFile);
  const { line, character } = context.sourceFile.getLineAndCharacterOfPosition(position);
  return candidates.map((candidate) => ({
    fnName: context.fnName,
    family: family.name,
    original: family.render(op),
    mutant: family.render(candidate),
    location: { file: context.filePath, line: line + 1, column: character + 1 },
  }));
}

function thunk(factory: ts.NodeFactory, expression: ts.Expression): ts.ArrowFunction {
  return factory.createArrowFunction(
    undefined,
    undefined,
    [],
    undefined,
    factory.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
    expression,
  );
}

function rewriteSite(node: ts.BinaryExpression, match: OperatorMatch, context: TransformContext): ts.Expression {
  const { family, op } = match;
  const candidates = family.candidates(op);
  if (candidates.length === 0) {
    return ts.visitEachChild(node, (child) => transform(child, context), context.transformation);
  }
  if (candidates.includes(op) || candidates.length !== family.variants.length - 1) {
    throw new TransformError(
      `Family ${family.name} returned invalid candidates for ${op}: [${candidates.join(', ')}]`,
      context.filePath,
    );
  }

  const records = buildMetadata(node, match, candidates, context);
  if (records.length !== candidates.length) {
    throw new TransformError(
      `Family ${family.name} produced ${records.length} records for ${candidates.length} candidates`,
      context.filePath,
      records[0]?.location.line,
    );
  }
  const baseId = context.registry.register(records);

  // Registered before the operands so ids follow source order.
  const left = ts.visitNode(node.left, (child) => transform(child, context), ts.isExpression);
  const right = ts.visitNode(node.right, (child) => transform(child, context), ts.isExpression);
  const f = context.factory;

  return f.createCallExpression(
    f.createPropertyAccessExpression(f.createIdentifier(context.runtimeIdentifier), 'decide'),
    undefined,
    [f.createNumericLiteral(baseId), thunk(f, left), thunk(f, right), f.createStringLiteral(op), f.createStringLiteral(family.name)],
  );
}

/**
 * Rewrites every mutable operator inside `node` into a runtime dispatch
 * call. Nodes without a site are returned as they are.
 */
export function transform(node: ts.Node, context: TransformContext): ts.Node {
  if (ts.isTypeNode(node) || ts.isEnumDeclaration(node) || ts.isDecorator(node) || isAmbient(node)) {
    return node;
  }

  const scopeName = functionScopeName(node);
  if (scopeName !== undefined) {
    const inner: TransformContext = { ...context, fnName: scopeName };
    return ts.visitEachChild(node, (child) => transform(child, inner), context.transformation);
  }

  if (ts.isBinaryExpression(node)) {
    const match = matchOperator(node.operatorToken.kind);
    if (
      match &&
      (context.families === undefined || context.families.has(match.family.name)) &&
      !suspends(node.left) &&
      !suspends(node.right)
    ) {
      return rewriteSite(node, match, context);
    }
  }

  return ts.visitEachChild(node, (child) => transform(child, context), context.transformation);
}

export interface TransformerOptions {
  filePath: string;
  registry: MutationRegistry;
  families?: readonly string[];
  runtimeIdentifier?: string;
}

export function createMutationTransformer(options: TransformerOptions): ts.TransformerFactory<ts.SourceFile> {
  const families = options.families ? new Set(options.families) : undefined;
  return (transformation) => (sourceFile) => {
    const context: TransformContext = {
      sourceFile,
      filePath: options.filePath,
      registry: options.registry,
      families,
      runtimeIdentifier: options.runtimeIdentifier ?? RUNTIME_IDENTIFIER,
      factory: transformation.factory,
      transformation,
      fnName: MODULE_SCOPE,
    };
    return ts.visitEachChild(sourceFile, (child) => transform(child, context), transformation);
  };
}
