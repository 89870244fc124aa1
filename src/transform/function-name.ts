import ts from 'typescript';

export const MODULE_SCOPE = '<module>';
export const ANONYMOUS = '<anonymous>';

function propertyNameText(name: ts.PropertyName): string {
  if (ts.isComputedPropertyName(name)) return '[computed]';
  return name.text;
}

function className(node: ts.ClassLikeDeclaration): string {
  if (node.name) return node.name.text;
  if (ts.isClassExpression(node)) return nameFromParent(node) ?? ANONYMOUS;
  return ANONYMOUS;
}

function memberName(member: ts.ClassElement | ts.ObjectLiteralElement, name: string): string {
  const owner = member.parent;
  return ts.isClassLike(owner) ? `${className(owner)}.${name}` : name;
}

/** Name of the binding an anonymous function or class is assigned to. */
function nameFromParent(node: ts.Expression): string | undefined {
  const parent = node.parent;
  if (!parent) return undefined;
  if (ts.isVariableDeclaration(parent) && ts.isIdentifier(parent.name)) {
    return parent.name.text;
  }
  if (ts.isPropertyAssignment(parent) || ts.isPropertyDeclaration(parent)) {
    return memberName(parent, propertyNameText(parent.name));
  }
  if (ts.isParenthesizedExpression(parent)) {
    return nameFromParent(parent);
  }
  return undefined;
}

/**
 * Returns the name reported for code inside `node` when `node` starts a new
 * function scope, or undefined when it does not.
 */
export function functionScopeName(node: ts.Node): string | undefined {
  if (ts.isFunctionDeclaration(node)) {
    return node.name?.text ?? ANONYMOUS;
  }
  if (ts.isFunctionExpression(node)) {
    return node.name?.text ?? nameFromParent(node) ?? ANONYMOUS;
  }
  if (ts.isArrowFunction(node)) {
    return nameFromParent(node) ?? ANONYMOUS;
  }
  if (ts.isMethodDeclaration(node) || ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node)) {
    return memberName(node, propertyNameText(node.name));
  }
  if (ts.isPropertyDeclaration(node) && node.initializer) {
    return memberName(node, propertyNameText(node.name));
  }
  if (ts.isConstructorDeclaration(node)) {
    return `${className(node.parent)}.constructor`;
  }
  if (ts.isClassStaticBlockDeclaration(node)) {
    return `${className(node.parent)}.static`;
  }
  return undefined;
}
