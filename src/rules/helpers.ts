import ts from 'typescript';
import {
  collect,
  createClassSpec,
  isComponentClass,
  isCreateClassCall,
  isFunctionLike,
  walk,
  type ScannedSource,
} from '../scanner';

export function unwrapParens(expr: ts.Expression): ts.Expression {
  let e = expr;
  while (ts.isParenthesizedExpression(e)) e = e.expression;
  return e;
}

function words(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[^A-Za-z0-9]+/)
    .filter(Boolean);
}

export function toPascalCase(name: string): string {
  return words(name)
    .map((w) => w[0].toUpperCase() + w.slice(1))
    .join('');
}

export function toCamelCase(name: string): string {
  const pascal = toPascalCase(name);
  return pascal ? pascal[0].toLowerCase() + pascal.slice(1) : pascal;
}

export const isPascalCase = (name: string) => /^[A-Z][A-Za-z0-9]*$/.test(name);

export const isCamelCase = (name: string) => /^[a-z][A-Za-z0-9]*$/.test(name);

export type ComponentClass = ts.ClassDeclaration | ts.ClassExpression;

export function componentClasses(source: ScannedSource): ComponentClass[] {
  return collect(source.sourceFile, isComponentClass);
}

export function createClassCalls(source: ScannedSource): ts.CallExpression[] {
  return collect(source.sourceFile, isCreateClassCall);
}

/** Name of a class component, falling back to the variable it is bound to. */
export function componentName(node: ComponentClass | ts.CallExpression) {
  if (!ts.isCallExpression(node) && node.name) return node.name.text;
  const parent = node.parent;
  if (parent && ts.isVariableDeclaration(parent) && ts.isIdentifier(parent.name)) {
    return parent.name.text;
  }
  return 'anonymous';
}

/**
 * Members of a component, whether declared as a class or as a
 * createReactClass spec object.
 */
export type ComponentMember = {
  node: ts.ClassElement | ts.ObjectLiteralElementLike;
  name: string | undefined;
};

export function componentMembers(
  node: ComponentClass | ts.CallExpression
): ComponentMember[] {
  if (ts.isCallExpression(node)) {
    const spec = createClassSpec(node);
    if (!spec) return [];
    return spec.properties.map((p) => ({ node: p, name: memberName(p) }));
  }
  return node.members.map((m) => ({ node: m, name: memberName(m) }));
}

export function memberName(
  member: ts.ClassElement | ts.ObjectLiteralElementLike
): string | undefined {
  const name = member.name;
  if (!name) return undefined;
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isPrivateIdentifier(name)) {
    return name.text;
  }
  return undefined;
}

/** True when the function-like body returns a value, ignoring nested functions. */
export function returnsValue(body: ts.ConciseBody): boolean {
  if (!ts.isBlock(body)) return true;
  let found = false;
  const visit = (n: ts.Node) => {
    if (found) return;
    if (n !== body && isFunctionLike(n)) return;
    if (ts.isClassLike(n)) return;
    if (ts.isReturnStatement(n) && n.expression) {
      found = true;
      return;
    }
    ts.forEachChild(n, visit);
  };
  visit(body);
  return found;
}

/** `this.<name>` property accesses anywhere under the node. */
export function thisAccesses(node: ts.Node, name: string): ts.PropertyAccessExpression[] {
  const out: ts.PropertyAccessExpression[] = [];
  walk(node, (n) => {
    if (
      ts.isPropertyAccessExpression(n) &&
      n.expression.kind === ts.SyntaxKind.ThisKeyword &&
      n.name.text === name
    ) {
      out.push(n);
    }
  });
  return out;
}

/** Top-level `const name = { ... }` declarations, keyed by name. */
export function topLevelObjects(
  source: ScannedSource
): Map<string, ts.ObjectLiteralExpression> {
  const out = new Map<string, ts.ObjectLiteralExpression>();
  for (const stmt of source.sourceFile.statements) {
    if (!ts.isVariableStatement(stmt)) continue;
    for (const decl of stmt.declarationList.declarations) {
      if (!ts.isIdentifier(decl.name) || !decl.initializer) continue;
      const obj = unwrapParens(decl.initializer);
      if (ts.isObjectLiteralExpression(obj)) out.set(decl.name.text, obj);
    }
  }
  return out;
}
