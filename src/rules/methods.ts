import ts from 'typescript';
import { attributeName, walk, type ScannedSource } from '../scanner';
import {
  componentClasses,
  componentMembers,
  componentName,
  createClassCalls,
  returnsValue,
  unwrapParens,
  type ComponentMember,
} from './helpers';
import type { RuleFinding, StyleRule } from './types';

function allComponents(source: ScannedSource) {
  return [...componentClasses(source), ...createClassCalls(source)];
}

/** The function a member defines, whether a method or a function-valued field. */
function memberFunction(
  member: ComponentMember
): ts.FunctionLikeDeclaration | undefined {
  const node = member.node;
  if (ts.isMethodDeclaration(node)) return node;
  const init =
    ts.isPropertyDeclaration(node) || ts.isPropertyAssignment(node)
      ? node.initializer
      : undefined;
  if (!init) return undefined;
  const fn = unwrapParens(init);
  return ts.isArrowFunction(fn) || ts.isFunctionExpression(fn) ? fn : undefined;
}

export const jsxNoBind: StyleRule = {
  id: 'jsx-no-bind',
  category: 'methods',
  description:
    'Bind event handlers for the render method in the constructor; arrow functions that close over local variables are fine.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    walk(source.sourceFile, (n) => {
      if (!ts.isJsxAttribute(n) || attributeName(n) === 'ref') return;
      const init = n.initializer;
      if (!init || !ts.isJsxExpression(init) || !init.expression) return;
      const expr = unwrapParens(init.expression);
      const isBind =
        ts.isCallExpression(expr) &&
        ts.isPropertyAccessExpression(expr.expression) &&
        expr.expression.name.text === 'bind';
      if (!isBind && !ts.isFunctionExpression(expr)) return;
      findings.push({
        node: init,
        message: isBind
          ? `"${attributeName(n)}" calls .bind() in render`
          : `"${attributeName(n)}" creates a function expression in render`,
        suggestion: 'Bind the handler in the constructor: this.onClick = this.onClick.bind(this);',
      });
    });
    return findings;
  },
};

export const noUnderscoreMethods: StyleRule = {
  id: 'no-underscore-methods',
  category: 'methods',
  description: 'Do not use underscore prefix for internal methods of a React component.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const component of allComponents(source)) {
      for (const member of componentMembers(component)) {
        if (!member.name?.startsWith('_') || !memberFunction(member)) continue;
        findings.push({
          node: member.node.name ?? member.node,
          message: `Method "${member.name}" of ${componentName(component)} uses an underscore prefix`,
          suggestion: member.name.replace(/^_+/, ''),
        });
      }
    }
    return findings;
  },
};

export const requireRenderReturn: StyleRule = {
  id: 'require-render-return',
  category: 'methods',
  description: 'Be sure to return a value in your render methods.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const component of allComponents(source)) {
      const render = componentMembers(component).find((m) => m.name === 'render');
      const fn = render && memberFunction(render);
      if (!render || !fn || !fn.body || returnsValue(fn.body)) continue;
      findings.push({
        node: render.node.name ?? render.node,
        message: `render() of ${componentName(component)} does not return a value`,
        suggestion: 'return (<div />);',
      });
    }
    return findings;
  },
};

export const noIsMounted: StyleRule = {
  id: 'no-is-mounted',
  category: 'methods',
  description: 'Do not use isMounted; it is an anti-pattern and unavailable in ES6 classes.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    walk(source.sourceFile, (n) => {
      if (
        ts.isCallExpression(n) &&
        ts.isPropertyAccessExpression(n.expression) &&
        n.expression.expression.kind === ts.SyntaxKind.ThisKeyword &&
        n.expression.name.text === 'isMounted'
      ) {
        findings.push({
          node: n,
          message: 'this.isMounted() is an anti-pattern',
          suggestion: 'Track subscriptions and cancel them in componentWillUnmount',
        });
      }
    });
    return findings;
  },
};

export const methodRules: StyleRule[] = [
  jsxNoBind,
  noUnderscoreMethods,
  requireRenderReturn,
  noIsMounted,
];
