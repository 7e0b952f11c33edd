import ts from 'typescript';
import { createClassSpec, isStaticMember, objectHasProperty } from '../scanner';
import {
  componentClasses,
  componentName,
  createClassCalls,
  memberName,
  thisAccesses,
} from './helpers';
import type { RuleFinding, StyleRule } from './types';

export const noDisplayName: StyleRule = {
  id: 'no-display-name',
  category: 'declaration',
  description:
    'Do not use displayName for naming components; name the component by reference.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const call of createClassCalls(source)) {
      const spec = createClassSpec(call);
      const prop = spec && objectHasProperty(spec, 'displayName');
      if (!prop) continue;
      findings.push({
        node: prop,
        message: 'displayName is used to name the component',
        suggestion: 'Name the component by reference: class ReservationCard extends React.Component',
      });
    }
    return findings;
  },
};

export const preferEs6Class: StyleRule = {
  id: 'prefer-es6-class',
  category: 'declaration',
  description:
    'Prefer class extends React.Component over createReactClass unless you have a very good reason to use mixins.',
  defaultSeverity: 'error',
  check(source) {
    return createClassCalls(source)
      .filter((call) => {
        const spec = createClassSpec(call);
        return !spec || !objectHasProperty(spec, 'mixins');
      })
      .map((call) => ({
        node: call.expression,
        message: `Component "${componentName(call)}" is declared with ${call.expression.getText()}`,
        suggestion: `class ${componentName(call)} extends React.Component`,
      }));
  },
};

export const noMixins: StyleRule = {
  id: 'no-mixins',
  category: 'declaration',
  description:
    'Do not use mixins; they introduce implicit dependencies, cause name clashes, and cause snowballing complexity.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const call of createClassCalls(source)) {
      const spec = createClassSpec(call);
      const prop = spec && objectHasProperty(spec, 'mixins');
      if (!prop) continue;
      findings.push({
        node: prop,
        message: `Component "${componentName(call)}" uses mixins`,
        suggestion: 'Use components, higher-order components, or utility modules instead',
      });
    }
    return findings;
  },
};

export const preferStatelessFunction: StyleRule = {
  id: 'prefer-stateless-function',
  category: 'declaration',
  description:
    'If a component has no state or refs, prefer a normal function over a class.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const cls of componentClasses(source)) {
      const base = cls.heritageClauses?.[0]?.types[0]?.expression.getText() ?? '';
      if (base.endsWith('PureComponent')) continue;

      let hasRender = false;
      let onlyRender = true;
      for (const member of cls.members) {
        if (isStaticMember(member) || ts.isSemicolonClassElement(member)) continue;
        if (memberName(member) === 'render') {
          hasRender = true;
          continue;
        }
        onlyRender = false;
      }
      if (!hasRender || !onlyRender) continue;
      if (thisAccesses(cls, 'state').length || thisAccesses(cls, 'refs').length) {
        continue;
      }
      findings.push({
        node: cls.name ?? cls,
        message: `Component "${componentName(cls)}" has no state or refs and should be a function`,
        suggestion: `function ${componentName(cls)}(props) { ... }`,
      });
    }
    return findings;
  },
};

export const oneComponentPerFile: StyleRule = {
  id: 'one-component-per-file',
  category: 'declaration',
  description:
    'Only include one React component per file; multiple stateless components are allowed.',
  defaultSeverity: 'error',
  check(source) {
    const stateful: Array<ts.ClassDeclaration | ts.ClassExpression | ts.CallExpression> = [
      ...componentClasses(source),
      ...createClassCalls(source),
    ].sort((a, b) => a.getStart() - b.getStart());
    if (stateful.length < 2) return [];

    const first = componentName(stateful[0]);
    return stateful.slice(1).map((node) => ({
      node: ts.isCallExpression(node) ? node.expression : node.name ?? node,
      message: `Component "${componentName(node)}" is declared in the same file as "${first}"`,
      suggestion: `Move "${componentName(node)}" into its own file`,
    }));
  },
};

export const declarationRules: StyleRule[] = [
  noDisplayName,
  preferEs6Class,
  noMixins,
  preferStatelessFunction,
  oneComponentPerFile,
];
