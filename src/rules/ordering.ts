import ts from 'typescript';
import { isStaticMember } from '../scanner';
import {
  componentClasses,
  componentMembers,
  componentName,
  createClassCalls,
  type ComponentMember,
} from './helpers';
import type { RuleFinding, StyleRule } from './types';

const LIFECYCLE = [
  'getChildContext',
  'componentWillMount',
  'componentDidMount',
  'componentWillReceiveProps',
  'shouldComponentUpdate',
  'componentWillUpdate',
  'getSnapshotBeforeUpdate',
  'componentDidUpdate',
  'componentDidCatch',
  'componentWillUnmount',
];

// rank layout: 0 static, 1 constructor/fields, 2..11 lifecycle, then the rest
const HANDLER_RANK = 2 + LIFECYCLE.length;
const GETTER_RANK = HANDLER_RANK + 1;
const OTHER_RANK = GETTER_RANK + 1;
const RENDER_HELPER_RANK = OTHER_RANK + 1;
const RENDER_RANK = RENDER_HELPER_RANK + 1;

// createReactClass specs declare these as plain keys rather than statics
const SPEC_STATICS = new Set([
  'displayName',
  'propTypes',
  'contextTypes',
  'childContextTypes',
  'mixins',
  'statics',
  'defaultProps',
  'getDefaultProps',
  'getInitialState',
]);

type Ranked = { member: ComponentMember; rank: number; group: string };

function isFunctionValued(node: ts.Node): boolean {
  if (ts.isMethodDeclaration(node)) return true;
  if (ts.isPropertyDeclaration(node) || ts.isPropertyAssignment(node)) {
    const init = node.initializer;
    return !!init && (ts.isArrowFunction(init) || ts.isFunctionExpression(init));
  }
  return false;
}

function rankMember(member: ComponentMember): Ranked | undefined {
  const { node, name } = member;
  if (ts.isSemicolonClassElement(node) || ts.isIndexSignatureDeclaration(node)) {
    return undefined;
  }
  if ((ts.isClassElement(node) && isStaticMember(node)) || (name && SPEC_STATICS.has(name))) {
    return { member, rank: 0, group: 'static members' };
  }
  if (ts.isConstructorDeclaration(node)) {
    return { member, rank: 1, group: 'constructor' };
  }
  if (!isFunctionValued(node) && !ts.isAccessor(node)) {
    return { member, rank: 1, group: 'instance fields' };
  }
  if (name === undefined) return { member, rank: OTHER_RANK, group: 'other methods' };

  const lifecycleName = name.replace(/^UNSAFE_/, '');
  const lifecycle = LIFECYCLE.indexOf(lifecycleName);
  if (lifecycle >= 0) return { member, rank: 2 + lifecycle, group: 'lifecycle methods' };

  if (name === 'render') return { member, rank: RENDER_RANK, group: 'render' };
  if (/^render.+$/.test(name)) {
    return { member, rank: RENDER_HELPER_RANK, group: 'render helpers' };
  }
  if (/^(handle|on)[A-Z]/.test(name)) {
    return { member, rank: HANDLER_RANK, group: 'event handlers' };
  }
  if (ts.isAccessor(node) || /^(get|set)[A-Z]/.test(name)) {
    return { member, rank: GETTER_RANK, group: 'getters' };
  }
  return { member, rank: OTHER_RANK, group: 'other methods' };
}

export const sortComp: StyleRule = {
  id: 'sort-comp',
  category: 'ordering',
  description:
    'Order component members: static, constructor, lifecycle, event handlers, getters, other methods, render helpers, render.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    const components = [...componentClasses(source), ...createClassCalls(source)];
    for (const component of components) {
      let highest: Ranked | undefined;
      for (const member of componentMembers(component)) {
        const ranked = rankMember(member);
        if (!ranked) continue;
        if (highest && ranked.rank < highest.rank) {
          const label = member.name ?? 'member';
          findings.push({
            node: member.node.name ?? member.node,
            message: `${label} (${ranked.group}) should be placed before ${
              highest.member.name ?? 'member'
            } (${highest.group}) in ${componentName(component)}`,
          });
          continue;
        }
        highest = ranked;
      }
    }
    return findings;
  },
};

export const orderingRules: StyleRule[] = [sortComp];
