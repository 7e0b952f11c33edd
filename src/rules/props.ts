import ts from 'typescript';
import ariaRoles from './aria-roles.json';
import {
  attributeName,
  attributeStringValue,
  collect,
  findAttribute,
  hasSpreadAttribute,
  isJsxNode,
  isJsxOpeningLike,
  isStaticMember,
  jsxTagName,
  propertyNameText,
  walk,
  type ScannedSource,
} from '../scanner';
import {
  componentClasses,
  isCamelCase,
  isPascalCase,
  toCamelCase,
  topLevelObjects,
  unwrapParens,
} from './helpers';
import type { RuleFinding, StyleRule } from './types';

const VALID_ROLES = new Set<string>(ariaRoles);

export const propNameCamelCase: StyleRule = {
  id: 'prop-name-camel-case',
  category: 'props',
  description:
    'Always use camelCase for prop names, or PascalCase if the prop value is a React component.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    walk(source.sourceFile, (n) => {
      if (!ts.isJsxAttribute(n) || !ts.isIdentifier(n.name)) return;
      const name = attributeName(n);
      if (/^(data|aria)-/.test(name) || isCamelCase(name)) return;
      if (isPascalCase(name) && holdsComponent(n)) return;
      findings.push({
        node: n.name,
        message: `Prop name "${name}" should be camelCase`,
        suggestion: toCamelCase(name),
      });
    });
    return findings;
  },
};

function holdsComponent(attr: ts.JsxAttribute): boolean {
  const init = attr.initializer;
  if (!init || !ts.isJsxExpression(init) || !init.expression) return false;
  const expr = unwrapParens(init.expression);
  if (isJsxNode(expr)) return true;
  const text = ts.isIdentifier(expr)
    ? expr.text
    : ts.isPropertyAccessExpression(expr)
      ? expr.name.text
      : '';
  return isPascalCase(text);
}

export const jsxBooleanValue: StyleRule = {
  id: 'jsx-boolean-value',
  category: 'props',
  description: 'Omit the value of the prop when it is explicitly true.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    walk(source.sourceFile, (n) => {
      if (!ts.isJsxAttribute(n) || !n.initializer) return;
      const init = n.initializer;
      if (!ts.isJsxExpression(init) || !init.expression) return;
      if (unwrapParens(init.expression).kind !== ts.SyntaxKind.TrueKeyword) return;
      findings.push({
        node: n,
        message: `Value of "${attributeName(n)}" is explicitly true and should be omitted`,
        suggestion: attributeName(n),
      });
    });
    return findings;
  },
};

function imgElements(source: ScannedSource) {
  return collect(source.sourceFile, isJsxOpeningLike).filter(
    (el) => jsxTagName(el) === 'img'
  );
}

export const imgHasAlt: StyleRule = {
  id: 'img-has-alt',
  category: 'accessibility',
  description:
    'Always include an alt prop on <img> tags; if the image is presentational, alt can be an empty string or the <img> must have role="presentation".',
  defaultSeverity: 'error',
  check(source) {
    return imgElements(source)
      .filter((el) => {
        if (hasSpreadAttribute(el) || findAttribute(el, 'alt')) return false;
        const role = findAttribute(el, 'role');
        const value = role && attributeStringValue(role);
        return value !== 'presentation' && value !== 'none';
      })
      .map((el) => ({
        node: el,
        message: '<img> elements must have an alt prop',
        suggestion: '<img src="..." alt="Description of the image" />',
      }));
  },
};

const REDUNDANT_WORDS = /\b(image|photo|picture)\b/i;

function isAriaHidden(el: ts.JsxOpeningLikeElement): boolean {
  const attr = findAttribute(el, 'aria-hidden');
  if (!attr) return false;
  const init = attr.initializer;
  if (!init) return true;
  if (ts.isStringLiteral(init)) return init.text === 'true';
  return (
    ts.isJsxExpression(init) &&
    init.expression !== undefined &&
    init.expression.kind === ts.SyntaxKind.TrueKeyword
  );
}

export const imgRedundantAlt: StyleRule = {
  id: 'img-redundant-alt',
  category: 'accessibility',
  description:
    'Do not use words like "image", "photo", or "picture" in <img> alt props.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const el of imgElements(source)) {
      const alt = findAttribute(el, 'alt');
      const value = alt && attributeStringValue(alt);
      if (!alt || value === undefined || isAriaHidden(el)) continue;
      const match = REDUNDANT_WORDS.exec(value);
      if (!match) continue;
      findings.push({
        node: alt,
        message: `Redundant word "${match[1]}" in <img> alt text`,
        suggestion: 'Screen readers already announce img elements as images',
      });
    }
    return findings;
  },
};

export const ariaRole: StyleRule = {
  id: 'aria-role',
  category: 'accessibility',
  description: 'Use only valid, non-abstract ARIA roles.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const el of collect(source.sourceFile, isJsxOpeningLike)) {
      const role = findAttribute(el, 'role');
      const value = role && attributeStringValue(role);
      if (!role || value === undefined) continue;
      const tokens = value.split(/\s+/).filter(Boolean);
      const invalid = tokens.filter((t) => !VALID_ROLES.has(t.toLowerCase()));
      if (tokens.length && invalid.length === 0) continue;
      findings.push({
        node: role,
        message: tokens.length
          ? `Invalid ARIA role "${invalid.join(' ')}"`
          : 'Empty ARIA role',
      });
    }
    return findings;
  },
};

export const noAccessKey: StyleRule = {
  id: 'no-access-key',
  category: 'accessibility',
  description:
    'Do not use accessKey on elements; inconsistencies between keyboard shortcuts and keyboard commands complicate accessibility.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    walk(source.sourceFile, (n) => {
      if (!ts.isJsxAttribute(n) || attributeName(n) !== 'accessKey') return;
      findings.push({ node: n, message: 'accessKey prop is not allowed' });
    });
    return findings;
  },
};

const ITERATION_METHODS = new Set([
  'map',
  'forEach',
  'filter',
  'some',
  'every',
  'find',
  'findIndex',
  'flatMap',
  'from',
  'reduce',
  'reduceRight',
]);

/** Name of the index parameter when `fn` is an array-iteration callback. */
function indexParamName(fn: ts.ArrowFunction | ts.FunctionExpression) {
  const call = fn.parent;
  if (!ts.isCallExpression(call) || !call.arguments.some((a) => a === fn)) return undefined;
  if (!ts.isPropertyAccessExpression(call.expression)) return undefined;
  const method = call.expression.name.text;
  if (!ITERATION_METHODS.has(method)) return undefined;
  const position = method === 'reduce' || method === 'reduceRight' ? 2 : 1;
  const param = fn.parameters[position];
  return param && ts.isIdentifier(param.name) ? param.name.text : undefined;
}

function referencedIdentifiers(expr: ts.Node): Set<string> {
  const names = new Set<string>();
  walk(expr, (n) => {
    if (!ts.isIdentifier(n)) return;
    const parent = n.parent;
    if (ts.isPropertyAccessExpression(parent) && parent.name === n) return;
    names.add(n.text);
  });
  return names;
}

export const noArrayIndexKey: StyleRule = {
  id: 'no-array-index-key',
  category: 'props',
  description: 'Avoid using an array index as key prop; prefer a stable ID.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    walk(source.sourceFile, (n) => {
      if (!ts.isJsxAttribute(n) || attributeName(n) !== 'key') return;
      const init = n.initializer;
      if (!init || !ts.isJsxExpression(init) || !init.expression) return;
      const used = referencedIdentifiers(init.expression);

      for (let p: ts.Node | undefined = n.parent; p; p = p.parent) {
        if (!ts.isArrowFunction(p) && !ts.isFunctionExpression(p)) continue;
        const index = indexParamName(p);
        if (index && used.has(index)) {
          findings.push({
            node: init,
            message: `Array index "${index}" used as key`,
            suggestion: 'key={item.id}',
          });
          return;
        }
      }
    });
    return findings;
  },
};

type PropsObjects = {
  propTypes?: ts.ObjectLiteralExpression;
  defaultKeys?: Set<string>;
  defaultsUnknown: boolean;
};

function resolveObject(
  expr: ts.Expression | undefined,
  locals: Map<string, ts.ObjectLiteralExpression>
): ts.ObjectLiteralExpression | undefined {
  if (!expr) return undefined;
  const e = unwrapParens(expr);
  if (ts.isObjectLiteralExpression(e)) return e;
  if (ts.isIdentifier(e)) return locals.get(e.text);
  return undefined;
}

function objectKeys(obj: ts.ObjectLiteralExpression): Set<string> | undefined {
  const keys = new Set<string>();
  for (const p of obj.properties) {
    // spread defaults cannot be resolved syntactically
    if (ts.isSpreadAssignment(p)) return undefined;
    const key = p.name && propertyNameText(p.name);
    if (key !== undefined) keys.add(key);
  }
  return keys;
}

function collectPropsObjects(source: ScannedSource): Map<string, PropsObjects> {
  const locals = topLevelObjects(source);
  const byComponent = new Map<string, PropsObjects>();
  const entry = (name: string) => {
    let e = byComponent.get(name);
    if (!e) {
      e = { defaultsUnknown: false };
      byComponent.set(name, e);
    }
    return e;
  };
  const record = (component: string, prop: string, value: ts.Expression | undefined) => {
    if (prop === 'propTypes') {
      const obj = resolveObject(value, locals);
      if (obj) entry(component).propTypes = obj;
    } else if (prop === 'defaultProps') {
      const obj = resolveObject(value, locals);
      const keys = obj && objectKeys(obj);
      if (keys) entry(component).defaultKeys = keys;
      else entry(component).defaultsUnknown = true;
    }
  };

  walk(source.sourceFile, (n) => {
    if (
      ts.isBinaryExpression(n) &&
      n.operatorToken.kind === ts.SyntaxKind.EqualsToken &&
      ts.isPropertyAccessExpression(n.left) &&
      ts.isIdentifier(n.left.expression)
    ) {
      record(n.left.expression.text, n.left.name.text, n.right);
    }
  });

  for (const cls of componentClasses(source)) {
    if (!cls.name) continue;
    for (const member of cls.members) {
      if (!ts.isPropertyDeclaration(member) || !isStaticMember(member)) continue;
      const name = propertyNameText(member.name);
      if (name) record(cls.name.text, name, member.initializer);
    }
  }
  return byComponent;
}

export const requireDefaultProps: StyleRule = {
  id: 'require-default-props',
  category: 'props',
  description: 'Always define explicit defaultProps for all non-required props.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const [component, objs] of collectPropsObjects(source)) {
      if (!objs.propTypes || objs.defaultsUnknown) continue;
      const defaults = objs.defaultKeys ?? new Set<string>();
      for (const prop of objs.propTypes.properties) {
        if (!ts.isPropertyAssignment(prop)) continue;
        const key = propertyNameText(prop.name);
        if (key === undefined || defaults.has(key)) continue;
        if (/\.isRequired$/.test(prop.initializer.getText())) continue;
        findings.push({
          node: prop,
          message: `propType "${key}" of ${component} is not required, but has no corresponding defaultProps entry`,
          suggestion: `${component}.defaultProps = { ${key}: ... }`,
        });
      }
    }
    return findings;
  },
};

export const noStringRefs: StyleRule = {
  id: 'no-string-refs',
  category: 'refs',
  description: 'Always use ref callbacks instead of string refs.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    walk(source.sourceFile, (n) => {
      if (ts.isJsxAttribute(n) && attributeName(n) === 'ref') {
        const value = attributeStringValue(n);
        if (value === undefined) return;
        findings.push({
          node: n,
          message: `String ref "${value}" is not allowed`,
          suggestion: `ref={(ref) => { this.${toCamelCase(value) || 'node'} = ref; }}`,
        });
        return;
      }
      if (
        ts.isPropertyAccessExpression(n) &&
        n.expression.kind === ts.SyntaxKind.ThisKeyword &&
        n.name.text === 'refs'
      ) {
        findings.push({
          node: n,
          message: 'this.refs reads string refs',
          suggestion: 'Use a ref callback and read the stored node instead',
        });
      }
    });
    return findings;
  },
};

export const propsRules: StyleRule[] = [
  propNameCamelCase,
  jsxBooleanValue,
  imgHasAlt,
  imgRedundantAlt,
  ariaRole,
  noAccessKey,
  noArrayIndexKey,
  requireDefaultProps,
  noStringRefs,
];
