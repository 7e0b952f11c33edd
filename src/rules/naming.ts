import path from 'node:path';
import ts from 'typescript';
import {
  collect,
  containsJsx,
  findAttribute,
  isCustomComponentTag,
  isJsxNode,
  isJsxOpeningLike,
  jsxTagName,
  walk,
} from '../scanner';
import {
  componentClasses,
  isPascalCase,
  toCamelCase,
  toPascalCase,
  unwrapParens,
} from './helpers';
import type { RuleFinding, StyleRule } from './types';

const COMPONENT_EXTENSIONS = new Set(['.jsx', '.tsx']);

/** File base name without any extension: `Foo.test.tsx` -> `Foo`. */
function fileStem(file: string) {
  return path.basename(file).split('.')[0];
}

export const filenamePascalCase: StyleRule = {
  id: 'filename-pascal-case',
  category: 'naming',
  description: 'Use PascalCase for component file names.',
  defaultSeverity: 'error',
  check(source) {
    if (!COMPONENT_EXTENSIONS.has(path.extname(source.file).toLowerCase())) {
      return [];
    }
    const base = path.basename(source.file);
    const stem = fileStem(source.file);
    if (stem === 'index' || isPascalCase(stem)) return [];
    return [
      {
        pos: 0,
        message: `File name "${base}" should be PascalCase`,
        suggestion: `Rename to ${toPascalCase(stem)}${base.slice(stem.length)}`,
      },
    ];
  },
};

function defaultExportName(sf: ts.SourceFile): { name: string; node: ts.Node } | undefined {
  for (const stmt of sf.statements) {
    if (ts.isExportAssignment(stmt) && !stmt.isExportEquals) {
      const expr = unwrapParens(stmt.expression);
      if (ts.isIdentifier(expr)) return { name: expr.text, node: expr };
      if ((ts.isClassExpression(expr) || ts.isFunctionExpression(expr)) && expr.name) {
        return { name: expr.name.text, node: expr.name };
      }
      continue;
    }
    if (
      (ts.isClassDeclaration(stmt) || ts.isFunctionDeclaration(stmt)) &&
      stmt.name
    ) {
      const mods = ts.getModifiers(stmt) ?? [];
      const isDefault =
        mods.some((m) => m.kind === ts.SyntaxKind.ExportKeyword) &&
        mods.some((m) => m.kind === ts.SyntaxKind.DefaultKeyword);
      if (isDefault) return { name: stmt.name.text, node: stmt.name };
    }
  }
  return undefined;
}

export const componentNameMatchesFile: StyleRule = {
  id: 'component-name-matches-file',
  category: 'naming',
  description:
    'Use the file name as the component name; for index files use the directory name.',
  defaultSeverity: 'error',
  check(source) {
    const sf = source.sourceFile;
    if (!containsJsx(sf) && componentClasses(source).length === 0) return [];
    const exported = defaultExportName(sf);
    if (!exported) return [];

    const stem = fileStem(source.file);
    const base = stem === 'index' ? path.basename(path.dirname(source.file)) : stem;
    // `footer/index.jsx` and `reservation-card.jsx` name Footer and ReservationCard
    const expected = toPascalCase(base);
    if (!expected || exported.name === expected) return [];
    return [
      {
        node: exported.node,
        message: `Default export "${exported.name}" should be named "${expected}" after its ${
          stem === 'index' ? 'directory' : 'file'
        } "${base}"`,
        suggestion: `Rename the component to ${expected}`,
      },
    ];
  },
};

export const referenceNaming: StyleRule = {
  id: 'reference-naming',
  category: 'naming',
  description:
    'Use PascalCase for imported React components and camelCase for their instances.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];

    for (const stmt of source.sourceFile.statements) {
      if (!ts.isImportDeclaration(stmt)) continue;
      const local = stmt.importClause?.name;
      if (!local || !ts.isStringLiteral(stmt.moduleSpecifier)) continue;
      const spec = stmt.moduleSpecifier.text;
      if (!spec.startsWith('.')) continue;
      const moduleStem = fileStem(spec);
      if (!isPascalCase(moduleStem) || isPascalCase(local.text)) continue;
      findings.push({
        node: local,
        message: `Component import "${local.text}" should be PascalCase`,
        suggestion: `import ${moduleStem} from '${spec}';`,
      });
    }

    walk(source.sourceFile, (n) => {
      if (!ts.isVariableDeclaration(n) || !ts.isIdentifier(n.name) || !n.initializer) {
        return;
      }
      if (!isJsxNode(unwrapParens(n.initializer))) return;
      if (!/^[A-Z]/.test(n.name.text)) return;
      findings.push({
        node: n.name,
        message: `JSX instance "${n.name.text}" should be camelCase`,
        suggestion: `const ${toCamelCase(n.name.text)} = ...`,
      });
    });

    return findings;
  },
};

function assignsDisplayName(node: ts.Node): boolean {
  let found = false;
  walk(node, (n) => {
    if (
      ts.isBinaryExpression(n) &&
      n.operatorToken.kind === ts.SyntaxKind.EqualsToken &&
      ts.isPropertyAccessExpression(n.left) &&
      n.left.name.text === 'displayName'
    ) {
      found = true;
    }
    if (
      ts.isPropertyDeclaration(n) &&
      ts.isIdentifier(n.name) &&
      n.name.text === 'displayName'
    ) {
      found = true;
    }
  });
  return found;
}

export const hocDisplayName: StyleRule = {
  id: 'hoc-display-name',
  category: 'naming',
  description:
    "Set displayName on higher-order components to the HOC's name composed with the wrapped component's name.",
  defaultSeverity: 'warn',
  check(source) {
    const findings: RuleFinding[] = [];
    walk(source.sourceFile, (n) => {
      let name: ts.Identifier | undefined;
      let body: ts.Node | undefined;
      if (ts.isFunctionDeclaration(n) && n.name && n.body) {
        name = n.name;
        body = n.body;
      } else if (
        ts.isVariableDeclaration(n) &&
        ts.isIdentifier(n.name) &&
        n.initializer &&
        (ts.isArrowFunction(n.initializer) || ts.isFunctionExpression(n.initializer))
      ) {
        name = n.name;
        body = n.initializer.body;
      }
      if (!name || !body || !/^with[A-Z]/.test(name.text)) return;
      if (!containsJsx(body) || assignsDisplayName(body)) return;
      findings.push({
        node: name,
        message: `Higher-order component "${name.text}" does not set displayName on the component it returns`,
        suggestion: `Set WithX.displayName = \`${name.text}(\${wrappedName})\``,
      });
    });
    return findings;
  },
};

export const noDomPropMisuse: StyleRule = {
  id: 'no-dom-prop-misuse',
  category: 'naming',
  description:
    'Avoid using DOM component prop names for different purposes, such as a string style prop on a custom component.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const el of collect(source.sourceFile, isJsxOpeningLike)) {
      if (!isCustomComponentTag(el)) continue;
      const style = findAttribute(el, 'style');
      const init = style?.initializer;
      if (!style || !init) continue;
      const isString =
        ts.isStringLiteral(init) ||
        (ts.isJsxExpression(init) &&
          init.expression !== undefined &&
          (ts.isStringLiteral(init.expression) ||
            ts.isNoSubstitutionTemplateLiteral(init.expression)));
      if (!isString) continue;
      findings.push({
        node: style,
        message: `<${jsxTagName(el)}> uses the DOM prop "style" for a string value`,
        suggestion: 'Use a distinct prop name, such as variant',
      });
    }
    return findings;
  },
};

export const namingRules: StyleRule[] = [
  filenamePascalCase,
  componentNameMatchesFile,
  referenceNaming,
  hocDisplayName,
  noDomPropMisuse,
];
