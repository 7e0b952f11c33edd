// src/scanner.ts
import path from 'node:path';
import ts from 'typescript';
import { ErrorCode, ScanError } from './errors';

export const SOURCE_EXTENSIONS = ['.js', '.jsx', '.ts', '.tsx'];
export const MARKDOWN_EXTENSIONS = ['.md', '.markdown'];

export type ScannedSource = {
  file: string;
  text: string;
  sourceFile: ts.SourceFile;
  lines: string[];
};

export type JsxOpeningLike = ts.JsxOpeningElement | ts.JsxSelfClosingElement;

export type JsxNode = ts.JsxElement | ts.JsxSelfClosingElement | ts.JsxFragment;

function scriptKindFor(file: string): ts.ScriptKind {
  switch (path.extname(file).toLowerCase()) {
    case '.ts':
      return ts.ScriptKind.TS;
    case '.tsx':
      return ts.ScriptKind.TSX;
    case '.js':
    case '.jsx':
      // React projects put JSX in plain .js files too
      return ts.ScriptKind.JSX;
    default:
      throw new ScanError(
        `Unsupported file type: ${path.extname(file) || '(none)'}`,
        { filePath: file },
        ErrorCode.SCAN_UNSUPPORTED_FILE
      );
  }
}

/**
 * Parse component source into a TypeScript syntax tree.
 * Throws ScanError on the first syntax error so rules never see a broken tree.
 */
export function scanSource(text: string, file: string): ScannedSource {
  const kind = scriptKindFor(file);
  const sourceFile = ts.createSourceFile(
    file,
    text,
    ts.ScriptTarget.Latest,
    true,
    kind
  );

  const { diagnostics = [] } = ts.transpileModule(text, {
    fileName: kind === ts.ScriptKind.JSX ? ensureJsx(file) : file,
    reportDiagnostics: true,
    compilerOptions: {
      jsx: ts.JsxEmit.Preserve,
      target: ts.ScriptTarget.Latest,
      allowJs: true,
    },
  });
  const first = diagnostics.find(
    (d) => d.category === ts.DiagnosticCategory.Error && d.start !== undefined
  );
  if (first && first.start !== undefined) {
    const { line, character } = sourceFile.getLineAndCharacterOfPosition(
      first.start
    );
    const message = ts.flattenDiagnosticMessageText(first.messageText, '\n');
    throw new ScanError(`${line + 1}:${character + 1} ${message}`, {
      filePath: file,
      line: line + 1,
      column: character + 1,
    });
  }

  return { file, text, sourceFile, lines: text.split(/\r?\n/) };
}

function ensureJsx(file: string) {
  return file.replace(/\.js$/i, '.jsx');
}

export function walk(node: ts.Node, visit: (n: ts.Node) => void) {
  visit(node);
  ts.forEachChild(node, (child) => walk(child, visit));
}

/** Collect every descendant (including the root) that satisfies the guard. */
export function collect<T extends ts.Node>(
  root: ts.Node,
  guard: (n: ts.Node) => n is T
): T[] {
  const out: T[] = [];
  walk(root, (n) => {
    if (guard(n)) out.push(n);
  });
  return out;
}

export function lineAndColumn(source: ScannedSource, pos: number) {
  const { line, character } = source.sourceFile.getLineAndCharacterOfPosition(
    pos
  );
  return { line: line + 1, column: character + 1 };
}

export function isJsxNode(node: ts.Node): node is JsxNode {
  return (
    ts.isJsxElement(node) ||
    ts.isJsxSelfClosingElement(node) ||
    ts.isJsxFragment(node)
  );
}

export function isJsxOpeningLike(node: ts.Node): node is JsxOpeningLike {
  return ts.isJsxOpeningElement(node) || ts.isJsxSelfClosingElement(node);
}

export function jsxTagName(node: JsxOpeningLike): string {
  return node.tagName.getText();
}

export function isCustomComponentTag(node: JsxOpeningLike): boolean {
  const name = jsxTagName(node);
  return /^[A-Z]/.test(name) || name.includes('.');
}

export function attributeName(attr: ts.JsxAttribute): string {
  return attr.name.getText();
}

export function findAttribute(
  node: JsxOpeningLike,
  name: string
): ts.JsxAttribute | undefined {
  for (const prop of node.attributes.properties) {
    if (ts.isJsxAttribute(prop) && attributeName(prop) === name) return prop;
  }
  return undefined;
}

export function hasSpreadAttribute(node: JsxOpeningLike): boolean {
  return node.attributes.properties.some((p) => ts.isJsxSpreadAttribute(p));
}

/** Literal string value of an attribute: `a="x"` or `a={'x'}`. */
export function attributeStringValue(
  attr: ts.JsxAttribute
): string | undefined {
  const init = attr.initializer;
  if (!init) return undefined;
  if (ts.isStringLiteral(init)) return init.text;
  if (
    ts.isJsxExpression(init) &&
    init.expression &&
    (ts.isStringLiteral(init.expression) ||
      ts.isNoSubstitutionTemplateLiteral(init.expression))
  ) {
    return init.expression.text;
  }
  return undefined;
}

const COMPONENT_BASES = new Set([
  'Component',
  'PureComponent',
  'React.Component',
  'React.PureComponent',
]);

export function isComponentClass(
  node: ts.Node
): node is ts.ClassDeclaration | ts.ClassExpression {
  if (!ts.isClassDeclaration(node) && !ts.isClassExpression(node)) return false;
  for (const clause of node.heritageClauses ?? []) {
    if (clause.token !== ts.SyntaxKind.ExtendsKeyword) continue;
    for (const t of clause.types) {
      if (COMPONENT_BASES.has(t.expression.getText())) return true;
    }
  }
  return false;
}

const CREATE_CLASS_CALLEES = new Set([
  'createReactClass',
  'React.createClass',
  'createClass',
]);

export function isCreateClassCall(node: ts.Node): node is ts.CallExpression {
  return (
    ts.isCallExpression(node) &&
    CREATE_CLASS_CALLEES.has(node.expression.getText())
  );
}

/** The object literal spec passed to createReactClass, if any. */
export function createClassSpec(
  call: ts.CallExpression
): ts.ObjectLiteralExpression | undefined {
  const arg = call.arguments[0];
  return arg && ts.isObjectLiteralExpression(arg) ? arg : undefined;
}

export function propertyNameText(name: ts.PropertyName): string | undefined {
  if (
    ts.isIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name) ||
    ts.isPrivateIdentifier(name)
  ) {
    return name.text;
  }
  return undefined;
}

export function objectHasProperty(
  obj: ts.ObjectLiteralExpression,
  key: string
): ts.ObjectLiteralElementLike | undefined {
  return obj.properties.find(
    (p) => p.name !== undefined && propertyNameText(p.name) === key
  );
}

export function isStaticMember(member: ts.ClassElement): boolean {
  return (
    ts.canHaveModifiers(member) &&
    (ts.getModifiers(member) ?? []).some(
      (m) => m.kind === ts.SyntaxKind.StaticKeyword
    )
  );
}

export function isFunctionLike(node: ts.Node): boolean {
  return (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isArrowFunction(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node) ||
    ts.isConstructorDeclaration(node)
  );
}

export function containsJsx(node: ts.Node): boolean {
  let found = false;
  walk(node, (n) => {
    if (isJsxNode(n)) found = true;
  });
  return found;
}
