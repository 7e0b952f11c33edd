import ts from 'typescript';
import {
  attributeName,
  collect,
  isJsxNode,
  isJsxOpeningLike,
  jsxTagName,
  walk,
  type JsxOpeningLike,
  type ScannedSource,
} from '../scanner';
import type { RuleFinding, StyleRule } from './types';

function lineOf(source: ScannedSource, pos: number) {
  return source.sourceFile.getLineAndCharacterOfPosition(pos).line;
}

function indentOf(line: string) {
  return (/^\s*/.exec(line) ?? [''])[0].length;
}

function isMultiline(source: ScannedSource, node: ts.Node) {
  return lineOf(source, node.getStart()) !== lineOf(source, node.getEnd());
}

/** Position of the `>` or `/>` that closes an opening tag. */
function closingBracketPos(node: JsxOpeningLike): number {
  const text = node.getText();
  const offset = ts.isJsxSelfClosingElement(node)
    ? text.search(/\/\s*>$/)
    : text.length - 1;
  return node.getStart() + offset;
}

export const jsxQuotes: StyleRule = {
  id: 'jsx-quotes',
  category: 'quotes',
  description: 'Always use double quotes for JSX attributes.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    walk(source.sourceFile, (n) => {
      if (!ts.isJsxAttribute(n) || !n.initializer) return;
      if (!ts.isStringLiteral(n.initializer)) return;
      const raw = n.initializer.getText();
      // a value holding a double quote cannot switch quote style
      if (!raw.startsWith("'") || n.initializer.text.includes('"')) return;
      findings.push({
        node: n.initializer,
        message: `JSX attribute "${attributeName(n)}" should use double quotes`,
        suggestion: `${attributeName(n)}="${n.initializer.text}"`,
      });
    });
    return findings;
  },
};

export const jsxTagSpacing: StyleRule = {
  id: 'jsx-tag-spacing',
  category: 'spacing',
  description: 'Always include a single space in self-closing tags.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const el of collect(source.sourceFile, isJsxOpeningLike)) {
      const text = el.getText();
      const tag = jsxTagName(el);

      if (/^<\s/.test(text)) {
        findings.push({
          node: el,
          message: `No space allowed after "<" in <${tag}>`,
          suggestion: `<${tag}`,
        });
      }

      if (ts.isJsxSelfClosingElement(el)) {
        if (/\/\s+>$/.test(text)) {
          findings.push({
            node: el,
            message: `No space allowed between "/" and ">" in <${tag}>`,
            suggestion: '/>',
          });
        }
        const before = text.slice(0, text.search(/\/\s*>$/));
        const ws = (/\s*$/.exec(before) ?? [''])[0];
        if (ws.includes('\n')) continue;
        if (ws === '') {
          findings.push({
            node: el,
            message: `A space is required before "/>" in <${tag}>`,
            suggestion: `<${tag} />`,
          });
        } else if (ws !== ' ') {
          findings.push({
            node: el,
            message: `Use a single space before "/>" in <${tag}>`,
            suggestion: `<${tag} />`,
          });
        }
      } else {
        const ws = (/\s*>$/.exec(text) ?? [''])[0].slice(0, -1);
        if (ws !== '' && !ws.includes('\n')) {
          findings.push({
            node: el,
            message: `No space allowed before ">" in <${tag}>`,
            suggestion: `<${tag}>`,
          });
        }
      }
    }
    return findings;
  },
};

export const jsxCurlySpacing: StyleRule = {
  id: 'jsx-curly-spacing',
  category: 'spacing',
  description: 'Do not pad JSX curly braces with spaces.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    walk(source.sourceFile, (n) => {
      if (!ts.isJsxAttribute(n) || !n.initializer) return;
      if (!ts.isJsxExpression(n.initializer)) return;
      const text = n.initializer.getText();
      if (!/^\{[ \t]/.test(text) && !/[ \t]\}$/.test(text)) return;
      findings.push({
        node: n.initializer,
        message: `Curly braces of "${attributeName(n)}" should not be padded with spaces`,
        suggestion: `${attributeName(n)}={${text.slice(1, -1).trim()}}`,
      });
    });
    return findings;
  },
};

export const jsxPropsOnePerLine: StyleRule = {
  id: 'jsx-props-one-per-line',
  category: 'alignment',
  description:
    'When a tag spans multiple lines, put the first prop on a new line and each prop on its own line.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const el of collect(source.sourceFile, isJsxOpeningLike)) {
      const props = el.attributes.properties;
      if (props.length === 0 || !isMultiline(source, el)) continue;

      const tagLine = lineOf(source, el.tagName.getEnd());
      if (lineOf(source, props[0].getStart()) === tagLine) {
        findings.push({
          node: props[0],
          message: `First prop of multi-line <${jsxTagName(el)}> should be on a new line`,
        });
      }
      for (let i = 1; i < props.length; i++) {
        if (lineOf(source, props[i].getStart()) !== lineOf(source, props[i - 1].getEnd())) {
          continue;
        }
        findings.push({
          node: props[i],
          message: `Prop "${props[i].getText()}" should be on its own line`,
        });
      }
    }
    return findings;
  },
};

export const jsxClosingBracketLocation: StyleRule = {
  id: 'jsx-closing-bracket-location',
  category: 'alignment',
  description:
    'When a tag spans multiple lines, put its closing bracket on its own line, aligned with the line that opens the tag.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    for (const el of collect(source.sourceFile, isJsxOpeningLike)) {
      if (!isMultiline(source, el)) continue;
      const pos = closingBracketPos(el);
      const { line, character } = source.sourceFile.getLineAndCharacterOfPosition(pos);
      const lineText = source.lines[line] ?? '';
      const tag = jsxTagName(el);

      if (lineText.slice(0, character).trim() !== '') {
        findings.push({
          pos,
          message: `Closing bracket of multi-line <${tag}> should be on its own line`,
        });
        continue;
      }
      const expected = indentOf(source.lines[lineOf(source, el.getStart())] ?? '');
      if (character !== expected) {
        findings.push({
          pos,
          message: `Closing bracket of <${tag}> should be aligned with the opening line (column ${
            expected + 1
          })`,
        });
      }
    }
    return findings;
  },
};

export const jsxWrapMultilines: StyleRule = {
  id: 'jsx-wrap-multilines',
  category: 'parentheses',
  description: 'Wrap JSX tags in parentheses when they span more than one line.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    const consider = (expr: ts.Node | undefined, context: string) => {
      if (!expr || !isJsxNode(expr) || !isMultiline(source, expr)) return;
      findings.push({
        node: expr,
        message: `Multi-line JSX in ${context} should be wrapped in parentheses`,
        suggestion: '(\n  <Component />\n)',
      });
    };
    walk(source.sourceFile, (n) => {
      if (ts.isReturnStatement(n)) consider(n.expression, 'return');
      else if (ts.isVariableDeclaration(n)) consider(n.initializer, 'declaration');
      else if (ts.isArrowFunction(n) && !ts.isBlock(n.body)) consider(n.body, 'arrow body');
      else if (
        ts.isBinaryExpression(n) &&
        n.operatorToken.kind === ts.SyntaxKind.EqualsToken
      ) {
        consider(n.right, 'assignment');
      }
    });
    return findings;
  },
};

export const selfClosingComp: StyleRule = {
  id: 'self-closing-comp',
  category: 'tags',
  description: 'Always self-close tags that have no children.',
  defaultSeverity: 'error',
  check(source) {
    const findings: RuleFinding[] = [];
    walk(source.sourceFile, (n) => {
      if (!ts.isJsxElement(n)) return;
      const empty =
        n.children.length === 0 ||
        n.children.every(
          (c) => ts.isJsxText(c) && c.text.trim() === '' && c.text.includes('\n')
        );
      if (!empty) return;
      const tag = jsxTagName(n.openingElement);
      findings.push({
        node: n.openingElement,
        message: `Empty <${tag}> should be self-closing`,
        suggestion: `<${tag} />`,
      });
    });
    return findings;
  },
};

export const formattingRules: StyleRule[] = [
  jsxQuotes,
  jsxTagSpacing,
  jsxCurlySpacing,
  jsxPropsOnePerLine,
  jsxClosingBracketLocation,
  jsxWrapMultilines,
  selfClosingComp,
];
