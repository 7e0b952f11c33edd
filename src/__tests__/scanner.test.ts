import ts from 'typescript';
import { describe, expect, it } from 'vitest';
import { ErrorCode, ScanError } from '../errors';
import {
  collect,
  isComponentClass,
  isCreateClassCall,
  isCustomComponentTag,
  isJsxOpeningLike,
  jsxTagName,
  lineAndColumn,
  scanSource,
} from '../scanner';

describe('scanSource', () => {
  it('parses JSX in .tsx and .js files', () => {
    const tsx = scanSource('const a = <div />;\nexport default a;', 'A.tsx');
    expect(tsx.lines).toEqual(['const a = <div />;', 'export default a;']);
    expect(tsx.sourceFile.statements.length).toBe(2);

    const js = scanSource('export const B = () => <span />;', 'B.js');
    expect(collect(js.sourceFile, isJsxOpeningLike).map(jsxTagName)).toEqual(['span']);
  });

  it('throws a ScanError with the position of the first syntax error', () => {
    let caught: unknown;
    try {
      scanSource('const ok = 1;\nconst a = ;', 'broken.ts');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ScanError);
    if (!(caught instanceof ScanError)) return;
    expect(caught.code).toBe(ErrorCode.SCAN_SYNTAX_ERROR);
    expect(caught.filePath).toBe('broken.ts');
    expect(caught.line).toBe(2);
    expect(caught.message).toMatch(/^2:\d+ /);
  });

  it('rejects files it cannot parse', () => {
    expect(() => scanSource('a {}', 'styles.css')).toThrow('Unsupported file type: .css');
  });
});

describe('scanner helpers', () => {
  it('reports 1-based positions', () => {
    const source = scanSource('a;\nbc;', 'x.ts');
    expect(lineAndColumn(source, 4)).toEqual({ line: 2, column: 2 });
  });

  it('recognises component classes and createReactClass calls', () => {
    const source = scanSource(
      [
        'class A extends React.Component {}',
        'class B extends PureComponent {}',
        'class C extends Base {}',
        'const D = createReactClass({});',
      ].join('\n'),
      'x.jsx'
    );
    const classes = collect(source.sourceFile, isComponentClass).map((c) => c.name?.text);
    expect(classes).toEqual(['A', 'B']);
    expect(collect(source.sourceFile, isCreateClassCall).length).toBe(1);
  });

  it('tells custom components from DOM tags', () => {
    const source = scanSource('const a = <div><Foo /><ui.Button /></div>;', 'x.jsx');
    const tags = collect(source.sourceFile, isJsxOpeningLike).map((el) => [
      jsxTagName(el),
      isCustomComponentTag(el),
    ]);
    expect(tags).toEqual([
      ['div', false],
      ['Foo', true],
      ['ui.Button', true],
    ]);
  });

  it('keeps a real syntax tree for TypeScript files', () => {
    const source = scanSource('interface P { a: string }', 'types.ts');
    expect(ts.isInterfaceDeclaration(source.sourceFile.statements[0])).toBe(true);
  });
});
