import { describe, expect, it } from 'vitest';
import { jsxNoBind, noIsMounted, noUnderscoreMethods, requireRenderReturn } from '../methods';
import { lintRule, messages } from './lint-rule';

describe('jsx-no-bind', () => {
  it('flags .bind() and function expressions in props', () => {
    expect(messages(jsxNoBind, 'const a = <div onClick={this.onClickDiv.bind(this)} />;')).toEqual([
      '"onClick" calls .bind() in render',
    ]);
    expect(messages(jsxNoBind, 'const a = <div onClick={function () {}} />;')).toEqual([
      '"onClick" creates a function expression in render',
    ]);
  });

  it('allows arrow functions and ref callbacks', () => {
    expect(lintRule(jsxNoBind, 'const a = <div onClick={() => this.go(id)} />;')).toEqual([]);
    expect(lintRule(jsxNoBind, 'const a = <div ref={this.setRef.bind(this)} />;')).toEqual([]);
  });
});

describe('no-underscore-methods', () => {
  it('flags underscore-prefixed methods but not fields', () => {
    const code = [
      'class Foo extends React.Component {',
      '  _count = 0;',
      '  _onClickSubmit() {}',
      '  render() { return <div />; }',
      '}',
    ].join('\n');
    const [v, ...rest] = lintRule(noUnderscoreMethods, code);
    expect(rest).toEqual([]);
    expect(v.message).toBe('Method "_onClickSubmit" of Foo uses an underscore prefix');
    expect(v.suggestion).toBe('onClickSubmit');
    expect(v.line).toBe(3);
  });

  it('covers createReactClass specs', () => {
    const code = 'const Bar = createReactClass({ _go() {}, render() { return <div />; } });';
    expect(messages(noUnderscoreMethods, code)).toEqual([
      'Method "_go" of Bar uses an underscore prefix',
    ]);
  });
});

describe('require-render-return', () => {
  it('flags a render without a return value', () => {
    const code = [
      'class Foo extends React.Component {',
      '  render() {',
      '    (<div />);',
      '  }',
      '}',
    ].join('\n');
    const [v] = lintRule(requireRenderReturn, code);
    expect(v.message).toBe('render() of Foo does not return a value');
    expect([v.line, v.column]).toEqual([2, 3]);
  });

  it('does not count returns inside nested functions', () => {
    const code = [
      'class Foo extends React.Component {',
      '  render() {',
      '    const f = () => { return 1; };',
      '  }',
      '}',
    ].join('\n');
    expect(messages(requireRenderReturn, code)).toEqual(['render() of Foo does not return a value']);
  });

  it('accepts returning renders and arrow-field renders', () => {
    const a = 'class A extends React.Component { render() { return <div />; } }';
    const b = 'class B extends React.Component { render = () => <div />; }';
    expect(lintRule(requireRenderReturn, a)).toEqual([]);
    expect(lintRule(requireRenderReturn, b)).toEqual([]);
  });
});

describe('no-is-mounted', () => {
  it('flags this.isMounted()', () => {
    const code = [
      'class Foo extends React.Component {',
      '  load() {',
      '    if (this.isMounted()) { this.setState({ loaded: true }); }',
      '  }',
      '}',
    ].join('\n');
    const [v] = lintRule(noIsMounted, code);
    expect(v.message).toBe('this.isMounted() is an anti-pattern');
    expect([v.line, v.column]).toEqual([3, 9]);
  });
});
