import { describe, expect, it } from 'vitest';
import {
  ariaRole,
  imgHasAlt,
  imgRedundantAlt,
  jsxBooleanValue,
  noAccessKey,
  noArrayIndexKey,
  noStringRefs,
  propNameCamelCase,
  requireDefaultProps,
} from '../props';
import { lintRule, messages } from './lint-rule';

describe('prop-name-camel-case', () => {
  it('flags non-camelCase prop names', () => {
    const code =
      'const a = <Foo UserName="hello" phone_number={12345678} Component={SomeComponent} data-id="x" />;';
    const violations = lintRule(propNameCamelCase, code);
    expect(violations.map((v) => [v.message, v.suggestion])).toEqual([
      ['Prop name "UserName" should be camelCase', 'userName'],
      ['Prop name "phone_number" should be camelCase', 'phoneNumber'],
    ]);
  });

  it('allows PascalCase when the value is a component', () => {
    expect(lintRule(propNameCamelCase, 'const a = <Foo Icon={<Star />} />;')).toEqual([]);
    expect(lintRule(propNameCamelCase, 'const a = <Foo Icon="star" />;').length).toBe(1);
  });
});

describe('jsx-boolean-value', () => {
  it('flags an explicit {true}', () => {
    expect(messages(jsxBooleanValue, 'const a = <Foo hidden={true} />;')).toEqual([
      'Value of "hidden" is explicitly true and should be omitted',
    ]);
    expect(messages(jsxBooleanValue, 'const a = <Foo hidden />;')).toEqual([]);
    expect(messages(jsxBooleanValue, 'const a = <Foo hidden={false} />;')).toEqual([]);
  });
});

describe('img-has-alt', () => {
  it('requires alt unless the image is presentational or spread', () => {
    expect(messages(imgHasAlt, 'const a = <img src="hello.jpg" />;')).toEqual([
      '<img> elements must have an alt prop',
    ]);
    expect(lintRule(imgHasAlt, 'const a = <img src="hello.jpg" alt="" />;')).toEqual([]);
    expect(lintRule(imgHasAlt, 'const a = <img src="hello.jpg" role="presentation" />;')).toEqual(
      []
    );
    expect(lintRule(imgHasAlt, 'const a = <img {...props} />;')).toEqual([]);
  });
});

describe('img-redundant-alt', () => {
  it('flags redundant words as whole words only', () => {
    expect(
      messages(imgRedundantAlt, 'const a = <img src="a.jpg" alt="Picture of me waving hello" />;')
    ).toEqual(['Redundant word "Picture" in <img> alt text']);
    expect(lintRule(imgRedundantAlt, 'const a = <img src="a.jpg" alt="Photography class" />;')).toEqual(
      []
    );
  });

  it('skips hidden images', () => {
    const code = 'const a = <img src="a.jpg" alt="photo" aria-hidden />;';
    expect(lintRule(imgRedundantAlt, code)).toEqual([]);
  });
});

describe('aria-role', () => {
  it('rejects unknown and abstract roles', () => {
    expect(messages(ariaRole, 'const a = <div role="datepicker" />;')).toEqual([
      'Invalid ARIA role "datepicker"',
    ]);
    expect(messages(ariaRole, 'const a = <div role="range" />;')).toEqual([
      'Invalid ARIA role "range"',
    ]);
    expect(messages(ariaRole, 'const a = <div role="" />;')).toEqual(['Empty ARIA role']);
  });

  it('accepts valid roles and dynamic values', () => {
    expect(lintRule(ariaRole, 'const a = <div role="button" />;')).toEqual([]);
    expect(lintRule(ariaRole, 'const a = <div role={role} />;')).toEqual([]);
  });
});

describe('no-access-key', () => {
  it('flags accessKey', () => {
    expect(messages(noAccessKey, 'const a = <div accessKey="h" />;')).toEqual([
      'accessKey prop is not allowed',
    ]);
  });
});

describe('no-array-index-key', () => {
  it('flags index parameters used in keys', () => {
    const code = [
      'const a = todos.map((todo, index) => <Todo {...todo} key={index} />);',
      'const b = todos.map((todo) => <Todo {...todo} key={todo.id} />);',
      'const c = todos.map((todo, i) => <Todo key={`todo-${i}`} />);',
      'const d = todos.reduce((acc, todo, idx) => [...acc, <Todo key={idx} />], []);',
    ].join('\n');
    const violations = lintRule(noArrayIndexKey, code);
    expect(violations.map((v) => [v.line, v.message])).toEqual([
      [1, 'Array index "index" used as key'],
      [3, 'Array index "i" used as key'],
      [4, 'Array index "idx" used as key'],
    ]);
  });

  it('ignores a property that shares the index name', () => {
    const code = 'const a = items.map((item, id) => <Row key={item.id} />);';
    expect(lintRule(noArrayIndexKey, code)).toEqual([]);
  });
});

describe('require-default-props', () => {
  it('flags optional propTypes without defaults', () => {
    const code = [
      'function SFC({ foo, bar, baz }) {',
      '  return <div>{foo}{bar}{baz}</div>;',
      '}',
      'SFC.propTypes = {',
      '  foo: PropTypes.number.isRequired,',
      '  bar: PropTypes.string,',
      '  baz: PropTypes.bool,',
      '};',
      'SFC.defaultProps = {',
      "  bar: '',",
      '};',
    ].join('\n');
    const [v, ...rest] = lintRule(requireDefaultProps, code);
    expect(rest).toEqual([]);
    expect(v.message).toBe(
      'propType "baz" of SFC is not required, but has no corresponding defaultProps entry'
    );
    expect([v.line, v.column]).toEqual([7, 3]);
  });

  it('reads static class fields', () => {
    const code = [
      'class Card extends React.Component {',
      '  static propTypes = { title: PropTypes.string };',
      '  render() { return <div />; }',
      '}',
    ].join('\n');
    expect(messages(requireDefaultProps, code)).toEqual([
      'propType "title" of Card is not required, but has no corresponding defaultProps entry',
    ]);
  });

  it('resolves objects through top-level constants and skips spread defaults', () => {
    const viaConst = [
      'const propTypes = { a: PropTypes.string };',
      "const defaultProps = { a: 'x' };",
      'Foo.propTypes = propTypes;',
      'Foo.defaultProps = defaultProps;',
    ].join('\n');
    const spread = [
      'Bar.propTypes = { a: PropTypes.string };',
      'Bar.defaultProps = { ...base };',
    ].join('\n');
    expect(lintRule(requireDefaultProps, viaConst)).toEqual([]);
    expect(lintRule(requireDefaultProps, spread)).toEqual([]);
  });
});

describe('no-string-refs', () => {
  it('flags string refs and this.refs', () => {
    const code = [
      'class Foo extends React.Component {',
      '  focus() { this.refs.input.focus(); }',
      '  render() { return <input ref="myRef" />; }',
      '}',
    ].join('\n');
    const violations = lintRule(noStringRefs, code);
    expect(violations.map((v) => [v.line, v.message])).toEqual([
      [2, 'this.refs reads string refs'],
      [3, 'String ref "myRef" is not allowed'],
    ]);
    expect(violations[1].suggestion).toBe('ref={(ref) => { this.myRef = ref; }}');
  });

  it('accepts callback refs', () => {
    const code = 'const a = <Foo ref={(ref) => { this.node = ref; }} />;';
    expect(lintRule(noStringRefs, code)).toEqual([]);
  });
});
