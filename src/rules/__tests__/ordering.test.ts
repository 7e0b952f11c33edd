import { describe, expect, it } from 'vitest';
import { sortComp } from '../ordering';
import { lintRule, messages } from './lint-rule';

describe('sort-comp', () => {
  it('flags a handler declared after render', () => {
    const code = [
      'class Profile extends React.Component {',
      '  render() {',
      '    return <div onClick={this.onClick} />;',
      '  }',
      '  onClick() {}',
      '}',
    ].join('\n');
    const [v] = lintRule(sortComp, code);
    expect(v.message).toBe(
      'onClick (event handlers) should be placed before render (render) in Profile'
    );
    expect([v.line, v.column]).toEqual([5, 3]);
  });

  it('compares later members against the highest group seen so far', () => {
    const code = [
      'class A extends React.Component {',
      '  constructor(props) { super(props); }',
      '  static propTypes = {};',
      '  componentDidMount() {}',
      '  handleClick() {}',
      '  getLabel() {}',
      '  format() {}',
      '  renderRow() {}',
      '  render() { return null; }',
      '}',
    ].join('\n');
    expect(messages(sortComp, code)).toEqual([
      'propTypes (static members) should be placed before constructor (constructor) in A',
    ]);
  });

  it('orders lifecycle methods, treating UNSAFE_ names as their base name', () => {
    const code = [
      'class B extends React.Component {',
      '  componentDidMount() {}',
      '  UNSAFE_componentWillMount() {}',
      '  render() { return null; }',
      '}',
    ].join('\n');
    expect(messages(sortComp, code)).toEqual([
      'UNSAFE_componentWillMount (lifecycle methods) should be placed before componentDidMount (lifecycle methods) in B',
    ]);
  });

  it('ranks createReactClass spec keys as statics', () => {
    const good = [
      'const C = createReactClass({',
      '  propTypes: {},',
      '  getInitialState() { return {}; },',
      '  componentDidMount() {},',
      '  render() { return <div />; },',
      '});',
    ].join('\n');
    const bad = [
      'const D = createReactClass({',
      '  render() { return <div />; },',
      '  propTypes: {},',
      '});',
    ].join('\n');
    expect(lintRule(sortComp, good)).toEqual([]);
    expect(messages(sortComp, bad)).toEqual([
      'propTypes (static members) should be placed before render (render) in D',
    ]);
  });

  it('keeps a field named like a render helper with the instance fields', () => {
    const code = [
      'class E extends React.Component {',
      '  renderCount = 0;',
      '  componentDidMount() {}',
      '  render() { return null; }',
      '}',
    ].join('\n');
    expect(lintRule(sortComp, code)).toEqual([]);
  });
});
