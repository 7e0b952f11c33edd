import { describe, expect, it } from 'vitest';
import {
  componentNameMatchesFile,
  filenamePascalCase,
  hocDisplayName,
  noDomPropMisuse,
  referenceNaming,
} from '../naming';
import { lintRule, messages } from './lint-rule';

const card = 'export default function ReservationCard() { return <div />; }';

describe('filename-pascal-case', () => {
  it('flags a kebab-case component file', () => {
    const [v] = lintRule(filenamePascalCase, card, 'src/reservation-card.jsx');
    expect(v.message).toBe('File name "reservation-card.jsx" should be PascalCase');
    expect(v.suggestion).toBe('Rename to ReservationCard.jsx');
    expect([v.line, v.column]).toEqual([1, 1]);
  });

  it('keeps secondary extensions in the suggestion', () => {
    const [v] = lintRule(filenamePascalCase, card, 'reservationCard.test.tsx');
    expect(v.suggestion).toBe('Rename to ReservationCard.test.tsx');
  });

  it('accepts PascalCase, index files and non-component extensions', () => {
    expect(lintRule(filenamePascalCase, card, 'ReservationCard.jsx')).toEqual([]);
    expect(lintRule(filenamePascalCase, card, 'src/Card/index.jsx')).toEqual([]);
    expect(lintRule(filenamePascalCase, card, 'reservation-card.js')).toEqual([]);
  });
});

describe('component-name-matches-file', () => {
  it('expects the directory name for index files', () => {
    const code = 'export default function FooterComponent() {\n  return <footer />;\n}\n';
    const [v] = lintRule(componentNameMatchesFile, code, '/src/Footer/index.jsx');
    expect(v.message).toBe(
      'Default export "FooterComponent" should be named "Footer" after its directory "Footer"'
    );
    expect([v.line, v.column]).toEqual([1, 25]);
  });

  it('checks an exported identifier against the file stem', () => {
    const code = 'const Card = () => <div />;\nexport default Card;\n';
    const [v] = lintRule(componentNameMatchesFile, code, 'ReservationCard.jsx');
    expect(v.message).toBe('Default export "Card" should be named "ReservationCard" after its file "ReservationCard"');
    expect([v.line, v.column]).toEqual([2, 16]);
  });

  it('compares against the PascalCase form of lowercase and kebab-case names', () => {
    const footer = 'export default function Footer() { return <div />; }';
    expect(lintRule(componentNameMatchesFile, footer, '/p/components/footer/index.jsx')).toEqual([]);
    expect(lintRule(componentNameMatchesFile, card, 'src/reservation-card.jsx')).toEqual([]);

    const [v] = lintRule(
      componentNameMatchesFile,
      'const Card = () => <div />;\nexport default Card;\n',
      'src/reservation-card.jsx'
    );
    expect(v.message).toBe(
      'Default export "Card" should be named "ReservationCard" after its file "reservation-card"'
    );
    expect(v.suggestion).toBe('Rename the component to ReservationCard');
  });

  it('passes a matching class and ignores files without components', () => {
    const cls =
      'class ReservationCard extends React.Component { render() { return <div />; } }\nexport default ReservationCard;';
    expect(lintRule(componentNameMatchesFile, cls, 'ReservationCard.jsx')).toEqual([]);
    expect(lintRule(componentNameMatchesFile, 'export default fetchAll;', 'api.js')).toEqual([]);
  });
});

describe('reference-naming', () => {
  it('flags camelCase component imports and PascalCase instances', () => {
    const code = [
      "import reservationCard from './ReservationCard';",
      "import lodash from 'lodash';",
      'const ReservationItem = <ReservationCard />;',
      'const reservationItem = <ReservationCard />;',
    ].join('\n');
    const violations = lintRule(referenceNaming, code, 'Page.jsx');
    expect(violations.map((v) => v.message)).toEqual([
      'Component import "reservationCard" should be PascalCase',
      'JSX instance "ReservationItem" should be camelCase',
    ]);
    expect(violations[0].suggestion).toBe("import ReservationCard from './ReservationCard';");
    expect(violations[1].suggestion).toBe('const reservationItem = ...');
  });
});

describe('hoc-display-name', () => {
  it('warns when the returned component gets no displayName', () => {
    const code = [
      'export default function withFoo(WrappedComponent) {',
      '  return function WithFoo(props) {',
      '    return <WrappedComponent {...props} foo />;',
      '  };',
      '}',
    ].join('\n');
    const [v] = lintRule(hocDisplayName, code);
    expect(v.message).toBe(
      'Higher-order component "withFoo" does not set displayName on the component it returns'
    );
    expect(v.severity).toBe('warn');
  });

  it('covers arrow-function HOCs', () => {
    expect(messages(hocDisplayName, 'const withBar = (C) => (props) => <C {...props} />;')).toEqual([
      'Higher-order component "withBar" does not set displayName on the component it returns',
    ]);
  });

  it('accepts a HOC that assigns displayName', () => {
    const code = [
      'export default function withFoo(WrappedComponent) {',
      '  function WithFoo(props) {',
      '    return <WrappedComponent {...props} foo />;',
      '  }',
      "  WithFoo.displayName = `withFoo(${WrappedComponent.name})`;",
      '  return WithFoo;',
      '}',
    ].join('\n');
    expect(lintRule(hocDisplayName, code)).toEqual([]);
  });
});

describe('no-dom-prop-misuse', () => {
  it('flags a string style on a custom component only', () => {
    expect(messages(noDomPropMisuse, 'const a = <MyComponent style="fancy" />;')).toEqual([
      '<MyComponent> uses the DOM prop "style" for a string value',
    ]);
    expect(messages(noDomPropMisuse, 'const a = <div style="color: red" />;')).toEqual([]);
    expect(messages(noDomPropMisuse, "const a = <MyComponent style={{ color: 'red' }} />;")).toEqual(
      []
    );
  });
});
