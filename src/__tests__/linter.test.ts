import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ScanError } from '../errors';
import type { ModelClient } from '../judge';
import { isMarkdownFile, lintFile, type LintContext } from '../linter';
import { RuleRegistry } from '../registry';
import { jsxQuotes } from '../rules/jsx-format';
import type { RuleSpec } from '../types';

const llmDoc: RuleSpec = {
  id: 'spread-props-sparingly',
  severity: 'warn',
  engine: 'llm',
  markdown: '# Spread props sparingly',
  filePath: 'rules/spread-props-sparingly.md',
};

describe('lintFile', () => {
  let dir: string;
  let ctx: LintContext;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'react-style-linter-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    ctx = {
      registry: new RuleRegistry().register(jsxQuotes),
      settings: {},
      docs: [llmDoc],
      ruleConcurrency: 2,
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('runs the static rules over source files', async () => {
    const file = path.join(dir, 'Card.jsx');
    const code = "const a = <Foo bar='x' />;\n";
    await fs.writeFile(file, code);

    const result = await lintFile(file, { ...ctx, includeSource: true });
    expect(result.file).toBe(file);
    expect(result.overall_pass).toBe(false);
    expect(result.source).toBe(code);
    expect(result.rules.map((r) => [r.id, r.rationale])).toEqual([
      ['jsx-quotes', '1:20 JSX attribute "bar" should use double quotes'],
    ]);
  });

  it('asks the judge about llm rules when one is configured', async () => {
    const file = path.join(dir, 'Card.jsx');
    await fs.writeFile(file, 'const a = <Foo bar="x" {...rest} />;\n');
    const complete = vi.fn(async () =>
      JSON.stringify({ pass: false, rationale: 'spreads rest', suggested_fixes: ['pass bar only'] })
    );
    const judge: ModelClient = { model: 'test-model', complete };

    const result = await lintFile(file, { ...ctx, judge });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(result.rules.map((r) => [r.id, r.pass, r.severity])).toEqual([
      ['jsx-quotes', true, 'error'],
      ['spread-props-sparingly', false, 'warn'],
    ]);
    // a failed warning does not fail the file
    expect(result.overall_pass).toBe(true);
  });

  it('skips rules switched off in settings', async () => {
    const file = path.join(dir, 'Card.jsx');
    await fs.writeFile(file, "const a = <Foo bar='x' />;\n");
    const judge: ModelClient = { model: 'test-model', complete: vi.fn(async () => '{"pass":true}') };

    const result = await lintFile(file, {
      ...ctx,
      judge,
      settings: { 'jsx-quotes': 'off', 'spread-props-sparingly': 'off' },
    });
    expect(result.rules).toEqual([]);
    expect(result.overall_pass).toBe(true);
    expect(judge.complete).not.toHaveBeenCalled();
  });

  it('sends markdown files to the document checks only', async () => {
    const file = path.join(dir, 'README.md');
    await fs.writeFile(file, '# Guide\n\n- [Naming](#naming)\n- [Rules](rules.md)\n');
    const complete = vi.fn(async () => '{"pass":true}');

    const result = await lintFile(file, {
      ...ctx,
      judge: { model: 'test-model', complete },
      exists: (p) => p === path.join(dir, 'rules.md'),
    });
    expect(complete).not.toHaveBeenCalled();
    expect(result.rules.map((r) => [r.id, r.pass])).toEqual([
      ['toc-anchors', false],
      ['bad-good-pairing', true],
      ['unique-headings', true],
      ['relative-links', true],
    ]);
    expect(result.rules[0].rationale).toBe('3:1 Link "#naming" does not match any heading');
  });

  it('rejects on syntax errors', async () => {
    const file = path.join(dir, 'Broken.jsx');
    await fs.writeFile(file, 'const a = <div>;\n');
    await expect(lintFile(file, ctx)).rejects.toBeInstanceOf(ScanError);
  });
});

describe('isMarkdownFile', () => {
  it('matches markdown extensions', () => {
    expect(isMarkdownFile('guide/README.md')).toBe(true);
    expect(isMarkdownFile('notes.MARKDOWN')).toBe(true);
    expect(isMarkdownFile('Card.jsx')).toBe(false);
  });
});
