import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_FILE_CONCURRENCY,
  DEFAULT_INCLUDE,
  DEFAULT_MODEL,
  loadConfig,
  loadConfigFile,
  resolveConfig,
  validateRuleSettings,
} from '../config';
import { ConfigError, ErrorCode } from '../errors';

describe('config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'react-style-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('falls back to defaults without a config file', async () => {
    const config = await loadConfig({ positional: [] }, {}, dir);
    expect(config.include).toEqual(DEFAULT_INCLUDE);
    expect(config.model).toBe(DEFAULT_MODEL);
    expect(config.format).toBe('md');
    expect(config.rulesDir).toBe(path.join(dir, 'rules'));
    expect(config.reportPath).toBe(path.join(dir, 'reports/lint.json'));
    expect(config.outBase).toBe(path.join(dir, 'reports/lint'));
    expect(config.fileConcurrency).toBe(DEFAULT_FILE_CONCURRENCY);
    expect(config.llm).toBe(false);
  });

  it('layers file, environment and CLI settings', async () => {
    await fs.writeFile(
      path.join(dir, '.reactstylerc.json'),
      JSON.stringify({
        include: ['app/**/*.jsx'],
        rules: { 'jsx-quotes': 'warn' },
        format: 'html',
        model: 'file-model',
      })
    );
    const env = { REPORT_FORMAT: 'all', REACT_STYLE_MODEL: 'env-model', FILE_CONCURRENCY: '3' };

    const fromFileAndEnv = await loadConfig({ positional: [] }, env, dir);
    expect(fromFileAndEnv.include).toEqual(['app/**/*.jsx']);
    expect(fromFileAndEnv.rules).toEqual({ 'jsx-quotes': 'warn' });
    expect(fromFileAndEnv.format).toBe('all');
    expect(fromFileAndEnv.model).toBe('env-model');
    expect(fromFileAndEnv.fileConcurrency).toBe(3);

    const fromCli = await loadConfig(
      { positional: ['a.jsx'], only: 'lib/**/*.tsx', format: 'none', model: 'cli-model', noReport: true },
      env,
      dir
    );
    expect(fromCli.include).toEqual(['lib/**/*.tsx']);
    expect(fromCli.format).toBe('none');
    expect(fromCli.model).toBe('cli-model');
    expect(fromCli.reportPath).toBeNull();
    expect(fromCli.positional).toEqual([path.join(dir, 'a.jsx')]);
  });

  it('requires an explicitly named config file to exist', async () => {
    await expect(loadConfig({ positional: [], config: 'missing.json' }, {}, dir)).rejects.toThrow(
      ConfigError
    );
  });

  it('rejects invalid config files', async () => {
    const file = path.join(dir, 'bad.json');
    await fs.writeFile(file, JSON.stringify({ rules: { 'jsx-quotes': 'loud' }, extra: 1 }));
    await expect(loadConfigFile(file, true)).rejects.toThrow(/^Invalid config in /);

    await fs.writeFile(file, '{ nope');
    await expect(loadConfigFile(file, true)).rejects.toThrow(/^Invalid JSON in /);
  });

  it('validates numeric and format settings from the environment', () => {
    expect(() => resolveConfig({ positional: [] }, {}, { RULE_CONCURRENCY: '0' }, dir)).toThrow(
      'RULE_CONCURRENCY must be a positive integer, got "0"'
    );
    expect(() => resolveConfig({ positional: [] }, {}, { REPORT_FORMAT: 'pdf' }, dir)).toThrow(
      'REPORT_FORMAT must be one of md, html, all, none; got "pdf"'
    );
  });
});

describe('validateRuleSettings', () => {
  it('names unknown rules', () => {
    let caught: unknown;
    try {
      validateRuleSettings({ 'jsx-quotes': 'off', nope: 'warn', other: 'error' }, new Set(['jsx-quotes']));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.code).toBe(ErrorCode.CONFIG_UNKNOWN_RULE);
    expect(caught.message).toBe('Unknown rules in config: nope, other');
  });
});
