import { join, resolve } from 'node:path';
import { describe, expect, test } from 'vitest';

import { ConfigError } from './config-error';
import { loadExportConfig, resolveOutputDirectory } from './export-config';

const paths = { cwd: '/work/project', homeDirectory: '/home/tester' };

describe('loadExportConfig', () => {
  test('applies defaults with only an OpenAI key', () => {
    expect(loadExportConfig({ OPENAI_API_KEY: 'test-secret' }, paths)).toEqual({
      outputDirectory: resolve('/work/project', 'exports'),
      autoOpen: false,
      model: 'openai/gpt-4o-mini',
      fallbackModel: undefined,
      maxRetries: 3,
      logLevel: 'info',
      credentials: { openaiApiKey: 'test-secret', anthropicApiKey: undefined },
    });
  });

  test('prefers OpenAI when both keys are set', () => {
    const config = loadExportConfig(
      { OPENAI_API_KEY: 'test-secret', ANTHROPIC_API_KEY: 'test-secret-2' },
      paths,
    );

    expect(config.model).toBe('openai/gpt-4o-mini');
  });

  test('falls back to Anthropic when only its key is set', () => {
    const config = loadExportConfig({ ANTHROPIC_API_KEY: 'test-secret' }, paths);

    expect(config.model).toBe('anthropic/claude-3-5-sonnet-20241022');
    expect(config.credentials.anthropicApiKey).toBe('test-secret');
  });

  test('reads every setting', () => {
    const config = loadExportConfig(
      {
        EXPORT_DIRECTORY: '~/Documents/exports',
        EXPORT_AUTO_OPEN: 'Yes',
        EXPORT_LLM_MODEL: 'anthropic/claude-3-5-haiku-20241022',
        EXPORT_LLM_FALLBACK_MODEL: 'openai/gpt-4o',
        EXPORT_LLM_MAX_RETRIES: '5',
        EXPORT_LOG_LEVEL: 'debug',
      },
      paths,
    );

    expect(config).toEqual({
      outputDirectory: join('/home/tester', 'Documents/exports'),
      autoOpen: true,
      model: 'anthropic/claude-3-5-haiku-20241022',
      fallbackModel: 'openai/gpt-4o',
      maxRetries: 5,
      logLevel: 'debug',
      credentials: { openaiApiKey: undefined, anthropicApiKey: undefined },
    });
  });

  test.each([
    ['true', true],
    ['1', true],
    ['FALSE', false],
    ['0', false],
    ['no', false],
  ])('parses EXPORT_AUTO_OPEN=%s', (value, expected) => {
    const config = loadExportConfig(
      { OPENAI_API_KEY: 'test-secret', EXPORT_AUTO_OPEN: value },
      paths,
    );

    expect(config.autoOpen).toBe(expected);
  });

  test('treats empty variables as unset', () => {
    const config = loadExportConfig(
      {
        OPENAI_API_KEY: 'test-secret',
        EXPORT_DIRECTORY: '  ',
        EXPORT_LLM_MODEL: '',
        EXPORT_LLM_MAX_RETRIES: '',
      },
      paths,
    );

    expect(config.outputDirectory).toBe(resolve('/work/project', 'exports'));
    expect(config.model).toBe('openai/gpt-4o-mini');
    expect(config.maxRetries).toBe(3);
  });

  test('throws ConfigError listing every invalid variable', () => {
    let caught: unknown;
    try {
      loadExportConfig(
        {
          OPENAI_API_KEY: 'test-secret',
          EXPORT_AUTO_OPEN: 'sometimes',
          EXPORT_LLM_MODEL: 'gpt-4o',
          EXPORT_LLM_MAX_RETRIES: '-1',
        },
        paths,
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues.map((issue) => issue.split(':')[0])).toEqual([
      'EXPORT_AUTO_OPEN',
      'EXPORT_LLM_MODEL',
      'EXPORT_LLM_MAX_RETRIES',
    ]);
    expect(issues[1]).toBe('EXPORT_LLM_MODEL: Expected "provider/model-name"');
  });

  test('throws ConfigError when no model can be chosen', () => {
    expect(() => loadExportConfig({}, paths)).toThrow(
      new ConfigError(
        'No LLM configured: set EXPORT_LLM_MODEL, OPENAI_API_KEY or ANTHROPIC_API_KEY',
      ),
    );
  });

  test('accepts an explicit model without API keys', () => {
    const config = loadExportConfig(
      { EXPORT_LLM_MODEL: 'openai/gpt-4o' },
      paths,
    );

    expect(config.model).toBe('openai/gpt-4o');
  });
});

describe('resolveOutputDirectory', () => {
  test('defaults to exports under cwd', () => {
    expect(resolveOutputDirectory(undefined, {}, paths)).toBe(
      resolve('/work/project', 'exports'),
    );
  });

  test('expands a bare ~', () => {
    expect(resolveOutputDirectory('~', {}, paths)).toBe('/home/tester');
  });

  test('expands environment variables', () => {
    expect(
      resolveOutputDirectory(
        '$DATA_ROOT/${PROJECT}/out',
        { DATA_ROOT: '/data', PROJECT: 'alpha' },
        paths,
      ),
    ).toBe(resolve('/data/alpha/out'));
  });

  test('leaves unset variables as written', () => {
    expect(resolveOutputDirectory('/srv/$MISSING', {}, paths)).toBe(
      resolve('/srv/$MISSING'),
    );
  });

  test('resolves relative paths against cwd', () => {
    expect(resolveOutputDirectory('out/docs', {}, paths)).toBe(
      resolve('/work/project', 'out/docs'),
    );
  });
});
