import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../src/shared/config.js';
import { ConfigurationError } from '../src/shared/errors.js';

function configError(run: () => unknown): ConfigurationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig({ env: {}, configFile: null })).toEqual({
      redisUrl: null,
      cache: { ttlSeconds: 3600, fallbackMaxEntries: 1000, leaseTtlMs: 10_000, leasePollIntervalMs: 50 },
      history: { databasePath: null, persistSnippets: true },
      rules: { maxFunctionLength: 50, maxComplexity: 10, disabled: [] },
      model: { provider: 'none', name: null, apiKey: null, baseUrl: null },
      requestTimeoutMs: 30_000,
      logLevel: 'info',
      port: 8080,
      configFile: null
    });
  });

  it('reads the environment', () => {
    const config = loadConfig({
      configFile: null,
      env: {
        REDIS_URL: 'redis://localhost:6379',
        CACHE_TTL_SECONDS: '60',
        DATABASE_PATH: ' ./history.db ',
        PERSIST_SNIPPETS: 'no',
        DISABLED_RULES: 'print_statement, naming_conventions,',
        MODEL_PROVIDER: 'OpenAI',
        OPENAI_API_KEY: 'test-key',
        REQUEST_TIMEOUT: '5',
        LOG_LEVEL: 'DEBUG',
        PORT: '0'
      }
    });

    expect(config.redisUrl).toBe('redis://localhost:6379');
    expect(config.cache.ttlSeconds).toBe(60);
    expect(config.history).toEqual({ databasePath: './history.db', persistSnippets: false });
    expect(config.rules.disabled).toEqual(['print_statement', 'naming_conventions']);
    expect(config.model).toEqual({ provider: 'openai', name: 'gpt-4o-mini', apiKey: 'test-key', baseUrl: null });
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.logLevel).toBe('debug');
    expect(config.port).toBe(0);
  });

  it('accepts the alternate Anthropic key name', () => {
    const config = loadConfig({ configFile: null, env: { MODEL_PROVIDER: 'anthropic', CLAUDE_API_KEY: 'test-key' } });

    expect(config.model).toMatchObject({ provider: 'anthropic', name: 'claude-3-5-haiku-latest', apiKey: 'test-key' });
  });

  it('requires an API key for a model provider', () => {
    const error = configError(() => loadConfig({ configFile: null, env: { MODEL_PROVIDER: 'gemini' } }));

    expect(error.message).toBe('Model provider "gemini" requires an API key');
    expect(error.configKey).toBe('model.apiKey');
  });

  it('rejects invalid values with the offending key', () => {
    const error = configError(() => loadConfig({ configFile: null, env: { PORT: 'eighty' } }));

    expect(error.configKey).toBe('port');
    expect(error.message.startsWith('Invalid configuration: port: ')).toBe(true);
  });

  it('rejects unknown providers', () => {
    const error = configError(() => loadConfig({ configFile: null, env: { MODEL_PROVIDER: 'mystery' } }));

    expect(error.configKey).toBe('model.provider');
  });

  it('returns a frozen object', () => {
    const config = loadConfig({ env: {}, configFile: null });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.rules.disabled)).toBe(true);
  });

  describe('configuration file', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), 'pylens-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    const yamlText = [
      'cache:',
      '  ttlSeconds: 120',
      'rules:',
      '  disabled:',
      '    - long_function',
      'model:',
      '  provider: gemini',
      '  apiKey: test-file-key',
      'port: 9000',
      ''
    ].join('\n');

    it('layers the file between defaults and the environment', () => {
      const file = path.join(dir, 'custom.yaml');
      writeFileSync(file, yamlText);

      const config = loadConfig({ env: { PORT: '9100' }, configFile: file });

      expect(config.cache.ttlSeconds).toBe(120);
      expect(config.rules.disabled).toEqual(['long_function']);
      expect(config.model).toEqual({
        provider: 'gemini',
        name: 'gemini-2.0-flash',
        apiKey: 'test-file-key',
        baseUrl: null
      });
      expect(config.port).toBe(9100);
      expect(config.configFile).toBe(file);
    });

    it('finds pylens.yaml in the working directory', () => {
      writeFileSync(path.join(dir, 'pylens.yaml'), 'logLevel: warn\n');

      const config = loadConfig({ env: {}, cwd: dir });

      expect(config.logLevel).toBe('warn');
      expect(config.configFile).toBe(path.join(dir, 'pylens.yaml'));
    });

    it('resolves PYLENS_CONFIG against the working directory', () => {
      writeFileSync(path.join(dir, 'other.yaml'), 'port: 7000\n');

      expect(loadConfig({ env: { PYLENS_CONFIG: 'other.yaml' }, cwd: dir }).port).toBe(7000);
    });

    it('treats an empty file as no settings', () => {
      const file = path.join(dir, 'empty.yaml');
      writeFileSync(file, '');

      expect(loadConfig({ env: {}, configFile: file }).port).toBe(8080);
    });

    it('rejects unknown keys', () => {
      const file = path.join(dir, 'bad.yaml');
      writeFileSync(file, 'colour: blue\n');

      const error = configError(() => loadConfig({ env: {}, configFile: file }));
      expect(error.message.startsWith(`Invalid configuration file ${file}: `)).toBe(true);
    });

    it('fails when an explicit file is missing', () => {
      const file = path.join(dir, 'missing.yaml');

      const error = configError(() => loadConfig({ env: {}, configFile: file }));
      expect(error.message).toBe(`Configuration file not found: ${file}`);
    });
  });
});
