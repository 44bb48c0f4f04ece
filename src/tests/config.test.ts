import { availableParallelism } from 'os';
import { DEFAULT_MODEL, loadConfig } from '../config';
import { ConfigError } from '../errors';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      concurrency: 2 * availableParallelism(),
      parallel: true,
      model: DEFAULT_MODEL,
      systemPrompt: 'You are a helpful assistant. Please follow the instructions exactly.',
      logLevel: 'info',
      jsonLogs: false,
      outDir: '.'
    });
  });

  it('should read settings from the environment', () => {
    const config = loadConfig({
      CHAINWEAVE_CONCURRENCY: '4',
      CHAINWEAVE_MODEL: 'gpt-test',
      CHAINWEAVE_TIMEOUT_MS: '5000',
      LOG_LEVEL: 'debug',
      OPENAI_API_KEY: 'test-key'
    });

    expect(config).toMatchObject({
      concurrency: 4,
      model: 'gpt-test',
      timeoutMs: 5000,
      logLevel: 'debug',
      apiKey: 'test-key'
    });
  });

  it('should let explicit overrides win over the environment', () => {
    const config = loadConfig({ CHAINWEAVE_CONCURRENCY: '4', CHAINWEAVE_MODEL: 'gpt-test' }, { concurrency: 8 });

    expect(config.concurrency).toBe(8);
    expect(config.model).toBe('gpt-test');
  });

  it('should force a concurrency of one when parallel execution is disabled', () => {
    expect(loadConfig({ CHAINWEAVE_PARALLEL: 'false', CHAINWEAVE_CONCURRENCY: '6' })).toMatchObject({
      parallel: false,
      concurrency: 1
    });
    expect(loadConfig({}, { parallel: false }).concurrency).toBe(1);
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ CHAINWEAVE_CONCURRENCY: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ CHAINWEAVE_CONCURRENCY: 'many' })).toThrow(/concurrency/);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow('Invalid configuration: logLevel: Unknown log level');
    expect(() => loadConfig({ CHAINWEAVE_PARALLEL: 'maybe' })).toThrow(ConfigError);
  });
});
