import test from 'node:test';
import assert from 'node:assert/strict';

import { ConfigurationError, getMissingConfig, loadConfig, validateConfig } from './index';
import { logger, setLogLevel } from './logger';

test('getMissingConfig lists the credential when absent or blank', () => {
  assert.deepEqual(getMissingConfig({}), ['OPENAI_API_KEY']);
  assert.deepEqual(getMissingConfig({ OPENAI_API_KEY: '   ' }), ['OPENAI_API_KEY']);
  assert.deepEqual(getMissingConfig({ OPENAI_API_KEY: 'test-key' }), []);
});

test('validateConfig reflects missing keys', () => {
  assert.equal(validateConfig({}), false);
  assert.equal(validateConfig({ OPENAI_API_KEY: 'test-key' }), true);
});

test('loadConfig applies defaults', () => {
  const config = loadConfig({ OPENAI_API_KEY: 'test-key' });

  assert.deepEqual(config, {
    env: 'development',
    port: 4000,
    apiPrefix: '/api/v1',
    logLevel: 'info',
    ai: {
      openaiApiKey: 'test-key',
      defaultModel: 'gpt-3.5-turbo',
      maxMessageLength: 4000,
      maxRetries: 3,
      apiTimeoutSeconds: 30,
    },
  });
});

test('loadConfig reads overrides from the environment', () => {
  const config = loadConfig({
    OPENAI_API_KEY: ' test-key ',
    MAX_MESSAGE_LENGTH: '200',
    MAX_RETRIES: '5',
    API_TIMEOUT: '2.5',
    DEFAULT_MODEL: 'gpt-4o-mini',
    PORT: '8080',
    API_PREFIX: '/api',
  });

  assert.equal(config.ai.openaiApiKey, 'test-key');
  assert.equal(config.ai.maxMessageLength, 200);
  assert.equal(config.ai.maxRetries, 5);
  assert.equal(config.ai.apiTimeoutSeconds, 2.5);
  assert.equal(config.ai.defaultModel, 'gpt-4o-mini');
  assert.equal(config.port, 8080);
  assert.equal(config.apiPrefix, '/api');
});

test('loadConfig returns a frozen value', () => {
  const config = loadConfig({ OPENAI_API_KEY: 'test-key' });

  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.ai));
});

test('loadConfig fails with the list of missing keys', () => {
  assert.throws(
    () => loadConfig({}),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.message, 'Missing required configuration: OPENAI_API_KEY');
      assert.deepEqual(error.missing, ['OPENAI_API_KEY']);
      return true;
    }
  );
});

test('loadConfig rejects non-positive or malformed numeric settings', () => {
  assert.throws(
    () => loadConfig({ OPENAI_API_KEY: 'test-key', MAX_RETRIES: '0' }),
    { name: 'ConfigurationError', message: 'Invalid configuration: MAX_RETRIES must be a positive integer, got "0"' }
  );
  assert.throws(
    () => loadConfig({ OPENAI_API_KEY: 'test-key', MAX_MESSAGE_LENGTH: 'lots' }),
    { name: 'ConfigurationError', message: 'Invalid configuration: MAX_MESSAGE_LENGTH must be a positive integer, got "lots"' }
  );
  assert.throws(
    () => loadConfig({ OPENAI_API_KEY: 'test-key', API_TIMEOUT: '-1' }),
    { name: 'ConfigurationError', message: 'Invalid configuration: API_TIMEOUT must be a positive number, got "-1"' }
  );
});

test('loadConfig reads and validates LOG_LEVEL', () => {
  assert.equal(loadConfig({ OPENAI_API_KEY: 'test-key', LOG_LEVEL: 'debug' }).logLevel, 'debug');
  assert.throws(() => loadConfig({ OPENAI_API_KEY: 'test-key', LOG_LEVEL: 'loud' }), {
    name: 'ConfigurationError',
    message:
      'Invalid configuration: LOG_LEVEL must be one of error, warn, info, http, verbose, debug, silly, got "loud"',
  });
});

test('setLogLevel applies the configured level to the shared logger', () => {
  const previous = logger.level;
  try {
    setLogLevel('debug');
    assert.equal(logger.level, 'debug');
  } finally {
    setLogLevel(previous);
  }
});
