import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { loadOptionsFromEnv, resolveOptions, type SerdeOptions } from './config';
import { ConfigurationError } from './errors';
import { createLogger } from './logger';
import { defaultRegistry, Registry } from './registry';

describe('resolveOptions', () => {
  it('defaults to a warn logger and the default registry', () => {
    const resolved = resolveOptions();
    expect(resolved.logger.level).toBe('warn');
    expect(resolved.logger).toBe(createLogger());
    expect(resolved.registry).toBe(defaultRegistry);
  });

  it('creates a logger for the configured level', () => {
    expect(resolveOptions({ logLevel: 'debug' }).logger.level).toBe('debug');
  });

  it('uses a given logger and registry', () => {
    const logger = pino({ level: 'silent' });
    const registry = new Registry(logger);
    const resolved = resolveOptions({ logger, registry, logLevel: 'trace' });
    expect(resolved.logger).toBe(logger);
    expect(resolved.registry).toBe(registry);
  });

  it('rejects an unknown log level', () => {
    const options: SerdeOptions = JSON.parse('{"logLevel":"loud"}');
    expect(() => resolveOptions(options)).toThrow(ConfigurationError);
    expect(() => resolveOptions(options)).toThrow(/^Invalid options:\n/);
  });

  it('rejects unknown keys', () => {
    const options: SerdeOptions = JSON.parse('{"verbose":true}');
    expect(() => resolveOptions(options)).toThrow(ConfigurationError);
  });

  it('rejects a logger that is not a logger', () => {
    const options: SerdeOptions = JSON.parse('{"logger":{}}');
    expect(() => resolveOptions(options)).toThrow('Expected a pino logger');
  });
});

describe('loadOptionsFromEnv', () => {
  it('reads the log level and logger name', () => {
    expect(
      loadOptionsFromEnv({ STRUCTWALK_LOG_LEVEL: 'info', STRUCTWALK_LOGGER_NAME: 'codec' })
    ).toEqual({ logLevel: 'info', loggerName: 'codec' });
  });

  it('ignores unrelated variables', () => {
    expect(loadOptionsFromEnv({ PATH: '/usr/bin' })).toEqual({});
  });

  it('rejects an invalid log level', () => {
    expect(() => loadOptionsFromEnv({ STRUCTWALK_LOG_LEVEL: 'chatty' })).toThrow(
      /^Invalid environment:\n/
    );
  });
});
