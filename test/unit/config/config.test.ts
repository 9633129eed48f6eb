import { describe, it, expect, jest } from '@jest/globals';
import { loadConfig, logConfigSummaryIfDev } from '@/config/index';
import { silentLogger } from '@test/__support__/fixtures';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      environment: 'production',
      logging: { level: 'info' },
      document: { maxBytes: 1_048_576 },
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      NODE_ENV: 'testing',
      CLUSTER_CONFIG_MAX_BYTES: '2048',
    });

    expect(config.logging.level).toBe('debug');
    expect(config.environment).toBe('testing');
    expect(config.document.maxBytes).toBe(2048);
  });

  it('falls back to defaults for invalid values', () => {
    const config = loadConfig({
      LOG_LEVEL: 'loud',
      NODE_ENV: 'qa',
      CLUSTER_CONFIG_MAX_BYTES: 'plenty',
    });

    expect(config.logging.level).toBe('info');
    expect(config.environment).toBe('production');
    expect(config.document.maxBytes).toBe(1_048_576);
  });

  it('rejects a non-positive size limit', () => {
    expect(loadConfig({ CLUSTER_CONFIG_MAX_BYTES: '0' }).document.maxBytes).toBe(1_048_576);
  });
});

describe('logConfigSummaryIfDev', () => {
  it('logs the effective configuration in development', () => {
    const logger = silentLogger();
    const debug = jest.spyOn(logger, 'debug');

    logConfigSummaryIfDev(logger, loadConfig({ NODE_ENV: 'development', CLUSTER_CONFIG_MAX_BYTES: '4096' }));

    expect(debug).toHaveBeenCalledWith(
      { environment: 'development', logLevel: 'info', maxDocumentBytes: 4096 },
      'Configuration loaded',
    );
  });

  it('stays quiet outside development', () => {
    const logger = silentLogger();
    const debug = jest.spyOn(logger, 'debug');

    logConfigSummaryIfDev(logger, loadConfig({ NODE_ENV: 'production' }));

    expect(debug).not.toHaveBeenCalled();
  });
});
