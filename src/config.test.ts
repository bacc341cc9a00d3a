import { afterEach, describe, expect, it, vi } from 'vitest';
import { configure, loadConfig } from './config';
import { createLogger, getLogLevel, setLogLevel } from './utils/logger';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      inventoryApiUrl: 'http://localhost:8000/api',
      inventoryApiToken: null,
      inventoryTimeoutMs: 10000,
      logLevel: 'info',
    });
  });

  it('reads the environment', () => {
    const config = loadConfig({
      INVENTORY_API_URL: 'https://inventory.example.test/api//',
      INVENTORY_API_TOKEN: 'test-secret',
      INVENTORY_TIMEOUT_MS: '2500',
      FABRIC_LOG_LEVEL: ' DEBUG ',
    });

    expect(config).toEqual({
      inventoryApiUrl: 'https://inventory.example.test/api',
      inventoryApiToken: 'test-secret',
      inventoryTimeoutMs: 2500,
      logLevel: 'debug',
    });
  });

  it('ignores invalid values', () => {
    const config = loadConfig({ INVENTORY_TIMEOUT_MS: '-5', FABRIC_LOG_LEVEL: 'verbose' });

    expect(config.inventoryTimeoutMs).toBe(10000);
    expect(config.logLevel).toBe('info');
  });
});

describe('configure', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('sets the logging threshold from FABRIC_LOG_LEVEL', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    configure(loadConfig({ FABRIC_LOG_LEVEL: 'warn' }));
    const log = createLogger('fabric-generator');
    log.info('Generated dc1');
    log.warn('Pool nearly full');

    expect(getLogLevel()).toBe('warn');
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[fabric-generator] Pool nearly full');
  });
});
